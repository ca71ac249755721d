import Fastify, { type FastifyBaseLogger, type FastifyServerOptions } from "fastify";
import websocket from "@fastify/websocket";
import { pathToFileURL } from "node:url";
import { createClient } from "redis";
import { z, ZodError } from "zod";
import { createTimerSession, type PresentationSnapshot } from "../../src/timing/index.js";
import { openInput, type ByteSource, type OpenedInput } from "./byteSource.js";
import { loadConfig, type BackendConfig } from "./config.js";
import { DeviceError, DeviceRuntime, isSignalName } from "./device.js";
import { FileLapLogStore, RedisLapLogStore, type LapLogStore } from "./lapLogStore.js";

const WS_OPEN = 1;
const API_V1_PREFIX = "/api/v1";

declare module "fastify" {
  interface FastifyInstance {
    device: DeviceRuntime;
  }
}

type PresentationSocket = {
  readyState: number;
  send(data: string): void;
  on(event: "close", listener: () => void): void;
};

type CreateAppOptions = {
  logger?: FastifyServerOptions["logger"];
  lapLog?: LapLogStore;
  redis?: ReturnType<typeof createClient> | null;
  source?: ByteSource;
  autoStart?: boolean;
  now?: () => number;
};

const SignalPathSchema = z.object({
  signal: z.string().min(1)
});

const SignalBodySchema = z.object({
  pressed: z.boolean()
});

async function createLapLogStore(
  config: BackendConfig,
  log: FastifyBaseLogger
): Promise<{ lapLog: LapLogStore; redis: ReturnType<typeof createClient> | null }> {
  const fileStore = new FileLapLogStore(config.LAP_LOG_PATH);
  if (!config.REDIS_URL) {
    return { lapLog: fileStore, redis: null };
  }

  const redis = createClient({ url: config.REDIS_URL });
  try {
    await redis.connect();
    return { lapLog: new RedisLapLogStore(redis, config.LAP_LOG_KEY), redis };
  } catch (err) {
    log.warn({ err, path: config.LAP_LOG_PATH }, "laplog.redis_unavailable");
    try {
      await redis.disconnect();
    } catch (disconnectErr) {
      log.debug({ err: disconnectErr }, "laplog.redis_disconnect_failed");
    }
    return { lapLog: fileStore, redis: null };
  }
}

export async function createApp(config: BackendConfig, options: CreateAppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });
  const { lapLog, redis } = options.lapLog
    ? { lapLog: options.lapLog, redis: options.redis ?? null }
    : await createLapLogStore(config, app.log);
  const now = options.now ?? Date.now;
  const session = createTimerSession({
    origin: { latitude: config.ORIGIN_LAT, longitude: config.ORIGIN_LON },
    triggerRadius: config.TRIGGER_RADIUS,
    utcOffsetHours: config.UTC_OFFSET_HOURS,
    refreshIntervalMs: config.REFRESH_INTERVAL_MS,
    startedAtMs: now()
  });
  // a caller-supplied source stays the caller's to close
  let input: OpenedInput | null = null;
  let source: ByteSource;
  if (options.source) {
    source = options.source;
  } else {
    input = openInput({ path: config.INPUT_PATH, baudRate: config.BAUD_RATE }, app.log);
    source = input.source;
  }
  const device = new DeviceRuntime({
    session,
    source,
    lapLog,
    log: app.log,
    tickIntervalMs: config.TICK_INTERVAL_MS,
    now
  });
  app.decorate("device", device);

  const sockets = new Set<PresentationSocket>();

  function broadcast(snapshot: PresentationSnapshot) {
    const data = JSON.stringify({ event: "presentation", payload: snapshot });
    for (const socket of sockets) {
      if (socket.readyState !== WS_OPEN) {
        sockets.delete(socket);
        continue;
      }
      try {
        socket.send(data);
      } catch (err) {
        app.log.debug({ err }, "ws.send_failed");
        sockets.delete(socket);
      }
    }
  }

  const unsubscribe = device.onPresentation(broadcast);

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof DeviceError) {
      reply.code(error.statusCode).send({ error: error.message });
      return;
    }
    if (error instanceof ZodError) {
      reply.code(400).send({ error: "invalid_request", issues: error.issues });
      return;
    }
    app.log.error(error);
    reply.code(500).send({ error: "internal_error" });
  });

  await app.register(websocket);

  app.get("/health", async () => ({
    ok: true,
    redis: redis?.isReady ?? false,
    running: device.running,
    laps: device.lapsView().lapCount
  }));

  app.get(`${API_V1_PREFIX}/presentation`, async () => device.presentation());

  app.get(`${API_V1_PREFIX}/fix`, async () => device.fixView());

  app.get(`${API_V1_PREFIX}/laps`, async () => device.lapsView());

  app.put(`${API_V1_PREFIX}/signals/:signal`, async (request) => {
    const { signal } = SignalPathSchema.parse(request.params);
    if (!isSignalName(signal)) {
      throw new DeviceError(404, `Unknown signal ${signal}.`);
    }
    const body = SignalBodySchema.parse(request.body);
    device.signals.set(signal, body.pressed);
    return { signal, pressed: body.pressed };
  });

  app.get("/ws", { websocket: true }, (socket) => {
    const ws: PresentationSocket = socket;
    sockets.add(ws);
    ws.send(JSON.stringify({ event: "presentation", payload: device.presentation() }));
    ws.on("close", () => {
      sockets.delete(ws);
    });
  });

  app.addHook("onReady", async () => {
    await device.open();
    if (options.autoStart ?? true) {
      device.startTicking();
    }
  });

  app.addHook("onClose", async () => {
    unsubscribe();
    device.stop();
    input?.close();
    await device.flush();
    if (redis) {
      await redis.disconnect();
    }
  });

  return app;
}

async function bootstrap() {
  const config = loadConfig();
  const app = await createApp(config);
  await app.listen({ host: config.HOST, port: config.PORT });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  bootstrap().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
