import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import type { FastifyBaseLogger } from "fastify";
import { SerialPort } from "serialport";

export interface ByteSource {
  /** Returns whatever arrived since the last call; never waits. */
  drain(): Uint8Array;
}

const EMPTY = new Uint8Array(0);

export class ByteQueue implements ByteSource {
  private chunks: Uint8Array[] = [];
  private queued = 0;

  get pending(): number {
    return this.queued;
  }

  push(chunk: Uint8Array | string): void {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "latin1") : chunk;
    if (bytes.length === 0) return;
    this.chunks.push(bytes);
    this.queued += bytes.length;
  }

  drain(): Uint8Array {
    if (this.chunks.length === 0) return EMPTY;
    const out = Buffer.concat(this.chunks, this.queued);
    this.chunks = [];
    this.queued = 0;
    return out;
  }
}

export const STDIN_PATH = "-";

export type InputKind = "stdin" | "serial" | "file";

const SERIAL_PATH = /^(\/dev\/|COM\d+$)/i;

export function inputKindOf(path: string): InputKind {
  if (path === STDIN_PATH) return "stdin";
  return SERIAL_PATH.test(path) ? "serial" : "file";
}

export type InputOptions = {
  path: string;
  baudRate: number;
};

export type OpenedInput = {
  source: ByteQueue;
  stream: Readable;
  /** Detaches the queue; streams opened here are destroyed, stdin is only paused. */
  close(): void;
};

function openStream({ path, baudRate }: InputOptions): Readable {
  switch (inputKindOf(path)) {
    case "stdin":
      return process.stdin;
    case "serial":
      return new SerialPort({ path, baudRate });
    case "file":
      return createReadStream(path);
  }
}

export function pipeStream(queue: ByteQueue, stream: Readable, log: FastifyBaseLogger): () => void {
  const onData = (chunk: Buffer | string) => queue.push(chunk);
  const onError = (err: Error) => log.error({ err }, "input.error");
  const onEnd = () => log.info({ event: "input.end" }, "device_event");
  stream.on("data", onData);
  stream.on("error", onError);
  stream.on("end", onEnd);
  return () => {
    stream.off("data", onData);
    stream.off("end", onEnd);
    stream.off("error", onError);
  };
}

export function openInput(options: InputOptions, log: FastifyBaseLogger): OpenedInput {
  const stream = openStream(options);
  const source = new ByteQueue();
  const detach = pipeStream(source, stream, log);
  const owned = stream !== process.stdin;
  log.info({ event: "input.open", path: options.path, kind: inputKindOf(options.path) }, "device_event");

  return {
    source,
    stream,
    close() {
      detach();
      if (!owned) {
        stream.pause();
        return;
      }
      // a late close failure still gets logged
      stream.on("error", (err: Error) => log.warn({ err }, "input.close_failed"));
      stream.destroy();
    }
  };
}
