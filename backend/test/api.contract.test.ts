import assert from "node:assert/strict";
import test from "node:test";
import { MemoryLapLogStore } from "../src/lapLogStore.js";
import { createApp } from "../src/server.js";
import { createTestApp, RMC_AT_ORIGIN, RMC_FAR, RMC_NEAR, TEST_CONFIG } from "./helpers.js";

test("reports health without starting the tick loop", async (t) => {
  const { app } = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  const res = await app.inject({ method: "GET", url: "/health" });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { ok: true, redis: false, running: false, laps: 0 });
});

test("serves the current fix after sentences arrive", async (t) => {
  const { app, source } = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  source.push(RMC_AT_ORIGIN);
  app.device.tick(100);

  const res = await app.inject({ method: "GET", url: "/api/v1/fix" });
  assert.equal(res.statusCode, 200);
  const body = res.json();
  assert.deepEqual(body.fix.time, { hour: 12, minute: 35, second: 19 });
  assert.deepEqual(body.fix.date, { year: 1994, month: 3, day: 23 });
  assert.ok(Math.abs(body.fix.position.latitude - 48.1173) < 1e-4);
  assert.deepEqual(body.origin, { latitude: 35.3698692322, longitude: 138.9336547852 });
});

test("builds a presentation snapshot on demand", async (t) => {
  const { app } = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  const res = await app.inject({ method: "GET", url: "/api/v1/presentation" });
  assert.equal(res.statusCode, 200);
  const body = res.json();
  assert.equal(body.lapCount, 0);
  assert.equal(body.currentLap, null);
  assert.equal(body.triggerRadius, 5);
  assert.equal(body.satellites, 0);
});

test("sets signal levels that the next tick consumes", async (t) => {
  const { app } = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  const res = await app.inject({
    method: "PUT",
    url: "/api/v1/signals/cycle-radius",
    payload: { pressed: true }
  });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { signal: "cycle-radius", pressed: true });

  app.device.tick(10);
  app.device.tick(20);
  const presentation = await app.inject({ method: "GET", url: "/api/v1/presentation" });
  assert.equal(presentation.json().triggerRadius, 10);
});

test("rejects unknown signals and malformed bodies", async (t) => {
  const { app } = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  const unknown = await app.inject({
    method: "PUT",
    url: "/api/v1/signals/reboot",
    payload: { pressed: true }
  });
  assert.equal(unknown.statusCode, 404);
  assert.deepEqual(unknown.json(), { error: "Unknown signal reboot." });

  const malformed = await app.inject({
    method: "PUT",
    url: "/api/v1/signals/force-lap",
    payload: { pressed: "yes" }
  });
  assert.equal(malformed.statusCode, 400);
  assert.equal(malformed.json().error, "invalid_request");
});

test("lists completed laps newest first", async (t) => {
  const { app, source } = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  source.push(RMC_AT_ORIGIN);
  await app.inject({ method: "PUT", url: "/api/v1/signals/set-origin", payload: { pressed: true } });
  app.device.tick(100);
  await app.inject({ method: "PUT", url: "/api/v1/signals/set-origin", payload: { pressed: false } });

  const crossings: Array<[string, number]> = [
    [RMC_NEAR, 11000],
    [RMC_FAR, 12000],
    [RMC_NEAR, 30000],
    [RMC_FAR, 31000],
    [RMC_NEAR, 45000]
  ];
  for (const [sentence, nowMs] of crossings) {
    source.push(sentence);
    app.device.tick(nowMs);
  }

  const res = await app.inject({ method: "GET", url: "/api/v1/laps" });
  assert.equal(res.statusCode, 200);
  const body = res.json();
  assert.equal(body.lapCount, 3);
  assert.deepEqual(
    body.laps.map((lap: { ordinal: number; durationSeconds: number }) => [lap.ordinal, lap.durationSeconds]),
    [
      [2, 15],
      [1, 19]
    ]
  );
  assert.deepEqual(body.bestLap, { ordinal: 2, durationSeconds: 15 });
  assert.equal(body.averageLapSeconds, 17);
});

test("releases the input it opened when the app closes", async () => {
  const before = process.stdin.listenerCount("data");
  const app = await createApp(TEST_CONFIG, {
    logger: false,
    lapLog: new MemoryLapLogStore(),
    redis: null,
    autoStart: false,
    now: () => 0
  });
  await app.ready();
  assert.equal(process.stdin.listenerCount("data"), before + 1);

  await app.close();
  assert.equal(process.stdin.listenerCount("data"), before);
});
