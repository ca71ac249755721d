import type { BackendConfig } from "../src/config.js";
import { ByteQueue } from "../src/byteSource.js";
import { MemoryLapLogStore, type LapLogStore } from "../src/lapLogStore.js";
import { createApp } from "../src/server.js";

export const TEST_CONFIG: BackendConfig = {
  HOST: "127.0.0.1",
  PORT: 3001,
  INPUT_PATH: "-",
  BAUD_RATE: 115200,
  TICK_INTERVAL_MS: 20,
  REFRESH_INTERVAL_MS: 1000,
  ORIGIN_LAT: 35.3698692322,
  ORIGIN_LON: 138.9336547852,
  TRIGGER_RADIUS: 5,
  UTC_OFFSET_HOURS: 9,
  LAP_LOG_PATH: "./LAP_log.test.csv",
  LAP_LOG_KEY: "laptimer:test"
};

export const RMC_AT_ORIGIN = "$GPRMC,123519,A,4807.038,N,01131.000,E,022.4,084.4,230394,003.1,W*6A\r\n";
// ~3.7 m north of RMC_AT_ORIGIN
export const RMC_NEAR = "$GPRMC,123530,A,4807.040,N,01131.000,E,050.0,084.4,230394,003.1,W*6F\r\n";
// ~185 m north of RMC_AT_ORIGIN
export const RMC_FAR = "$GPRMC,123545,A,4807.138,N,01131.000,E,080.0,084.4,230394,003.1,W*6E\r\n";

export async function createTestApp(lapLog: LapLogStore = new MemoryLapLogStore()) {
  const source = new ByteQueue();
  const app = await createApp(TEST_CONFIG, {
    logger: false,
    lapLog,
    redis: null,
    source,
    autoStart: false,
    now: () => 0
  });
  await app.ready();
  return { app, source, lapLog };
}
