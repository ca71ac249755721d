import { z } from "zod";
import {
  DEFAULT_ORIGIN,
  DEFAULT_REFRESH_INTERVAL_MS,
  DEFAULT_TRIGGER_RADIUS,
  DEFAULT_UTC_OFFSET_HOURS
} from "../../src/timing/constants.js";

const ConfigSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(3001),
  INPUT_PATH: z.string().min(1).default("-"),
  BAUD_RATE: z.coerce.number().int().positive().default(115200),
  TICK_INTERVAL_MS: z.coerce.number().int().positive().default(20),
  REFRESH_INTERVAL_MS: z.coerce.number().int().min(0).default(DEFAULT_REFRESH_INTERVAL_MS),
  ORIGIN_LAT: z.coerce.number().min(-90).max(90).default(DEFAULT_ORIGIN.latitude),
  ORIGIN_LON: z.coerce.number().min(-180).max(180).default(DEFAULT_ORIGIN.longitude),
  TRIGGER_RADIUS: z.coerce.number().int().min(0).max(50).default(DEFAULT_TRIGGER_RADIUS),
  UTC_OFFSET_HOURS: z.coerce.number().int().min(-12).max(14).default(DEFAULT_UTC_OFFSET_HOURS),
  LAP_LOG_PATH: z.string().min(1).default("./LAP_log.csv"),
  REDIS_URL: z.string().min(1).optional(),
  LAP_LOG_KEY: z.string().min(1).default("laptimer:laps")
});

export type BackendConfig = z.infer<typeof ConfigSchema>;

type ProcessEnv = Record<string, string | undefined>;

export function loadConfig(env: ProcessEnv = process.env): BackendConfig {
  return ConfigSchema.parse(env);
}
