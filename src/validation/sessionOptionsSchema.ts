import { z } from "zod";
import {
  DEFAULT_ORIGIN,
  DEFAULT_REFRESH_INTERVAL_MS,
  DEFAULT_TRIGGER_RADIUS,
  DEFAULT_UTC_OFFSET_HOURS,
  FRAME_CAPACITY,
  LAP_DEBOUNCE_MS
} from "../timing/constants";
import { isLadderRadius } from "../timing/systems/radiusSystem";

const geoPointSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180)
});

export const sessionOptionsSchema = z.object({
  origin: geoPointSchema.default({ ...DEFAULT_ORIGIN }),
  triggerRadius: z
    .number()
    .refine(isLadderRadius, { message: "triggerRadius must be one of 0, 5, ..., 50" })
    .default(DEFAULT_TRIGGER_RADIUS),
  utcOffsetHours: z.number().int().min(-12).max(14).default(DEFAULT_UTC_OFFSET_HOURS),
  refreshIntervalMs: z.number().int().min(0).default(DEFAULT_REFRESH_INTERVAL_MS),
  debounceMs: z.number().int().positive().default(LAP_DEBOUNCE_MS),
  frameCapacity: z.number().int().min(16).max(4096).default(FRAME_CAPACITY),
  startedAtMs: z.number().min(0).default(0)
});

export type SessionOptions = z.input<typeof sessionOptionsSchema>;
export type ResolvedSessionOptions = z.infer<typeof sessionOptionsSchema>;
