export const FRAME_START = 0x24; // $
export const FRAME_END = 0x0a; // \n
export const CARRIAGE_RETURN = 0x0d;
// 160-byte receive buffer, last slot reserved for the terminator.
export const FRAME_CAPACITY = 159;
export const CHECKSUM_DELIMITER = "*";
export const FIELD_DELIMITER = ",";
export const MAX_FIELDS = 24;
export const KNOTS_TO_KMH = 1.852;
export const CENTURY_PIVOT_YEAR = 80;

export const EARTH_RADIUS_METERS = 6371000;

export const DEFAULT_ORIGIN = { latitude: 35.3698692322, longitude: 138.9336547852 } as const;
export const RADIUS_STEP = 5;
export const RADIUS_MAX = 50;
export const DEFAULT_TRIGGER_RADIUS = 5;
export const LAP_DEBOUNCE_MS = 10_000;
export const LAP_HISTORY_SIZE = 5;
export const DEFAULT_UTC_OFFSET_HOURS = 9;
export const DEFAULT_REFRESH_INTERVAL_MS = 1000;

export const LAP_LOG_HEADER = "LAPCount,LapTime,TopSpeed,YYYY/MM/DD/Hour:Minute:Second";
