import { FIELD_DELIMITER, MAX_FIELDS } from "../constants";

/** Blank fields are skipped, so ",," collapses and later indices shift left. */
export function tokenizeFields(payload: string, maxFields = MAX_FIELDS): string[] {
  return payload
    .split(FIELD_DELIMITER)
    .filter((field) => field.length > 0)
    .slice(0, maxFields);
}
