import { CHECKSUM_DELIMITER } from "../constants";

export type RejectReason =
  | "missing_start"
  | "missing_checksum"
  | "empty_payload"
  | "short_trailer"
  | "checksum_mismatch";

export type ValidationResult = { ok: true; payload: string } | { ok: false; reason: RejectReason };

export function computeChecksum(payload: string) {
  let checksum = 0;
  for (let i = 0; i < payload.length; i += 1) {
    checksum ^= payload.charCodeAt(i) & 0xff;
  }
  return checksum;
}

// Anything outside [0-9A-Fa-f] counts as zero instead of failing the decode.
function hexDigit(char: string) {
  const value = Number.parseInt(char, 16);
  return Number.isNaN(value) ? 0 : value;
}

export function decodeChecksumTrailer(trailer: string) {
  return (hexDigit(trailer.charAt(0)) << 4) | hexDigit(trailer.charAt(1));
}

export function validateSentence(frame: string): ValidationResult {
  if (!frame.startsWith("$")) return { ok: false, reason: "missing_start" };

  const delimiterIndex = frame.indexOf(CHECKSUM_DELIMITER, 1);
  if (delimiterIndex < 0) return { ok: false, reason: "missing_checksum" };
  if (delimiterIndex === 1) return { ok: false, reason: "empty_payload" };

  const payload = frame.slice(1, delimiterIndex);
  const trailer = frame.slice(delimiterIndex + 1);
  if (trailer.length < 2) return { ok: false, reason: "short_trailer" };

  if (computeChecksum(payload) !== decodeChecksumTrailer(trailer)) {
    return { ok: false, reason: "checksum_mismatch" };
  }
  return { ok: true, payload };
}
