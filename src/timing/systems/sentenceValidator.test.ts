import { describe, expect, it } from "vitest";
import { computeChecksum, decodeChecksumTrailer, validateSentence } from "./sentenceValidator";

const PAYLOAD = "GPRMC,123519,A,4807.038,N,01131.000,E,022.4,084.4,230394,003.1,W";

describe("sentenceValidator", () => {
  it("accepts a sentence and returns the payload without the trailer", () => {
    expect(validateSentence(`$${PAYLOAD}*6A\n`)).toEqual({ ok: true, payload: PAYLOAD });
  });

  it("reproduces the transmitted trailer from the payload", () => {
    const trailer = computeChecksum(PAYLOAD).toString(16).toUpperCase().padStart(2, "0");
    expect(trailer).toBe("6A");
  });

  it("decodes the trailer case-insensitively", () => {
    expect(validateSentence(`$${PAYLOAD}*6a`).ok).toBe(true);
  });

  it("rejects a trailer with one digit flipped", () => {
    expect(validateSentence(`$${PAYLOAD}*6B\n`)).toEqual({ ok: false, reason: "checksum_mismatch" });
    expect(validateSentence(`$${PAYLOAD}*7A\n`)).toEqual({ ok: false, reason: "checksum_mismatch" });
  });

  it("reads non-hex trailer digits as zero", () => {
    expect(decodeChecksumTrailer("G3")).toBe(0x03);
    expect(decodeChecksumTrailer("8Z")).toBe(0x80);
    expect(validateSentence("$AB*G3")).toEqual({ ok: true, payload: "AB" });
    expect(validateSentence("$PX*Z8\n")).toEqual({ ok: true, payload: "PX" });
  });

  it("rejects frames without a start marker", () => {
    expect(validateSentence(`${PAYLOAD}*6A\n`)).toEqual({ ok: false, reason: "missing_start" });
  });

  it("rejects frames without a checksum delimiter", () => {
    expect(validateSentence(`$${PAYLOAD}\n`)).toEqual({ ok: false, reason: "missing_checksum" });
  });

  it("rejects an empty payload", () => {
    expect(validateSentence("$*00\n")).toEqual({ ok: false, reason: "empty_payload" });
  });

  it("rejects a trailer shorter than two characters", () => {
    expect(validateSentence("$AB*0")).toEqual({ ok: false, reason: "short_trailer" });
  });
});
