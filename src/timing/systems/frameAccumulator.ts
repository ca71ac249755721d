import { CARRIAGE_RETURN, FRAME_CAPACITY, FRAME_END, FRAME_START } from "../constants";

export type FrameFeedResult = { kind: "frame"; frame: string } | { kind: "continue" };

const CONTINUE: FrameFeedResult = { kind: "continue" };

/**
 * Collects receiver bytes into candidate sentences.
 *
 * A start marker always begins a fresh frame, so a sentence cut off mid-way is
 * superseded by the next one. Bytes beyond the capacity are dropped while the
 * frame stays open; the truncated text is still handed out on the terminator
 * and fails its checksum downstream.
 */
export class FrameAccumulator {
  private readonly buffer: Uint8Array;
  private length = 0;

  constructor(readonly capacity = FRAME_CAPACITY) {
    this.buffer = new Uint8Array(capacity);
  }

  get size() {
    return this.length;
  }

  reset() {
    this.length = 0;
  }

  feed(byte: number): FrameFeedResult {
    if (byte === CARRIAGE_RETURN) return CONTINUE;

    if (byte === FRAME_START) {
      this.reset();
      this.append(byte);
      return CONTINUE;
    }

    this.append(byte);

    if (byte === FRAME_END) {
      const frame = this.text();
      this.reset();
      return { kind: "frame", frame };
    }
    return CONTINUE;
  }

  feedAll(bytes: Iterable<number>): string[] {
    const frames: string[] = [];
    for (const byte of bytes) {
      const result = this.feed(byte);
      if (result.kind === "frame") frames.push(result.frame);
    }
    return frames;
  }

  private append(byte: number) {
    if (this.length >= this.capacity) return;
    this.buffer[this.length] = byte;
    this.length += 1;
  }

  private text() {
    return String.fromCharCode(...this.buffer.subarray(0, this.length));
  }
}
