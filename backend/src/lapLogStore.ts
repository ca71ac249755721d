import { appendFile } from "node:fs/promises";
import { LAP_LOG_HEADER } from "../../src/timing/index.js";

export interface LapLogStore {
  writeHeader(): Promise<void>;
  append(line: string): Promise<void>;
}

export interface RedisLikeClient {
  rPush(key: string, element: string): Promise<unknown>;
}

export class MemoryLapLogStore implements LapLogStore {
  readonly lines: string[] = [];

  async writeHeader(): Promise<void> {
    this.lines.push(LAP_LOG_HEADER);
  }

  async append(line: string): Promise<void> {
    this.lines.push(line);
  }
}

/** CSV on disk; the header is appended again at every session start. */
export class FileLapLogStore implements LapLogStore {
  constructor(readonly path: string) {}

  async writeHeader(): Promise<void> {
    await appendFile(this.path, `${LAP_LOG_HEADER}\n`, "utf8");
  }

  async append(line: string): Promise<void> {
    await appendFile(this.path, `${line}\n`, "utf8");
  }
}

export class RedisLapLogStore implements LapLogStore {
  constructor(
    private readonly redis: RedisLikeClient,
    readonly key: string
  ) {}

  async writeHeader(): Promise<void> {
    await this.redis.rPush(this.key, LAP_LOG_HEADER);
  }

  async append(line: string): Promise<void> {
    await this.redis.rPush(this.key, line);
  }
}
