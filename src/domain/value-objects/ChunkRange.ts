import { ConfigurationError } from '../errors/DomainErrors.js';

/** 不可變的 chunk_id 閉區間；end 省略時代表到最後一筆 */
export class ChunkRange {
  private constructor(
    public readonly start: number,
    public readonly end?: number,
  ) {}

  static of(start: number = 1, end?: number): ChunkRange {
    if (!Number.isInteger(start) || start < 1) {
      throw new ConfigurationError(`Range start must be a positive integer, got ${start}`);
    }
    if (end !== undefined && (!Number.isInteger(end) || end < start)) {
      throw new ConfigurationError(`Range end must be an integer >= ${start}, got ${end}`);
    }
    return new ChunkRange(start, end);
  }

  static all(): ChunkRange {
    return new ChunkRange(1);
  }

  toString(): string {
    return this.end === undefined ? `${this.start}+` : `${this.start}-${this.end}`;
  }
}
