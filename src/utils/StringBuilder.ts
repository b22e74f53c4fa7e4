import { NegativeGrowthException } from './NegativeGrowthException';

const MIN_CAPACITY = 32;
const REPLACEMENT_CHARACTER = 0xfffd;

function isScalarValue(codePoint: number): boolean {
  return Number.isInteger(codePoint)
    && codePoint >= 0
    && codePoint <= 0x10ffff
    && (codePoint < 0xd800 || codePoint > 0xdfff);
}

/**
 * Growable UTF-8 byte buffer. Lengths and capacities are in bytes.
 */
export class StringBuilder {
  private buffer: Buffer = Buffer.alloc(0);
  private length = 0;

  writeRune(codePoint: number): number {
    const valid = isScalarValue(codePoint) ? codePoint : REPLACEMENT_CHARACTER;
    return this.writeString(String.fromCodePoint(valid));
  }

  writeString(text: string): number {
    const size = Buffer.byteLength(text, 'utf8');
    this.ensure(size);
    this.buffer.write(text, this.length, size, 'utf8');
    this.length += size;
    return size;
  }

  writeByte(byte: number): void {
    this.ensure(1);
    this.buffer[this.length++] = byte & 0xff;
  }

  write(bytes: Uint8Array): number {
    this.ensure(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
    return bytes.length;
  }

  /**
   * Guarantees that another `n` bytes can be written without reallocating.
   * @throws {RangeError} if `n` is not an integer
   * @throws {NegativeGrowthException} if `n` is negative
   */
  grow(n: number): void {
    if (!Number.isInteger(n)) {
      throw new RangeError(`growth must be an integer: ${n}`);
    }
    if (n < 0) {
      throw new NegativeGrowthException(n);
    }
    if (this.buffer.length - this.length < n) {
      this.reallocate(2 * this.buffer.length + n);
    }
  }

  len(): number {
    return this.length;
  }

  cap(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.length = 0;
  }

  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.length));
  }

  toString(): string {
    return this.buffer.toString('utf8', 0, this.length);
  }

  private ensure(extra: number): void {
    const needed = this.length + extra;
    if (needed <= this.buffer.length) {
      return;
    }
    this.reallocate(Math.max(2 * this.buffer.length, needed, MIN_CAPACITY));
  }

  private reallocate(capacity: number): void {
    const grown = Buffer.alloc(capacity);
    this.buffer.copy(grown, 0, 0, this.length);
    this.buffer = grown;
  }
}
