import { DelimitedWriterOption, DelimitedWriterOptions } from '../types/writer';
import { resolveOptions } from './DelimitedWriterOptions';
import { Logger } from './Logger';
import { StringBuilder } from './StringBuilder';

/**
 * Builds `prefix + parts.join(step) + suffix` one part at a time.
 *
 * The prefix and suffix are never stored in the underlying buffer; they are
 * added when rendering, and their byte length is folded into `len()` and
 * `cap()`. All counts are UTF-8 bytes.
 */
export class DelimitedWriter {
  readonly options: Readonly<DelimitedWriterOptions>;
  private builder?: StringBuilder;
  private written = false;
  // byte length of prefix + suffix
  private readonly n: number;

  constructor(...opts: DelimitedWriterOption[]) {
    this.options = resolveOptions(opts);
    this.n = Buffer.byteLength(this.options.prefix, 'utf8') + Buffer.byteLength(this.options.suffix, 'utf8');
  }

  /**
   * Appends the UTF-8 encoding of a code point. Values that are not Unicode
   * scalar values are written as U+FFFD.
   * @returns the number of bytes the code point took
   */
  writeRune(codePoint: number): number {
    return this.writeStepIfNeeded().writeRune(codePoint);
  }

  writeString(text: string): number {
    return this.writeStepIfNeeded().writeString(text);
  }

  writeByte(byte: number): void {
    this.writeStepIfNeeded().writeByte(byte);
  }

  write(bytes: Uint8Array): number {
    return this.writeStepIfNeeded().write(bytes);
  }

  /**
   * Makes room for another `n` bytes. Does not count as a write.
   * @throws {RangeError} if `n` is not an integer
   * @throws {NegativeGrowthException} if `n` is negative
   */
  grow(n: number): void {
    Logger.debug('DelimitedWriter', `Growing buffer by ${n} bytes`);
    this.ensureBuilder().grow(n);
  }

  cap(): number {
    if (!this.builder) {
      return this.n;
    }
    return this.builder.cap() + this.n;
  }

  len(): number {
    if (!this.builder) {
      return this.n;
    }
    return this.builder.len() + this.n;
  }

  /** Clears the written parts; the next write is a first write again. */
  reset(): void {
    Logger.debug('DelimitedWriter', 'Resetting writer', { length: this.len() });
    this.builder?.reset();
    this.written = false;
  }

  toString(): string {
    const body = this.builder ? this.builder.toString() : '';
    return this.options.prefix + body + this.options.suffix;
  }

  toBuffer(): Buffer {
    const body = this.builder ? this.builder.toBuffer() : Buffer.alloc(0);
    return Buffer.concat([
      Buffer.from(this.options.prefix, 'utf8'),
      body,
      Buffer.from(this.options.suffix, 'utf8')
    ]);
  }

  private ensureBuilder(): StringBuilder {
    if (!this.builder) {
      this.builder = new StringBuilder();
    }
    return this.builder;
  }

  private writeStepIfNeeded(): StringBuilder {
    const builder = this.ensureBuilder();
    if (this.written) {
      builder.writeString(this.options.step);
    }
    this.written = true;
    return builder;
  }
}

export function createDelimitedWriter(...opts: DelimitedWriterOption[]): DelimitedWriter {
  return new DelimitedWriter(...opts);
}
