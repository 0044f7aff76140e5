/**
 * Buffered reader over an async sequence of byte chunks.
 *
 * Used by the container reader to pull the header and whole blocks out of a
 * file or stream without loading it entirely.
 */

import { DecodeError } from '../errors.js';

export class ByteReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private offset = 0;
  private exhausted = false;
  private consumed = 0;

  constructor(private readonly chunks: AsyncIterator<Uint8Array>) {}

  /**
   * Total number of bytes handed out so far.
   */
  get position(): number {
    return this.consumed;
  }

  /**
   * True once every chunk has been read and the buffer is empty.
   */
  async atEnd(): Promise<boolean> {
    return !(await this.fill(1));
  }

  /**
   * Read exactly `length` bytes.
   *
   * @throws DecodeError('UNEXPECTED_EOF') if the input ends first
   */
  async readBytes(length: number): Promise<Uint8Array> {
    if (!(await this.fill(length))) {
      throw new DecodeError(
        `Unexpected end of input: needed ${length} bytes at offset ${this.consumed}`,
        'UNEXPECTED_EOF'
      );
    }
    const bytes = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    this.consumed += length;
    return bytes;
  }

  /**
   * Read a zig-zag varint long.
   */
  async readLong(): Promise<bigint> {
    let result = 0n;
    let shift = 0n;
    for (;;) {
      const [byte] = await this.readBytes(1);
      result |= BigInt(byte & 0x7f) << shift;
      if ((byte & 0x80) === 0) break;
      shift += 7n;
      if (shift > 63n) {
        throw new DecodeError(`Varint too long at offset ${this.consumed}`, 'INVALID_DATA');
      }
    }
    return BigInt.asIntN(64, (result >> 1n) ^ -(result & 1n));
  }

  /**
   * Read a long that must be a non-negative safe integer (lengths, counts).
   */
  async readCount(what: string): Promise<number> {
    const value = await this.readLong();
    if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new DecodeError(`Invalid ${what} ${value} at offset ${this.consumed}`, 'INVALID_DATA');
    }
    return Number(value);
  }

  /**
   * Make sure at least `length` unread bytes are buffered.
   * Returns false if the input ends before that.
   */
  private async fill(length: number): Promise<boolean> {
    let available = this.buffer.length - this.offset;
    if (available >= length) {
      return true;
    }

    // Join pending chunks once per fill
    const pending: Uint8Array[] = [this.buffer.subarray(this.offset)];
    while (available < length && !this.exhausted) {
      const next = await this.chunks.next();
      if (next.done) {
        this.exhausted = true;
      } else if (next.value.length > 0) {
        pending.push(next.value);
        available += next.value.length;
      }
    }

    if (pending.length > 1) {
      const merged = new Uint8Array(available);
      let at = 0;
      for (const chunk of pending) {
        merged.set(chunk, at);
        at += chunk.length;
      }
      this.buffer = merged;
      this.offset = 0;
    }
    return available >= length;
  }
}
