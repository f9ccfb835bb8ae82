/**
 * Big-endian bit cursor over a byte buffer.
 * Fields are read MSB-first and may straddle byte boundaries.
 */

export class BitReaderOverflowError extends Error {
  constructor(
    public readonly requestedBits: number,
    public readonly remainingBits: number
  ) {
    super(`Cannot read ${requestedBits} bits, only ${remainingBits} remaining`);
    this.name = 'BitReaderOverflowError';
  }
}

export class BitReader {
  private position = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get bitLength(): number {
    return this.bytes.length * 8;
  }

  get remaining(): number {
    return this.bitLength - this.position;
  }

  skip(bits: number): void {
    this.ensureAvailable(bits);
    this.position += bits;
  }

  /**
   * Read an unsigned integer of up to 32 bits
   */
  readUnsigned(bits: number): number {
    if (bits < 1 || bits > 32) {
      throw new RangeError(`Field width must be 1-32 bits, got ${bits}`);
    }
    this.ensureAvailable(bits);

    let value = 0;
    for (let i = 0; i < bits; i++) {
      const byte = this.bytes[this.position >> 3];
      const bit = (byte >> (7 - (this.position & 7))) & 1;
      // Multiply instead of shifting so 32-bit fields stay unsigned
      value = value * 2 + bit;
      this.position++;
    }
    return value;
  }

  /**
   * Read a two's-complement signed integer of up to 32 bits
   */
  readSigned(bits: number): number {
    const raw = this.readUnsigned(bits);
    const signBit = 2 ** (bits - 1);
    return raw >= signBit ? raw - 2 ** bits : raw;
  }

  private ensureAvailable(bits: number): void {
    if (bits > this.remaining) {
      throw new BitReaderOverflowError(bits, this.remaining);
    }
  }
}
