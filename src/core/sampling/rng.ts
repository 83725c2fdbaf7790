/**
 * xorshift32 RNG with uint32 state.
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 */
export class XorShift32 {
  private x: number;

  constructor(seed: number) {
    const state = (seed >>> 0) ^ 0x811c9dc5;
    // An all-zero state would stay zero forever.
    this.x = state === 0 ? 0x9e3779b9 : state >>> 0;
  }

  /** Returns the next uint32 value. */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a deterministic float in [0, 1). */
  nextFloat01(): number {
    return (this.next() >>> 0) / 0x100000000;
  }

  /** Integer in `[min, max]`. */
  nextInt(min: number, max: number): number {
    return min + Math.floor(this.nextFloat01() * (max - min + 1));
  }

  /** Uniform `bits`-bit unsigned value. */
  nextBits(bits: number): bigint {
    let value = 0n;
    for (let filled = 0; filled < bits; filled += 32) {
      value = (value << 32n) | BigInt(this.next());
    }
    return value & ((1n << BigInt(bits)) - 1n);
  }
}
