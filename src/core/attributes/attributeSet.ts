import {
  IndexOutOfRangeError,
  InvalidLengthError,
  LengthMismatchError,
  ValueOutOfRangeError,
} from '../errors.js';

/**
 * An immutable subset of a relation's attributes, stored as an `length`-bit
 * vector. Bit `i` stands for the attribute at position `i` of the universe.
 *
 * Every operation returns a new set. Sets taking part in a binary operation
 * must share the same `length`.
 */
export class AttributeSet {
  readonly length: number;
  readonly value: bigint;

  constructor(length: number, value: bigint | number = 0n) {
    if (!Number.isInteger(length) || length < 0) {
      throw new InvalidLengthError(length);
    }
    const bits = BigInt(value);
    if (bits < 0n || bits > mask(length)) {
      throw new ValueOutOfRangeError(bits, length);
    }
    this.length = length;
    this.value = bits;
  }

  static empty(length: number): AttributeSet {
    return new AttributeSet(length, 0n);
  }

  static full(length: number): AttributeSet {
    return new AttributeSet(length, mask(length));
  }

  /** Build a set from bit positions. */
  static of(length: number, positions: readonly number[]): AttributeSet {
    let set = AttributeSet.empty(length);
    for (const position of positions) {
      set = set.set(position, true);
    }
    return set;
  }

  and(other: AttributeSet): AttributeSet {
    this.assertSameLength(other);
    return new AttributeSet(this.length, this.value & other.value);
  }

  or(other: AttributeSet): AttributeSet {
    this.assertSameLength(other);
    return new AttributeSet(this.length, this.value | other.value);
  }

  xor(other: AttributeSet): AttributeSet {
    this.assertSameLength(other);
    return new AttributeSet(this.length, this.value ^ other.value);
  }

  /** Attributes of this set that are not in `other`. */
  difference(other: AttributeSet): AttributeSet {
    this.assertSameLength(other);
    return new AttributeSet(this.length, this.value & ~other.value & mask(this.length));
  }

  complement(): AttributeSet {
    return new AttributeSet(this.length, ~this.value & mask(this.length));
  }

  isSubsetOf(other: AttributeSet): boolean {
    this.assertSameLength(other);
    return (this.value & other.value) === this.value;
  }

  isProperSubsetOf(other: AttributeSet): boolean {
    return this.isSubsetOf(other) && this.value !== other.value;
  }

  popCount(): number {
    let count = 0;
    let rest = this.value;
    while (rest !== 0n) {
      rest &= rest - 1n;
      count++;
    }
    return count;
  }

  ones(): AttributeSet {
    return AttributeSet.full(this.length);
  }

  zeroes(): AttributeSet {
    return AttributeSet.empty(this.length);
  }

  isFull(): boolean {
    return this.value === mask(this.length);
  }

  isEmpty(): boolean {
    return this.value === 0n;
  }

  get(position: number): boolean {
    this.assertPosition(position);
    return ((this.value >> BigInt(position)) & 1n) === 1n;
  }

  set(position: number, bit: boolean): AttributeSet {
    this.assertPosition(position);
    const flag = 1n << BigInt(position);
    return new AttributeSet(this.length, bit ? this.value | flag : this.value & ~flag);
  }

  flip(position: number): AttributeSet {
    this.assertPosition(position);
    return new AttributeSet(this.length, this.value ^ (1n << BigInt(position)));
  }

  /** Set bit positions in ascending order. */
  indices(): number[] {
    const positions: number[] = [];
    for (let i = 0; i < this.length; i++) {
      if (((this.value >> BigInt(i)) & 1n) === 1n) {
        positions.push(i);
      }
    }
    return positions;
  }

  equals(other: AttributeSet): boolean {
    return this.length === other.length && this.value === other.value;
  }

  /** Order by integer value. */
  compare(other: AttributeSet): number {
    this.assertSameLength(other);
    if (this.value < other.value) return -1;
    if (this.value > other.value) return 1;
    return 0;
  }

  key(): string {
    return this.value.toString();
  }

  /** Binary form, most significant bit first (`{A,B}` over 5 attributes is `00011`). */
  toString(): string {
    if (this.length === 0) return '';
    return this.value.toString(2).padStart(this.length, '0');
  }

  private assertSameLength(other: AttributeSet): void {
    if (other.length !== this.length) {
      throw new LengthMismatchError(this.length, other.length);
    }
  }

  private assertPosition(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position >= this.length) {
      throw new IndexOutOfRangeError(position, this.length);
    }
  }
}

function mask(length: number): bigint {
  return (1n << BigInt(length)) - 1n;
}
