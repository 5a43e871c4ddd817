import { ConfigurationError, IndexOutOfRangeError, parseCapacity } from "@fixedq/core";

/**
 * Read-only window of `length` elements over a backing array, starting at
 * `offset`. Views never copy: every view over the same storage sees the same
 * elements.
 */
export class ReadonlyArrayView<T> implements Iterable<T> {
  constructor(
    protected readonly data: T[],
    protected readonly offset: number,
    readonly length: number,
  ) {
    if (!Number.isInteger(length) || length <= 0) {
      throw new ConfigurationError(`View length must be a positive integer, got ${length}`);
    }
    if (!Number.isInteger(offset)) {
      throw new IndexOutOfRangeError("View offset must be an integer", offset, data.length);
    }
    if (offset < 0 || offset + length > data.length) {
      throw new IndexOutOfRangeError("View exceeds backing storage", offset + length, data.length);
    }
  }

  /** @throws IndexOutOfRangeError */
  at(index: number): T {
    return this.data[this.position(index)];
  }

  enumerate(fn: (value: T, index: number) => void): void {
    for (let i = 0; i < this.length; i++) {
      fn(this.data[this.offset + i], i);
    }
  }

  /**
   * Calls `fn` on the elements of this view and `other` pairwise.
   * @throws IndexOutOfRangeError when the lengths differ.
   */
  zip<U>(other: ReadonlyArrayView<U>, fn: (value: T, otherValue: U, index: number) => void): void {
    if (other.length !== this.length) {
      throw new IndexOutOfRangeError("Cannot zip views of different lengths", other.length, this.length);
    }
    for (let i = 0; i < this.length; i++) {
      fn(this.data[this.offset + i], other.data[other.offset + i], i);
    }
  }

  /** Read-only view of `[start, end)` of this view. */
  readonlyView(start: number, end: number): ReadonlyArrayView<T> {
    this.checkRange(start, end);
    return new ReadonlyArrayView(this.data, this.offset + start, end - start);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.length; i++) {
      yield this.data[this.offset + i];
    }
  }

  protected position(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new IndexOutOfRangeError("Index out of range", index, this.length);
    }
    return this.offset + index;
  }

  protected checkRange(start: number, end: number): void {
    if (!Number.isInteger(start) || start < 0) {
      throw new IndexOutOfRangeError("View start out of range", start, this.length);
    }
    if (!Number.isInteger(end) || end > this.length) {
      throw new IndexOutOfRangeError("View end out of range", end, this.length);
    }
    if (end <= start) {
      throw new IndexOutOfRangeError("View must contain at least one element", end, this.length);
    }
  }
}

export class ArrayView<T> extends ReadonlyArrayView<T> {
  /** @throws IndexOutOfRangeError */
  set(index: number, value: T): void {
    this.data[this.position(index)] = value;
  }

  /** Writable view of `[start, end)`. Writes are visible through this view. */
  view(start: number, end: number): ArrayView<T> {
    this.checkRange(start, end);
    return new ArrayView(this.data, this.offset + start, end - start);
  }
}

/** Array of fixed length that owns its storage. */
export class FixedArray<T> extends ArrayView<T> {
  private constructor(data: T[]) {
    super(data, 0, data.length);
  }

  /** @throws ConfigurationError when `length` is not a positive integer. */
  static filled<T>(length: number, defaultValue: T): FixedArray<T> {
    const size = parseCapacity(length, "length");
    return new FixedArray(new Array<T>(size).fill(defaultValue));
  }
}
