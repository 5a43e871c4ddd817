import { compareMillis, toWholeMillis } from "./TimeSource";

/**
 * A span of time in whole milliseconds. May be negative.
 *
 * Immutable: arithmetic returns a new Duration.
 */
export class Duration {
  private constructor(private readonly value: number) {}

  static readonly ZERO = new Duration(0);

  static fromMillis(ms: number): Duration {
    return new Duration(toWholeMillis(ms));
  }

  /** Truncates toward zero to whole milliseconds. */
  static fromSeconds(seconds: number): Duration {
    return new Duration(toWholeMillis(seconds * 1000));
  }

  millis(): number {
    return this.value;
  }

  seconds(): number {
    return this.value / 1000;
  }

  plus(other: Duration): Duration {
    return new Duration(this.value + other.value);
  }

  minus(other: Duration): Duration {
    return new Duration(this.value - other.value);
  }

  times(coefficient: number): Duration {
    return new Duration(toWholeMillis(this.value * coefficient));
  }

  compareTo(other: Duration): -1 | 0 | 1 {
    return compareMillis(this.value, other.value);
  }

  equals(other: Duration): boolean {
    return this.value === other.value;
  }

  isLessThan(other: Duration): boolean {
    return this.value < other.value;
  }

  isGreaterThan(other: Duration): boolean {
    return this.value > other.value;
  }

  isAtMost(other: Duration): boolean {
    return this.value <= other.value;
  }

  isAtLeast(other: Duration): boolean {
    return this.value >= other.value;
  }

  toString(): string {
    return `${this.value}ms`;
  }
}
