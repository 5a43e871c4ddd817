import { Duration } from "./Duration";
import { TimeSource, compareMillis, toWholeMillis } from "./TimeSource";

/**
 * A point in time, in milliseconds relative to the origin of the
 * {@link TimeSource} it was read from. Only compare moments from the same
 * source.
 */
export class Moment {
  private constructor(private readonly value: number) {}

  static now(source: TimeSource): Moment {
    return new Moment(toWholeMillis(source()));
  }

  millis(): number {
    return this.value;
  }

  plus(duration: Duration): Moment {
    return new Moment(this.value + duration.millis());
  }

  minus(duration: Duration): Moment {
    return new Moment(this.value - duration.millis());
  }

  /** Time elapsed from `earlier` to this moment. Negative if `earlier` is later. */
  since(earlier: Moment): Duration {
    return Duration.fromMillis(this.value - earlier.value);
  }

  compareTo(other: Moment): -1 | 0 | 1 {
    return compareMillis(this.value, other.value);
  }

  equals(other: Moment): boolean {
    return this.value === other.value;
  }

  isBefore(other: Moment): boolean {
    return this.value < other.value;
  }

  isAfter(other: Moment): boolean {
    return this.value > other.value;
  }

  isAtOrBefore(other: Moment): boolean {
    return this.value <= other.value;
  }

  isAtOrAfter(other: Moment): boolean {
    return this.value >= other.value;
  }
}
