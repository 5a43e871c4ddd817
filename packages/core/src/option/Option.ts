/**
 * How values are copied into and released from an {@link Option}.
 *
 * `clone` runs once for every value stored, `destroy` once for every stored
 * value that is released without being handed to a caller.
 */
export interface ValueLifecycle<T> {
    clone(value: T): T;
    destroy(value: T): void;
}

/** Stores values as given and releases nothing. */
export function plainLifecycle<T>(): ValueLifecycle<T> {
    return {
        clone: (value) => value,
        destroy: () => {},
    };
}

type Cell<T> = { present: false } | { present: true; value: T };

const EMPTY: Cell<never> = { present: false };

/**
 * Holds zero or one value of `T`.
 *
 * Used as the storage element of {@link BoundedQueue}, so an empty slot does
 * not need a sentinel `T`. The cell holds a live value iff `hasValue()` is
 * true, and every live value is destroyed exactly once unless it is moved out
 * with {@link Option.take}.
 */
export class Option<T> {
    private cell: Cell<T> = EMPTY;

    private constructor(private readonly lifecycle: ValueLifecycle<T>) {}

    static none<T>(lifecycle: ValueLifecycle<T> = plainLifecycle<T>()): Option<T> {
        return new Option(lifecycle);
    }

    static some<T>(value: T, lifecycle: ValueLifecycle<T> = plainLifecycle<T>()): Option<T> {
        const option = new Option(lifecycle);
        option.cell = { present: true, value: lifecycle.clone(value) };
        return option;
    }

    /** A new slot with the same presence and, if present, a clone of the value. */
    copy(): Option<T> {
        const copy = new Option(this.lifecycle);
        copy.assign(this);
        return copy;
    }

    /**
     * Replaces this slot's state with `other`'s. A held value is destroyed
     * first. Assigning a slot to itself changes nothing.
     */
    assign(other: Option<T>): this {
        if (other === this) return this;

        this.release();
        if (other.cell.present) {
            this.cell = { present: true, value: this.lifecycle.clone(other.cell.value) };
        }
        return this;
    }

    /** Replaces the held value, if any, with a clone of `value`. */
    set(value: T): this {
        this.release();
        this.cell = { present: true, value: this.lifecycle.clone(value) };
        return this;
    }

    /** Destroys the held value, if any. The slot is absent afterwards. */
    dispose(): void {
        this.release();
    }

    hasValue(): boolean {
        return this.cell.present;
    }

    valueOr(fallback: T): T {
        return this.cell.present ? this.cell.value : fallback;
    }

    /**
     * Returns the held value. When the slot is absent, stores a clone of
     * `fallback` first, so the slot is present afterwards.
     */
    valueOrAssign(fallback: T): T {
        if (!this.cell.present) {
            this.set(fallback);
        }
        return this.valueOr(fallback);
    }

    /**
     * Moves the value out into a new slot and leaves this one absent. The
     * value is not destroyed; the returned slot owns it.
     */
    take(): Option<T> {
        const taken = new Option(this.lifecycle);
        taken.cell = this.cell;
        this.cell = EMPTY;
        return taken;
    }

    ifPresent(fn: (value: T) => void): void {
        if (this.cell.present) fn(this.cell.value);
    }

    private release(): void {
        const cell = this.cell;
        this.cell = EMPTY;
        if (cell.present) this.lifecycle.destroy(cell.value);
    }
}
