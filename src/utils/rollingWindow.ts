// --- Numeric Rolling Window (Ring Buffer) ---

import { CircularBuffer } from "./circularBuffer.js";

/**
 * Bounded window of the most recent numeric samples. Aggregates are computed
 * from the retained samples on each call.
 */
export class RollingWindow implements Iterable<number> {
    private readonly samples: CircularBuffer<number>;

    constructor(size: number) {
        this.samples = new CircularBuffer<number>(size);
    }

    public push(value: number): void {
        if (!Number.isFinite(value)) {
            throw new TypeError(`Non-finite value pushed into window: ${value}`);
        }
        this.samples.push(value);
    }

    public mean(): number {
        const count = this.count();
        return count === 0 ? 0 : this.sum() / count;
    }

    public sum(): number {
        return this.toArray().reduce((acc, v) => acc + v, 0);
    }

    public min(): number | undefined {
        if (this.count() === 0) return undefined;
        return Math.min(...this.toArray());
    }

    public max(): number | undefined {
        if (this.count() === 0) return undefined;
        return Math.max(...this.toArray());
    }

    /**
     * Sample standard deviation (n - 1 denominator). 0 with fewer than 2 samples.
     */
    public sampleStdDev(): number {
        const arr = this.toArray();
        if (arr.length < 2) return 0;
        const mean = this.mean();
        const squared = arr.reduce((acc, v) => acc + (v - mean) ** 2, 0);
        return Math.sqrt(squared / (arr.length - 1));
    }

    public toArray(): number[] {
        return this.samples.toArray();
    }

    public clear(): void {
        this.samples.clear();
    }

    public count(): number {
        return this.samples.length;
    }

    *[Symbol.iterator](): IterableIterator<number> {
        for (const val of this.toArray()) yield val;
    }

    get size(): number {
        return this.samples.capacity;
    }
}
