/**
 * Fixed-capacity circular buffer. Pushing into a full buffer overwrites the
 * oldest element and hands it back to the caller.
 */
export class CircularBuffer<T> implements Iterable<T> {
    private buffer: (T | undefined)[];
    private head = 0;
    private size = 0;

    constructor(private readonly _capacity: number) {
        if (!Number.isInteger(_capacity) || _capacity < 1) {
            throw new RangeError(
                `CircularBuffer capacity must be a positive integer, got ${_capacity}`
            );
        }
        this.buffer = new Array<T | undefined>(_capacity);
    }

    /**
     * Append an item. Returns the evicted oldest item when the buffer was full.
     */
    push(item: T): T | undefined {
        let evicted: T | undefined;
        if (this.size === this._capacity) {
            evicted = this.shift();
        }
        const tail = (this.head + this.size) % this._capacity;
        this.buffer[tail] = item;
        this.size++;
        return evicted;
    }

    /**
     * Remove and return the oldest item.
     */
    shift(): T | undefined {
        if (this.size === 0) return undefined;
        const item = this.buffer[this.head];
        this.buffer[this.head] = undefined;
        this.head = (this.head + 1) % this._capacity;
        this.size--;
        return item;
    }

    /**
     * Random-access by relative index (0 = oldest, length-1 = newest).
     */
    at(index: number): T | undefined {
        if (index < 0 || index >= this.size) return undefined;
        return this.buffer[(this.head + index) % this._capacity];
    }

    toArray(): T[] {
        const result: T[] = [];
        for (let i = 0; i < this.size; i++) {
            const item = this.buffer[(this.head + i) % this._capacity];
            if (item !== undefined) result.push(item);
        }
        return result;
    }

    /**
     * The newest `count` items, oldest first.
     */
    tail(count: number): T[] {
        const all = this.toArray();
        return count >= all.length ? all : all.slice(all.length - count);
    }

    clear(): void {
        this.buffer = new Array<T | undefined>(this._capacity);
        this.head = 0;
        this.size = 0;
    }

    get length(): number {
        return this.size;
    }

    get capacity(): number {
        return this._capacity;
    }

    [Symbol.iterator](): Iterator<T> {
        return this.toArray()[Symbol.iterator]();
    }
}
