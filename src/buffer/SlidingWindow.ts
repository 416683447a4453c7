/**
 * @file Sliding Window
 *
 * Fixed-capacity ring buffer that evicts the oldest entry when full.
 * Eviction follows arrival order only.
 *
 * @module buffer/SlidingWindow
 */

export class SlidingWindow<T> {
    public readonly capacity: number;
    private readonly slots: (T | undefined)[];
    private head: number = 0;
    private count: number = 0;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`SlidingWindow capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
        this.slots = new Array<T | undefined>(capacity);
    }

    /**
     * Append an entry, overwriting the oldest one when full.
     */
    public push(entry: T): void {
        this.slots[this.head] = entry;
        this.head = (this.head + 1) % this.capacity;
        if (this.count < this.capacity) {
            this.count += 1;
        }
    }

    /**
     * Copy of the contents, oldest first.
     */
    public snapshot(): T[] {
        const result: T[] = [];
        const start: number = (this.head - this.count + this.capacity) % this.capacity;
        for (let i = 0; i < this.count; i++) {
            const entry: T | undefined = this.slots[(start + i) % this.capacity];
            if (entry !== undefined) result.push(entry);
        }
        return result;
    }

    public latest(): T | null {
        if (this.count === 0) return null;
        return this.slots[(this.head - 1 + this.capacity) % this.capacity] ?? null;
    }

    public get size(): number {
        return this.count;
    }

    public clear(): void {
        this.slots.fill(undefined);
        this.head = 0;
        this.count = 0;
    }
}
