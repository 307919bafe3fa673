/**
 * Fixed-capacity ring buffer with O(1) push/shift.
 * When full, push overwrites the oldest entry and reports it as dropped.
 */
export class CircularBuffer<T> {
    private buffer: Array<T | undefined>;
    private head: number = 0;
    private tail: number = 0;
    private count: number = 0;
    private dropped: number = 0;
    readonly capacity: number;

    constructor(capacity: number = 256) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`CircularBuffer capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
        this.buffer = new Array<T | undefined>(capacity);
    }

    /**
     * Add value - O(1), never blocks.
     * @returns the evicted oldest value when the buffer was full, otherwise undefined
     */
    push(value: T): T | undefined {
        let evicted: T | undefined;

        if (this.count === this.capacity) {
            // Buffer full - overwrite oldest data (still O(1))
            evicted = this.buffer[this.tail];
            this.tail = (this.tail + 1) % this.capacity;
            this.count--;
            this.dropped++;
        }

        this.buffer[this.head] = value;
        this.head = (this.head + 1) % this.capacity;
        this.count++;

        return evicted;
    }

    /**
     * Remove and return the oldest value - O(1)
     */
    shift(): T | undefined {
        if (this.count === 0) return undefined;

        const value = this.buffer[this.tail];
        this.buffer[this.tail] = undefined;
        this.tail = (this.tail + 1) % this.capacity;
        this.count--;
        return value;
    }

    /**
     * All values in chronological order
     */
    toArray(): T[] {
        const values: T[] = [];
        for (let i = 0; i < this.count; i++) {
            const value = this.buffer[(this.tail + i) % this.capacity];
            if (value !== undefined) values.push(value);
        }
        return values;
    }

    /**
     * Remove and return up to `max` oldest values
     */
    drain(max: number = this.count): T[] {
        const values: T[] = [];
        while (values.length < max) {
            const value = this.shift();
            if (value === undefined) break;
            values.push(value);
        }
        return values;
    }

    size(): number {
        return this.count;
    }

    isEmpty(): boolean {
        return this.count === 0;
    }

    isFull(): boolean {
        return this.count === this.capacity;
    }

    /**
     * Number of values overwritten since construction
     */
    getDroppedCount(): number {
        return this.dropped;
    }

    clear(): void {
        this.buffer = new Array<T | undefined>(this.capacity);
        this.head = 0;
        this.tail = 0;
        this.count = 0;
    }
}
