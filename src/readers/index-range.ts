/**
 * Half-open range of record indexes, `[start, stop)`. Readers take one to
 * say what to fetch and return one to say what was actually populated.
 */
export class IndexRange implements Iterable<number> {
    readonly start: number;
    readonly stop: number;

    constructor(start: number, stop: number) {
        this.start = start;
        // An inverted range is empty
        this.stop = Math.max(start, stop);
    }

    static empty(): IndexRange {
        return new IndexRange(0, 0);
    }

    get length(): number {
        return this.stop - this.start;
    }

    get isEmpty(): boolean {
        return this.length === 0;
    }

    includes(index: number): boolean {
        return index >= this.start && index < this.stop;
    }

    /**
     * Clamp the end of the range to `limit`.
     */
    truncate(limit: number): IndexRange {
        return new IndexRange(this.start, Math.min(this.stop, limit));
    }

    equals(other: IndexRange): boolean {
        if (this.isEmpty && other.isEmpty) return true;
        return this.start === other.start && this.stop === other.stop;
    }

    *[Symbol.iterator](): Iterator<number> {
        for (let i = this.start; i < this.stop; i++) {
            yield i;
        }
    }

    toString(): string {
        return `[${this.start}, ${this.stop})`;
    }
}
