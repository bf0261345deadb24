// src/core/path-set.ts

/**
 * Compare two base-relative POSIX paths segment by segment.
 *
 * Plain string order would put "a-b" before "a/b"; comparing per segment
 * keeps every directory directly followed by its own subtree, which the
 * preview tree and creation order rely on.
 */
export function comparePaths(a: string, b: string): number {
    const as = a.split('/');
    const bs = b.split('/');
    const n = Math.min(as.length, bs.length);

    for (let i = 0; i < n; i++) {
        if (as[i] === bs[i]) continue;
        return as[i] < bs[i] ? -1 : 1;
    }

    return as.length - bs.length;
}

/**
 * Unique set of base-relative POSIX paths that iterates in
 * {@link comparePaths} order regardless of insertion order.
 *
 * The base directory itself is never stored; callers treat "" as the base.
 */
export class PathSet implements Iterable<string> {
    private readonly members = new Set<string>();
    private sorted: string[] | null = null;

    constructor(paths: Iterable<string> = []) {
        for (const p of paths) {
            this.add(p);
        }
    }

    add(relPath: string): this {
        if (!relPath || this.members.has(relPath)) return this;
        this.members.add(relPath);
        this.sorted = null;
        return this;
    }

    has(relPath: string): boolean {
        return this.members.has(relPath);
    }

    get size(): number {
        return this.members.size;
    }

    isEmpty(): boolean {
        return this.members.size === 0;
    }

    toArray(): string[] {
        if (!this.sorted) {
            this.sorted = Array.from(this.members).sort(comparePaths);
        }
        return [...this.sorted];
    }

    [Symbol.iterator](): Iterator<string> {
        return this.toArray()[Symbol.iterator]();
    }
}
