// src/core/collect-paths.ts

import path from 'path';
import {ASCEND_TOKEN, type Group, type PathKind, type Token} from '../schema';
import {toPosixPath} from '../util/fs-utils';
import {PathSet} from './path-set';

/**
 * Last segment of a POSIX path ("" for the base).
 */
function baseName(relPath: string): string {
    const idx = relPath.lastIndexOf('/');
    return idx === -1 ? relPath : relPath.slice(idx + 1);
}

/**
 * Classify a path by its final segment only.
 *
 * Directory-like: no extension and not a dotfile ("src", "bin").
 * File-like: everything else ("main.rs", ".gitignore", "v1.2").
 *
 * This is a naming heuristic, so an extensionless file such as "Makefile"
 * is treated as a directory.
 */
export function classifyPath(relPath: string): PathKind {
    const name = baseName(toPosixPath(relPath));
    if (name.startsWith('.')) return 'file';
    return path.posix.extname(name) === '' ? 'dir' : 'file';
}

export function isDirectoryLike(relPath: string): boolean {
    return classifyPath(relPath) === 'dir';
}

/**
 * Resolve a token against the cursor, as a list of segments.
 *
 * "." and empty segments are dropped, ".." pops (clamped at the base) and a
 * leading "/" is relative to the base, so the result never leaves the base.
 */
function resolveToken(cursor: readonly string[], token: Token): string[] {
    const out = [...cursor];

    for (const segment of toPosixPath(token).split('/')) {
        if (segment === '' || segment === '.') continue;
        if (segment === ASCEND_TOKEN) {
            out.pop();
            continue;
        }
        out.push(segment);
    }

    return out;
}

/**
 * Turn groups of tokens into an ancestor-closed set of base-relative paths.
 *
 * Each group starts at the base. For every token:
 * - ".." moves the cursor up one level (no-op at the base)
 * - anything else is resolved against the cursor; the result and all of its
 *   ancestors are added, and a directory-like result becomes the new cursor
 *
 * Example:
 *   [["src", "main.rs"], ["README.md"]] → README.md, src, src/main.rs
 *
 * Pass `into` to accumulate several calls into one set.
 */
export function collectPaths(
    groups: readonly Group[],
    into: PathSet = new PathSet(),
): PathSet {
    for (const group of groups) {
        let cursor: string[] = [];

        for (const token of group) {
            if (token === ASCEND_TOKEN) {
                cursor = cursor.slice(0, -1);
                continue;
            }

            const segments = resolveToken(cursor, token);
            if (!segments.length) continue;

            for (let i = 1; i <= segments.length; i++) {
                into.add(segments.slice(0, i).join('/'));
            }

            const resolved = segments.join('/');
            if (isDirectoryLike(resolved)) {
                cursor = segments;
            }
        }
    }

    return into;
}
