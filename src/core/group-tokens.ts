// src/core/group-tokens.ts

import {GROUP_SEPARATOR, type Group, type Token} from '../schema';

/**
 * Split a flat token list into groups on ":".
 *
 * The separator itself is dropped, and empty groups (from leading, trailing
 * or repeated separators) are never emitted.
 *
 * Example:
 *   ["src", "main.rs", ":", "README.md"]
 *   → [["src", "main.rs"], ["README.md"]]
 */
export function groupTokens(tokens: readonly Token[]): Group[] {
    const groups: Group[] = [];
    let current: Group = [];

    for (const token of tokens) {
        if (token === GROUP_SEPARATOR) {
            if (current.length) {
                groups.push(current);
                current = [];
            }
        } else {
            current.push(token);
        }
    }

    if (current.length) {
        groups.push(current);
    }

    return groups;
}
