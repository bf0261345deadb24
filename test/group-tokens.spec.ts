// test/group-tokens.spec.ts

import {describe, it, expect} from 'vitest';
import {groupTokens} from '../src/core/group-tokens';

describe('groupTokens', () => {
    it('splits on ":" and drops the separator', () => {
        const groups = groupTokens(['src', 'main.rs', ':', 'README.md']);

        expect(groups).toEqual([['src', 'main.rs'], ['README.md']]);
    });

    it('never emits empty groups for leading, trailing or repeated separators', () => {
        const groups = groupTokens([':', 'a', ':', ':', 'b', 'c.txt', ':']);

        expect(groups).toEqual([['a'], ['b', 'c.txt']]);
        expect(groups.every((g) => g.length > 0)).toBe(true);
    });

    it('returns no groups for empty input or separators only', () => {
        expect(groupTokens([])).toEqual([]);
        expect(groupTokens([':', ':'])).toEqual([]);
    });

    it('keeps every non-separator token in order', () => {
        const tokens = ['x', ':', 'y', '..', 'z.md', ':', 'w/v.ts'];

        const flattened = groupTokens(tokens).flat();

        expect(flattened).toEqual(tokens.filter((t) => t !== ':'));
    });

    it('only treats a bare ":" as a separator', () => {
        expect(groupTokens(['a:b', '::'])).toEqual([['a:b', '::']]);
    });
});
