// test/prompt.spec.ts

import {PassThrough} from 'stream';
import {describe, it, expect} from 'vitest';
import {askYesNo, isAffirmative} from '../src/cli/prompt';

describe('isAffirmative', () => {
    it('accepts y and yes in any case', () => {
        expect(isAffirmative('y')).toBe(true);
        expect(isAffirmative('  YES \n')).toBe(true);
        expect(isAffirmative('Y')).toBe(true);
    });

    it('rejects everything else', () => {
        expect(isAffirmative('n')).toBe(false);
        expect(isAffirmative('')).toBe(false);
        expect(isAffirmative('yep')).toBe(false);
    });
});

describe('askYesNo', () => {
    it('resolves from a single line of input', async () => {
        const input = new PassThrough();
        const output = new PassThrough();

        const answer = askYesNo('Create? ', input, output);
        input.write('yes\n');

        await expect(answer).resolves.toBe(true);
    });

    it('treats end of input as no', async () => {
        const input = new PassThrough();
        const output = new PassThrough();

        const answer = askYesNo('Create? ', input, output);
        input.end();

        await expect(answer).resolves.toBe(false);
    });
});
