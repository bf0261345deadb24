// test/apply-paths.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import {afterEach, beforeEach, describe, it, expect} from 'vitest';
import {applyPaths} from '../src/core/apply-paths';
import {Logger} from '../src/util/logger';

const logger = new Logger({level: 'silent'});

let tmp: string;

beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'treegen-apply-'));
});

afterEach(() => {
    fs.rmSync(tmp, {recursive: true, force: true});
});

describe('applyPaths', () => {
    it('creates directories and empty files, dotfiles included', () => {
        const result = applyPaths({
            baseDir: tmp,
            paths: ['.gitignore', 'src', 'src/main.rs'],
            logger,
        });

        expect(result).toEqual({
            created: ['.gitignore', 'src', 'src/main.rs'],
            existing: [],
            failures: [],
        });
        expect(fs.statSync(path.join(tmp, 'src')).isDirectory()).toBe(true);
        expect(fs.readFileSync(path.join(tmp, 'src/main.rs'), 'utf8')).toBe('');
        expect(fs.statSync(path.join(tmp, '.gitignore')).isFile()).toBe(true);
    });

    it('creates missing parents and the base directory itself', () => {
        const base = path.join(tmp, 'out', 'project');

        const result = applyPaths({baseDir: base, paths: ['a/b/c.txt'], logger});

        expect(result.created).toEqual(['a/b/c.txt']);
        expect(fs.existsSync(path.join(base, 'a', 'b', 'c.txt'))).toBe(true);
    });

    it('is idempotent and never overwrites existing files', () => {
        const paths = ['docs', 'docs/guide.md', 'src'];

        applyPaths({baseDir: tmp, paths, logger});
        fs.writeFileSync(path.join(tmp, 'docs/guide.md'), 'keep me', 'utf8');

        const second = applyPaths({baseDir: tmp, paths, logger});

        expect(second).toEqual({created: [], existing: paths, failures: []});
        expect(fs.readFileSync(path.join(tmp, 'docs/guide.md'), 'utf8')).toBe('keep me');
    });

    it('collects per-path failures and keeps going', () => {
        // a file sits where a directory is expected
        fs.writeFileSync(path.join(tmp, 'lib'), 'not a dir', 'utf8');

        const result = applyPaths({
            baseDir: tmp,
            paths: ['README.md', 'lib', 'lib/mod.rs', 'zz.txt'],
            logger,
        });

        expect(result.created).toEqual(['README.md', 'zz.txt']);
        expect(result.existing).toEqual([]);
        expect(result.failures.map((f) => f.path)).toEqual(['lib', 'lib/mod.rs']);
        expect(result.failures[0].error).toBeInstanceOf(Error);
        expect(fs.existsSync(path.join(tmp, 'zz.txt'))).toBe(true);
    });

    it('fails when a directory sits where a file is expected', () => {
        fs.mkdirSync(path.join(tmp, 'notes.md'));

        const result = applyPaths({baseDir: tmp, paths: ['notes.md', 'ok.txt'], logger});

        expect(result.created).toEqual(['ok.txt']);
        expect(result.existing).toEqual([]);
        expect(result.failures.map((f) => f.path)).toEqual(['notes.md']);
        expect(fs.statSync(path.join(tmp, 'notes.md')).isDirectory()).toBe(true);
    });

    it('refuses paths that would leave the base directory', () => {
        const result = applyPaths({baseDir: tmp, paths: ['../outside.txt'], logger});

        expect(result.created).toEqual([]);
        expect(result.failures.map((f) => f.path)).toEqual(['../outside.txt']);
        expect(fs.existsSync(path.join(tmp, '..', 'outside.txt'))).toBe(false);
    });
});
