// test/logger.spec.ts

import {afterEach, describe, it, expect, vi} from 'vitest';
import {Logger, isLogLevel} from '../src/util/logger';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('Logger', () => {
    it('defaults to info', () => {
        expect(new Logger().getLevel()).toBe('info');
    });

    it('lets children follow later level changes on the parent', () => {
        const root = new Logger({level: 'info', prefix: '[root]'});
        const child = root.child('[child]');

        root.setLevel('debug');
        expect(child.getLevel()).toBe('debug');

        child.setLevel('warn');
        root.setLevel('silent');
        expect(child.getLevel()).toBe('warn');
    });

    it('prefixes messages and routes errors to stderr', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const logger = new Logger({level: 'error', prefix: '[a]'}).child('[b]');

        logger.error(new Error('boom'));

        expect(spy).toHaveBeenCalledWith('[a][b] boom');
    });

    it('drops messages below the current level and everything when silent', () => {
        const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        new Logger({level: 'warn'}).info('hidden');
        new Logger({level: 'silent'}).error('hidden');

        expect(info).not.toHaveBeenCalled();
        expect(error).not.toHaveBeenCalled();
    });
});

describe('isLogLevel', () => {
    it('accepts known levels only', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
        expect(isLogLevel(undefined)).toBe(false);
    });
});
