// src/core/runner.ts

import path from 'path';
import type {InputSourceOptions} from '../schema';
import {TreegenError} from '../util/errors';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';
import {applyPaths, type ApplyResult} from './apply-paths';
import {collectPaths} from './collect-paths';
import {renderTree} from './preview';
import {resolveInput} from './resolve-input';

export const CONFIRM_QUESTION = 'Would you like to create this structure? (y/n): ';

export interface RunOptions extends InputSourceOptions {
    /**
     * Base output directory (absolute or relative to `cwd`). Default: ".".
     */
    output?: string;

    /**
     * Preview the tree and ask for confirmation before creating anything.
     */
    dry?: boolean;

    /**
     * Confirmation callback used in dry mode. Resolve true to proceed.
     * If omitted, dry runs never create anything.
     */
    confirm?: (question: string) => Promise<boolean>;

    /**
     * Sink for preview output. Default: process.stdout.
     */
    write?: (text: string) => void;

    /**
     * Optional logger override.
     */
    logger?: Logger;
}

export type RunResult =
    | {status: 'declined'; baseDir: string; paths: string[]}
    | {status: 'created'; baseDir: string; paths: string[]; result: ApplyResult};

/**
 * Resolve input, collect paths, optionally preview + confirm, then create.
 *
 * Throws TreegenError for usage/input problems and when no paths result.
 * Per-path creation failures are reported in `result.failures` instead.
 */
export async function runOnce(options: RunOptions = {}): Promise<RunResult> {
    const logger = options.logger ?? defaultLogger.child('[runner]');
    const write = options.write ?? ((text: string) => process.stdout.write(text));
    const cwd = path.resolve(options.cwd ?? process.cwd());
    const baseDir = path.resolve(cwd, options.output ?? '.');

    const {source, groups} = resolveInput({...options, cwd});
    logger.debug(`input source: ${source} (${groups.length} group(s))`);

    const paths = collectPaths(groups).toArray();
    if (!paths.length) {
        throw new TreegenError('empty', 'No valid paths to generate.');
    }

    if (options.dry) {
        write('\nProject structure preview:\n\n');
        write(renderTree(paths).join('\n') + '\n');
        write('\n(No files created yet)\n\n');

        const confirmed = options.confirm
            ? await options.confirm(CONFIRM_QUESTION)
            : false;

        if (!confirmed) {
            logger.warn('Structure not created.');
            return {status: 'declined', baseDir, paths};
        }

        write('Proceeding to create directories and files...\n\n');
    }

    const result = applyPaths({baseDir, paths, logger: logger.child('[apply]')});

    if (result.failures.length) {
        logger.warn(
            `Structure created with ${result.failures.length} failure(s) ` +
            `(${result.created.length} created, ${result.existing.length} already existed).`,
        );
    } else {
        logger.info(
            `Structure created successfully!! ` +
            `(${result.created.length} created, ${result.existing.length} already existed)`,
        );
    }

    return {status: 'created', baseDir, paths, result};
}
