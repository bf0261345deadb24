// src/core/resolve-input.ts

import path from 'path';
import type {Group, InputSourceKind, InputSourceOptions} from '../schema';
import {TreegenError} from '../util/errors';
import {defaultLogger} from '../util/logger';
import {getDefaultStructure, listDefaultLanguages} from './defaults';
import {groupTokens} from './group-tokens';
import {readStructureFile} from './structure-file';
import {getTemplatePath} from './templates';

const logger = defaultLogger.child('[input]');

export interface ResolvedInput {
    source: InputSourceKind;
    groups: Group[];
}

/**
 * Pick exactly one input source and turn it into token groups.
 *
 * Priority: template > from > defaultLang > tokens.
 *
 * A source counts as given even when empty (e.g. `template: ""`), so it
 * fails instead of falling through to the next one.
 *
 * Lines of template and structure files form a single group; only literal
 * tokens go through the ":" grouper.
 */
export function resolveInput(options: InputSourceOptions): ResolvedInput {
    const cwd = path.resolve(options.cwd ?? process.cwd());

    if (options.template !== undefined) {
        const templatePath = getTemplatePath(options.template, options.configHome);
        logger.debug(`Reading template "${options.template}" from ${templatePath}`);
        const tokens = readStructureFile(templatePath, 'template');
        return {source: 'template', groups: [tokens]};
    }

    if (options.from !== undefined) {
        const filePath = path.resolve(cwd, options.from);
        logger.debug(`Reading structure file ${filePath}`);
        const tokens = readStructureFile(filePath, 'structure file');
        return {source: 'file', groups: [tokens]};
    }

    if (options.defaultLang !== undefined) {
        const tokens = getDefaultStructure(options.defaultLang);
        if (!tokens.length) {
            throw new TreegenError(
                'input',
                `unknown default template '${options.defaultLang}' ` +
                `(available: ${listDefaultLanguages().join(', ')})`,
            );
        }
        logger.debug(`Using built-in default "${options.defaultLang}"`);
        return {source: 'default', groups: [tokens]};
    }

    if (options.tokens && options.tokens.length) {
        return {source: 'tokens', groups: groupTokens(options.tokens)};
    }

    throw new TreegenError(
        'usage',
        'No input provided. Use arguments, --from, --template, or --default.',
    );
}
