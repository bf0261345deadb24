// src/core/templates.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import {TEMPLATE_EXT, TEMPLATES_SUBDIR} from '../schema';
import {TreegenError} from '../util/errors';
import {defaultLogger} from '../util/logger';

const logger = defaultLogger.child('[templates]');

/**
 * Per-user config home that contains `treegen/templates`.
 *
 * Resolution order:
 *   1. explicit override
 *   2. $TREEGEN_CONFIG_HOME
 *   3. $XDG_CONFIG_HOME
 *   4. ~/.config
 */
export function resolveConfigHome(
    override?: string,
    env: NodeJS.ProcessEnv = process.env,
): string {
    // empty values count as unset
    const home =
        override ||
        env.TREEGEN_CONFIG_HOME ||
        env.XDG_CONFIG_HOME ||
        path.join(os.homedir(), '.config');
    return path.resolve(home);
}

export function getTemplatesDir(configHome?: string): string {
    return path.join(resolveConfigHome(configHome), TEMPLATES_SUBDIR);
}

/**
 * Absolute path of a saved template.
 * Names are plain file names: no separators, not "." or "..".
 */
export function getTemplatePath(name: string, configHome?: string): string {
    if (!name || name === '.' || name === '..' || /[\\/]/.test(name)) {
        throw new TreegenError('input', `Invalid template name "${name}".`);
    }
    return path.join(getTemplatesDir(configHome), `${name}${TEMPLATE_EXT}`);
}

/**
 * Names of all saved templates, sorted. A missing directory lists nothing.
 */
export function listTemplates(configHome?: string): string[] {
    const dir = getTemplatesDir(configHome);

    let dirents: fs.Dirent[];
    try {
        dirents = fs.readdirSync(dir, {withFileTypes: true});
    } catch (err) {
        logger.debug(`No templates directory at ${dir}`, err);
        return [];
    }

    return dirents
        .filter((d) => d.isFile() && d.name.endsWith(TEMPLATE_EXT))
        .map((d) => d.name.slice(0, -TEMPLATE_EXT.length))
        .filter(Boolean)
        .sort();
}
