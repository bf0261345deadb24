// src/core/structure-file.ts

import fs from 'fs';
import type {Token} from '../schema';
import {statSafeSync} from '../util/fs-utils';
import {TreegenError} from '../util/errors';

/**
 * Convert structure/template text into tokens.
 *
 * Rules:
 * - One token per line (a token may be a slash-joined path).
 * - Lines are trimmed; blank lines are ignored.
 * - No comments and no indentation-based nesting.
 */
export function parseStructureLines(text: string): Token[] {
    return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
}

/**
 * Read a structure or template file into tokens.
 *
 * Throws a TreegenError ("input") if the file is missing, is not a regular
 * file, cannot be read, or has no non-blank lines.
 */
export function readStructureFile(filePath: string, label = 'structure file'): Token[] {
    const stats = statSafeSync(filePath);
    if (!stats) {
        throw new TreegenError('input', `${label} not found: ${filePath}`);
    }
    if (!stats.isFile()) {
        throw new TreegenError('input', `${label} is not a file: ${filePath}`);
    }

    let raw: string;
    try {
        raw = fs.readFileSync(filePath, 'utf8');
    } catch (err) {
        throw new TreegenError('input', `Cannot read ${label}: ${filePath}`, {cause: err});
    }

    const tokens = parseStructureLines(raw);
    if (!tokens.length) {
        throw new TreegenError('input', `${label} "${filePath}" is empty.`);
    }

    return tokens;
}
