// src/core/preview.ts

import path from 'path';
import {color, supportsColor} from '../util/logger';
import {isDirectoryLike} from './collect-paths';

export const PREVIEW_HEADER = '📦 Project Structure:';

const DIR_ICON = '📁';
const DEFAULT_FILE_ICON = '📄';

const FILE_ICONS: Record<string, string> = {
    '.rs': '🦀',
    '.py': '🐍',
    '.js': '🧩',
    '.ts': '🧩',
    '.toml': '📝',
    '.md': '📘',
    '.html': '🌐',
    '.css': '🎨',
};

export interface RenderTreeOptions {
    /**
     * Apply ANSI colors. Defaults to whether stdout supports them.
     */
    colorize?: boolean;
}

export function iconFor(relPath: string): string {
    if (isDirectoryLike(relPath)) return DIR_ICON;
    const ext = path.posix.extname(relPath);
    return FILE_ICONS[ext] ?? DEFAULT_FILE_ICON;
}

/**
 * Render base-relative paths (already in tree order) as indented lines.
 *
 * Depth is the number of segments; each level below the first adds two
 * spaces. The header line comes first.
 */
export function renderTree(
    paths: Iterable<string>,
    options: RenderTreeOptions = {},
): string[] {
    const colorize = options.colorize ?? supportsColor;

    const lines = [color.bold(color.cyan(PREVIEW_HEADER, colorize), colorize)];

    for (const relPath of paths) {
        const segments = relPath.split('/');
        const name = segments[segments.length - 1];
        const indent = '  '.repeat(segments.length - 1);

        const label = isDirectoryLike(relPath)
            ? color.bold(color.blue(name, colorize), colorize)
            : color.green(name, colorize);

        lines.push(`${indent}${iconFor(relPath)} ${label}`);
    }

    return lines;
}
