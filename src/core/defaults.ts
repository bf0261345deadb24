// src/core/defaults.ts

import type {Token} from '../schema';

interface DefaultStructure {
    aliases: string[];
    tokens: Token[];
}

const DEFAULT_STRUCTURES: DefaultStructure[] = [
    {
        aliases: ['py', 'python'],
        tokens: [
            'src/__init__.py',
            'src/main.py',
            '.gitignore',
            'requirements.txt',
            'README.md',
        ],
    },
    {
        aliases: ['rs', 'rust'],
        tokens: ['src/main.rs', 'Cargo.toml', '.gitignore', 'README.md'],
    },
    {
        aliases: ['web', 'js', 'ts'],
        tokens: [
            'src/index.js',
            'src/style.css',
            'public/index.html',
            '.gitignore',
            'package.json',
            'README.md',
        ],
    },
];

/**
 * Built-in token list for a language id.
 * Unknown ids return an empty list.
 */
export function getDefaultStructure(lang: string): Token[] {
    const match = DEFAULT_STRUCTURES.find((d) => d.aliases.includes(lang));
    return match ? [...match.tokens] : [];
}

export function listDefaultLanguages(): string[] {
    return DEFAULT_STRUCTURES.flatMap((d) => d.aliases);
}
