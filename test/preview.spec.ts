// test/preview.spec.ts

import {describe, it, expect} from 'vitest';
import {iconFor, renderTree, PREVIEW_HEADER} from '../src/core/preview';
import {collectPaths} from '../src/core/collect-paths';
import {getDefaultStructure} from '../src/core/defaults';

describe('renderTree', () => {
    it('renders an indented tree with icons', () => {
        const lines = renderTree(['README.md', 'src', 'src/main.rs'], {colorize: false});

        expect(lines).toEqual([
            '📦 Project Structure:',
            '📘 README.md',
            '📁 src',
            '  🦀 main.rs',
        ]);
    });

    it('renders the web default in tree order', () => {
        const paths = collectPaths([getDefaultStructure('web')]);

        expect(renderTree(paths, {colorize: false})).toEqual([
            PREVIEW_HEADER,
            '📄 .gitignore',
            '📘 README.md',
            '📄 package.json',
            '📁 public',
            '  🌐 index.html',
            '📁 src',
            '  🧩 index.js',
            '  🎨 style.css',
        ]);
    });

    it('indents two spaces per level', () => {
        const lines = renderTree(['a', 'a/b', 'a/b/c.toml'], {colorize: false});

        expect(lines.slice(1)).toEqual(['📁 a', '  📁 b', '    📝 c.toml']);
    });

    it('colors names when asked to, even without a color terminal', () => {
        const lines = renderTree(['src', 'src/a.md'], {colorize: true});

        expect(lines[1]).toBe('📁 \u001b[1m\u001b[34msrc\u001b[0m\u001b[0m');
        expect(lines[2]).toBe('  📘 \u001b[32ma.md\u001b[0m');
    });

    it('renders only the header for an empty set', () => {
        expect(renderTree([], {colorize: false})).toEqual([PREVIEW_HEADER]);
    });
});

describe('iconFor', () => {
    it('picks icons by extension and falls back to a plain file icon', () => {
        expect(iconFor('lib/app.py')).toBe('🐍');
        expect(iconFor('index.ts')).toBe('🧩');
        expect(iconFor('data.json')).toBe('📄');
        expect(iconFor('.env')).toBe('📄');
        expect(iconFor('docs')).toBe('📁');
    });
});
