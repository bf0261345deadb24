// src/schema/options.ts

import type {Token} from './tokens';

/**
 * Where the tokens for a run come from.
 *
 * When several are set, the first one usable in this order wins:
 * template > from > defaultLang > tokens.
 */
export interface InputSourceOptions {
    /**
     * Name of a saved template, looked up as
     * `<configHome>/treegen/templates/<name>.txt`.
     */
    template?: string;

    /**
     * Path to a structure file (one token per line).
     * Relative paths resolve against `cwd`.
     */
    from?: string;

    /**
     * Built-in language default, e.g. "python", "rs", "web".
     */
    defaultLang?: string;

    /**
     * Literal tokens as given on the command line, ":"-separated groups allowed.
     */
    tokens?: Token[];

    /**
     * Directory relative paths resolve against. Default: process.cwd().
     */
    cwd?: string;

    /**
     * Override for the per-user config home (the directory that contains
     * `treegen/templates`). See {@link resolveConfigHome}.
     */
    configHome?: string;
}

/**
 * Which source a run's tokens came from.
 */
export type InputSourceKind = 'template' | 'file' | 'default' | 'tokens';
