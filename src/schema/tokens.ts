// src/schema/tokens.ts

/**
 * One user-supplied path segment (may contain nested "/") or a control
 * marker ({@link GROUP_SEPARATOR}, {@link ASCEND_TOKEN}).
 */
export type Token = string;

/**
 * An independent chain of tokens sharing one directory cursor.
 */
export type Group = Token[];

/** Ends the current group and starts a new one. */
export const GROUP_SEPARATOR = ':';

/** Moves the cursor one directory up (never above the base). */
export const ASCEND_TOKEN = '..';

/**
 * How a resolved path is treated:
 * - "dir": becomes the cursor, created with mkdir
 * - "file": leaves the cursor alone, created as an empty file
 */
export type PathKind = 'dir' | 'file';
