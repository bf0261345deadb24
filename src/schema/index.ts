// src/schema/index.ts

export * from './tokens';
export * from './options';

/**
 * Subdirectory of the per-user config home that holds saved templates.
 */
export const TEMPLATES_SUBDIR = 'treegen/templates';

/**
 * File extension of saved templates.
 */
export const TEMPLATE_EXT = '.txt';
