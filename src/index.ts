// src/index.ts

export * from './schema';
export {groupTokens} from './core/group-tokens';
export {PathSet, comparePaths} from './core/path-set';
export {collectPaths, classifyPath, isDirectoryLike} from './core/collect-paths';
export {getDefaultStructure, listDefaultLanguages} from './core/defaults';
export {parseStructureLines, readStructureFile} from './core/structure-file';
export {
    resolveConfigHome,
    getTemplatesDir,
    getTemplatePath,
    listTemplates,
} from './core/templates';
export {resolveInput, type ResolvedInput} from './core/resolve-input';
export {renderTree, iconFor, PREVIEW_HEADER, type RenderTreeOptions} from './core/preview';
export {
    applyPaths,
    type ApplyOptions,
    type ApplyResult,
    type PathFailure,
} from './core/apply-paths';
export {runOnce, CONFIRM_QUESTION, type RunOptions, type RunResult} from './core/runner';
export {TreegenError, type TreegenErrorKind} from './util/errors';
export {Logger, defaultLogger, type LogLevel, type LoggerOptions} from './util/logger';
