// src/core/apply-paths.ts

import fs from "fs";
import path from "path";
import {
  ensureDirSync,
  ensureFileSync,
  resolveUnderBase,
} from "../util/fs-utils";
import type { Logger } from "../util/logger";
import { defaultLogger } from "../util/logger";
import { isDirectoryLike } from "./collect-paths";

export interface PathFailure {
  /** Base-relative POSIX path that could not be created. */
  path: string;
  error: unknown;
}

export interface ApplyResult {
  created: string[];
  /** Paths that were already on disk and left untouched. */
  existing: string[];
  failures: PathFailure[];
}

export interface ApplyOptions {
  /**
   * Directory the paths are relative to (absolute or relative to CWD).
   * Created if missing.
   */
  baseDir: string;

  /**
   * Base-relative POSIX paths, in creation order.
   */
  paths: Iterable<string>;

  /**
   * Optional logger; defaults to defaultLogger.child('[apply]').
   */
  logger?: Logger;
}

/**
 * Create every path under baseDir, best effort.
 *
 * Directory-like paths are created with mkdir -p, file-like paths as empty
 * files. Existing files are never overwritten. A failure on one path is
 * logged and collected; the remaining paths are still processed.
 */
export function applyPaths(opts: ApplyOptions): ApplyResult {
  const logger = opts.logger ?? defaultLogger.child("[apply]");
  const baseDirAbs = path.resolve(opts.baseDir);

  const result: ApplyResult = { created: [], existing: [], failures: [] };

  try {
    if (ensureDirSync(baseDirAbs)) {
      logger.debug(`created base directory ${baseDirAbs}`);
    }
  } catch (err) {
    logger.error(`failed to create base directory ${baseDirAbs}`, err);
    for (const relPath of opts.paths) {
      result.failures.push({ path: relPath, error: err });
    }
    return result;
  }

  for (const relPath of opts.paths) {
    try {
      const abs = resolveUnderBase(baseDirAbs, relPath);
      ensureDirSync(path.dirname(abs));

      let created: boolean;
      if (isDirectoryLike(relPath)) {
        created = ensureDirSync(abs);
        if (!created && !fs.statSync(abs).isDirectory()) {
          throw new Error(`"${relPath}" exists and is not a directory`);
        }
      } else {
        created = ensureFileSync(abs);
        if (!created && !fs.statSync(abs).isFile()) {
          throw new Error(`"${relPath}" exists and is not a file`);
        }
      }

      if (created) {
        result.created.push(relPath);
        logger.debug(`created ${relPath}`);
      } else {
        result.existing.push(relPath);
        logger.debug(`exists ${relPath}`);
      }
    } catch (err) {
      result.failures.push({ path: relPath, error: err });
      logger.error(`failed to create ${relPath}`, err);
    }
  }

  return result;
}
