// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns true if it had to be created.
 */
export function ensureDirSync(dirPath: string): boolean {
   if (fs.existsSync(dirPath)) {
      return false;
   }
   fs.mkdirSync(dirPath, { recursive: true });
   return true;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
   return err instanceof Error && 'code' in err;
}

/**
 * Create an empty file unless something already exists at that path.
 * Parent directories must already exist. Returns true if it was created.
 *
 * Uses the exclusive "wx" flag, so an existing file is never truncated.
 */
export function ensureFileSync(filePath: string): boolean {
   try {
      fs.writeFileSync(filePath, '', { encoding: 'utf8', flag: 'wx' });
      return true;
   } catch (err) {
      if (isErrnoException(err) && err.code === 'EEXIST') {
         return false;
      }
      throw err;
   }
}

/**
 * Get file stats if they exist, otherwise null.
 */
export function statSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.statSync(targetPath);
   } catch {
      return null;
   }
}

/**
 * Resolve an absolute path from baseDir + relative path,
 * and assert it stays within the base directory.
 *
 * Throws if the resolved path escapes the base directory.
 */
export function resolveUnderBase(baseDir: string, relPath: string): string {
   const absRoot = path.resolve(baseDir);
   const absTarget = path.resolve(absRoot, relPath);

   const rootWithSep = absRoot.endsWith(path.sep) ? absRoot : absRoot + path.sep;
   if (!absTarget.startsWith(rootWithSep) && absTarget !== absRoot) {
      throw new Error(
         `Attempted to resolve path outside base directory: ` +
         `base="${absRoot}", target="${absTarget}"`,
      );
   }

   return absTarget;
}
