// src/util/errors.ts

/**
 * - usage: no input source could be resolved
 * - input: a template/structure file or default id could not be used
 * - empty: input parsed fine but produced no paths
 */
export type TreegenErrorKind = 'usage' | 'input' | 'empty';

export class TreegenError extends Error {
   readonly kind: TreegenErrorKind;

   constructor(kind: TreegenErrorKind, message: string, options?: { cause?: unknown }) {
      super(message, options);
      this.name = 'TreegenError';
      this.kind = kind;
   }
}
