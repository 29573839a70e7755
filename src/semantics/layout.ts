import type { SymbolNode } from '../frontend/symbols.js';
import { align } from './alignment.js';
import type { LayoutEnv } from './env.js';
import type { SizeAndAlignment } from './sizing.js';
import { getSizeAndAlignment } from './sizing.js';

/**
 * Running state of one storage sequence: a scope's local variables or one COMMON block.
 */
export interface LayoutCursor {
  /** Next free byte. */
  offset: number;
  /** Largest alignment placed so far. */
  alignment: number;
}

export function createCursor(initialAlignment: number): LayoutCursor {
  return { offset: 0, alignment: initialAlignment };
}

/**
 * Place a symbol at the next suitably aligned offset of `cursor`.
 *
 * Only data objects and procedure pointers with nonzero size take storage; anything else is left
 * untouched. Returns the number of padding bytes inserted before the symbol.
 */
export function placeSymbol(
  env: LayoutEnv,
  cursor: LayoutCursor,
  symbol: SymbolNode,
  overrideAlignment?: number,
): number {
  if (symbol.details.kind !== 'Object' && symbol.details.kind !== 'ProcPointer') return 0;
  const s = getSizeAndAlignment(env, symbol, true);
  if (s.size === 0) return 0;

  const previousOffset = cursor.offset;
  const alignment = Math.min(overrideAlignment ?? s.alignment, env.target.maxAlignment);
  cursor.offset = align(cursor.offset, alignment, env.target);
  const padding = cursor.offset - previousOffset;
  symbol.size = s.size;
  symbol.offset = cursor.offset;
  cursor.offset += s.size;
  cursor.alignment = Math.max(cursor.alignment, alignment);
  return padding;
}

/**
 * An EQUIVALENCE block is at least as large as its base symbol.
 */
export function extendBlockBase(symbol: SymbolNode, block: SizeAndAlignment): void {
  if (symbol.size > block.size) {
    block.size = symbol.size;
  }
}
