import type { Program, Scope, SymbolNode } from '../frontend/symbols.js';
import { commonBlocksByName, symbolAt } from '../frontend/symbols.js';
import { align } from './alignment.js';
import { layoutCommonBlock } from './common.js';
import type { LayoutEnv } from './env.js';
import { resolveEquivalenceSets } from './equivalence.js';
import { createCursor, extendBlockBase, placeSymbol } from './layout.js';

function overrideAlignment(env: LayoutEnv, symbol: SymbolNode, scope: Scope): number | undefined {
  const result = env.alignmentPolicy.overrideFor(symbol, scope, env);
  return result.kind === 'override' ? result.alignment : undefined;
}

/**
 * Assign offsets, sizes and alignments to the storage of `scope` and every scope nested in it.
 *
 * Nested scopes are laid out first. A scope is processed at most once: one that is in progress or
 * done is left alone, which also stops recursion through erroneous scope graphs. Derived types with
 * KIND parameters are skipped; only their instantiations are laid out.
 */
export function computeOffsets(scope: Scope, env: LayoutEnv): void {
  for (const child of scope.children) {
    computeOffsets(child, env);
  }
  if (scope.kindParameterized) return;
  if (scope.status !== 'unprocessed') return;
  scope.status = 'in-progress';

  const eq = resolveEquivalenceSets(env, scope);
  const cursor = createCursor(1);

  // Bases of EQUIVALENCE blocks outside COMMON, each followed by the extent of its block.
  for (const [baseId, block] of eq.blocks) {
    const base = symbolAt(env.table, baseId);
    if (base.commonBlock !== undefined) continue;
    placeSymbol(env, cursor, base);
    extendBlockBase(base, block);
    cursor.offset = Math.max(cursor.offset, base.offset + block.size);
  }

  for (const id of scope.symbols) {
    const symbol = symbolAt(env.table, id);
    if (symbol.commonBlock !== undefined || eq.dependents.has(id) || eq.blocks.has(id)) continue;
    placeSymbol(env, cursor, symbol, overrideAlignment(env, symbol, scope));
    if (symbol.details.kind === 'Generic' && symbol.details.specific !== undefined) {
      // The generic may shadow a procedure pointer of the same name.
      const specific = symbolAt(env.table, symbol.details.specific);
      if (specific.id !== symbol.id && specific.commonBlock === undefined) {
        placeSymbol(env, cursor, specific);
      }
    }
  }

  cursor.offset = align(cursor.offset, cursor.alignment, env.target);
  scope.size = cursor.offset;
  scope.alignment = cursor.alignment;

  // COMMON is not allowed in a BLOCK construct.
  if (scope.kind !== 'BlockConstruct') {
    for (const block of commonBlocksByName(scope)) {
      layoutCommonBlock(env, eq, block);
    }
  }

  for (const [id, dep] of eq.dependents) {
    if (eq.rejected.has(id)) continue;
    const symbol = symbolAt(env.table, id);
    const base = symbolAt(env.table, dep.base);
    symbol.offset = base.offset + dep.offset;
    if (base.commonBlock !== undefined) {
      symbol.commonBlock = base.commonBlock;
    }
  }

  scope.status = 'done';
}

/**
 * Lay out every scope of a loaded program.
 */
export function computeProgramOffsets(program: Program, env: LayoutEnv): void {
  computeOffsets(program.root, env);
}
