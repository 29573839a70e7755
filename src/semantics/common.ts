import { DiagnosticIds } from '../diagnostics/types.js';
import type { CommonBlock, SymbolId } from '../frontend/symbols.js';
import { commonBlockLabel, symbolAt } from '../frontend/symbols.js';
import type { LayoutEnv } from './env.js';
import type { EquivalenceLayout } from './equivalence.js';
import { createCursor, extendBlockBase, placeSymbol } from './layout.js';
import { noteAt, report } from './report.js';

/**
 * Program-wide view of COMMON blocks, merged by name as the linker will merge them.
 */
export interface CommonBlockMap {
  /** Record a finalized block and report conflicts with earlier appearances of the same name. */
  mapAndCheck(env: LayoutEnv, block: CommonBlock): void;
  /** Largest size seen for a block name. */
  sizeOf(name: string): number | undefined;
}

export function createCommonBlockMap(): CommonBlockMap {
  type Entry = { biggest: CommonBlock; initialization?: CommonBlock };
  const entries = new Map<string, Entry>();

  return {
    mapAndCheck(env, block) {
      const entry = entries.get(block.name);
      if (!entry) {
        entries.set(
          block.name,
          block.initialized ? { biggest: block, initialization: block } : { biggest: block },
        );
        return;
      }
      const label = commonBlockLabel(block.name);
      if (block.initialized) {
        if (entry.initialization && entry.initialization !== block) {
          report(
            env,
            DiagnosticIds.CommonMultipleInit,
            'error',
            `Multiple initialization of COMMON block ${label}`,
            block.span,
            [
              noteAt(
                env,
                `Previous initialization of COMMON block ${label}`,
                entry.initialization.span,
              ),
            ],
          );
        } else {
          entry.initialization = block;
        }
      }
      if (
        env.switches.distinctCommonSizeWarnings &&
        block.name !== '' &&
        block.size !== entry.biggest.size
      ) {
        report(
          env,
          DiagnosticIds.CommonDistinctSizes,
          'warning',
          'A named COMMON block should have the same size everywhere it appears ' +
            `(${block.size} bytes here)`,
          block.span,
          [
            noteAt(
              env,
              `Previously defined with a size of ${entry.biggest.size} bytes`,
              entry.biggest.span,
            ),
          ],
        );
      }
      if (block.size > entry.biggest.size) {
        entry.biggest = block;
      }
    },
    sizeOf(name) {
      return entries.get(name)?.biggest.size;
    },
  };
}

/**
 * Assign offsets to the members of a COMMON block in declaration order, starting at offset 0.
 *
 * Symbols storage associated with a member through EQUIVALENCE join the block; associations the
 * standard forbids are reported and their edges rejected.
 */
export function layoutCommonBlock(env: LayoutEnv, eq: EquivalenceLayout, block: CommonBlock): void {
  const cursor = createCursor(0);
  const label = commonBlockLabel(block.name);
  let minSize = 0;
  let minAlignment = 0;
  const previous = new Set<SymbolId>();

  for (const id of block.members) {
    const symbol = symbolAt(env.table, id);
    const site = block.name === '' ? symbol.span : (block.span ?? symbol.span);
    const padding = placeSymbol(env, cursor, symbol);
    if (padding > 0 && env.switches.commonPaddingWarnings) {
      report(
        env,
        DiagnosticIds.CommonPadding,
        'warning',
        `COMMON block ${label} requires ${padding} bytes of padding before '${symbol.name}' ` +
          'for alignment',
        site,
      );
    }
    previous.add(id);

    let extentBase: SymbolId | undefined;
    const dep = eq.dependents.get(id);
    if (!dep) {
      const info = eq.blocks.get(id);
      if (info) {
        extendBlockBase(symbol, info);
        extentBase = id;
      }
    } else {
      const base = symbolAt(env.table, dep.base);
      if (base.commonBlock !== undefined) {
        if (base.commonBlock === block.name) {
          if (!previous.has(base.id) || base.offset !== symbol.offset - dep.offset) {
            report(
              env,
              DiagnosticIds.CommonEquivalenceMismatch,
              'error',
              `'${symbol.name}' is storage associated with '${base.name}' by EQUIVALENCE ` +
                `elsewhere in COMMON block ${label}`,
              site,
            );
            eq.rejected.add(id);
          }
        } else {
          report(
            env,
            DiagnosticIds.CommonCrossBlock,
            'error',
            `'${symbol.name}' in COMMON block ${label} must not be storage associated with ` +
              `'${base.name}' in COMMON block ${commonBlockLabel(base.commonBlock)} by EQUIVALENCE`,
            site,
          );
          eq.rejected.add(id);
        }
      } else if (dep.offset > symbol.offset) {
        report(
          env,
          DiagnosticIds.CommonBackwardExtend,
          'error',
          `'${symbol.name}' cannot backward-extend COMMON block ${label} via EQUIVALENCE with ` +
            `'${base.name}'`,
          site,
        );
        eq.rejected.add(id);
      } else {
        base.commonBlock = block.name;
        base.offset = symbol.offset - dep.offset;
        previous.add(base.id);
        if (eq.blocks.has(base.id)) extentBase = base.id;
      }
    }

    // The whole EQUIVALENCE block counts toward the size of the COMMON block.
    const info = extentBase !== undefined ? eq.blocks.get(extentBase) : undefined;
    if (extentBase !== undefined && info) {
      const base = symbolAt(env.table, extentBase);
      minSize = Math.max(minSize, cursor.offset, base.offset + info.size);
      minAlignment = Math.max(minAlignment, Math.min(info.alignment, env.target.maxAlignment));
    }
  }

  block.size = Math.max(minSize, cursor.offset);
  block.alignment = Math.max(minAlignment, cursor.alignment);
  env.commonBlocks.mapAndCheck(env, block);
}
