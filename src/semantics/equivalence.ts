import { internalError } from '../diagnostics/internal.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  EquivalenceObject,
  EquivalenceSet,
  Scope,
  SymbolId,
  SymbolNode,
} from '../frontend/symbols.js';
import { symbolAt } from '../frontend/symbols.js';
import type { LayoutEnv } from './env.js';
import { noteAt, report } from './report.js';
import type { SizeAndAlignment } from './sizing.js';
import { characterKindWidth, elementCount, getSizeAndAlignment } from './sizing.js';

/**
 * Location of a symbol's first storage unit, expressed as a byte offset into the storage of `base`.
 */
export interface Dependency {
  base: SymbolId;
  offset: number;
  /** The EQUIVALENCE object that introduced this edge (used for diagnostics). */
  object: EquivalenceObject;
}

/**
 * Result of resolving the EQUIVALENCE sets of one scope.
 */
export interface EquivalenceLayout {
  /** Aliased symbol -> its base symbol and offset; after resolution every base is unaliased. */
  dependents: Map<SymbolId, Dependency>;
  /** Base symbol -> extent needed to hold everything aliased onto it, in symbol order. */
  blocks: Map<SymbolId, SizeAndAlignment>;
  /** Aliased symbols whose edge COMMON block layout rejected; they keep their own placement. */
  rejected: Set<SymbolId>;
}

/**
 * Byte offset of an EQUIVALENCE object from the start of its variable.
 *
 * Subscripts are linearized in array element order against the declared bounds, then scaled by the
 * element size; a substring start adds whole characters of the variable's kind.
 */
export function computeEquivalenceOffset(env: LayoutEnv, object: EquivalenceObject): number {
  const symbol = symbolAt(env.table, object.symbol);
  const subscripts = object.subscripts;
  let index = 0;
  if (subscripts.length > 0 && symbol.details.kind === 'Object') {
    const explicitDim = (i: number) => {
      const dim = symbol.shape[i];
      if (dim?.kind !== 'Explicit') {
        internalError(
          `EQUIVALENCE object '${symbol.name}' has no explicit bounds for dimension ${i + 1}.`,
        );
      }
      return dim;
    };
    for (let i = subscripts.length - 1; ; ) {
      index += (subscripts[i] ?? 0) - explicitDim(i).lower;
      if (i === 0) break;
      i--;
      const dim = explicitDim(i);
      index *= dim.upper - dim.lower + 1;
    }
  }
  let offset = index * getSizeAndAlignment(env, symbol, false).size;
  if (object.substringStart !== undefined) {
    offset += characterKindWidth(env, symbol) * (object.substringStart - 1);
  }
  return offset;
}

/**
 * Follow dependency edges from `dep.base` to an unaliased symbol.
 *
 * Every edge walked is rewritten to point straight at the final base.
 */
export function resolveDependency(
  dependents: Map<SymbolId, Dependency>,
  dep: Dependency,
): Dependency {
  const path: Array<{ symbol: SymbolId; edge: Dependency }> = [];
  const seen = new Set<SymbolId>();
  let base = dep.base;
  for (let edge = dependents.get(base); edge; edge = dependents.get(base)) {
    if (seen.has(base)) internalError(`EQUIVALENCE dependency cycle through symbol #${base}.`);
    seen.add(base);
    path.push({ symbol: base, edge });
    base = edge.base;
  }

  let toBase = 0;
  for (let i = path.length - 1; i >= 0; i--) {
    const step = path[i];
    if (!step) continue;
    toBase += step.edge.offset;
    if (step.edge.base !== base) {
      dependents.set(step.symbol, { base, offset: toBase, object: step.edge.object });
    }
  }
  return { base, offset: dep.offset + toBase, object: dep.object };
}

/**
 * The designator (`a(3,2)`, `c(2:2)`) whose first storage unit is `offset` bytes into `symbol`,
 * when there is one.
 */
export function designatorAt(
  env: LayoutEnv,
  symbol: SymbolNode,
  offset: number,
): string | undefined {
  if (offset < 0) return undefined;
  const elementSize = getSizeAndAlignment(env, symbol, false).size;
  if (elementSize === 0) return undefined;
  const count = elementCount(symbol.shape);
  if (count === undefined || offset >= elementSize * count) return undefined;

  let index = Math.floor(offset / elementSize);
  const within = offset - index * elementSize;
  let text = symbol.name;
  if (symbol.shape.length > 0) {
    const subscripts: number[] = [];
    for (const dim of symbol.shape) {
      if (dim.kind !== 'Explicit') return undefined;
      const extent = dim.upper - dim.lower + 1;
      subscripts.push(dim.lower + (index % extent));
      index = Math.floor(index / extent);
    }
    text += `(${subscripts.join(',')})`;
  }
  if (within !== 0) {
    const type = symbol.type;
    if (type?.kind !== 'IntrinsicType' || type.category !== 'character') return undefined;
    const width = characterKindWidth(env, symbol);
    if (within % width !== 0) return undefined;
    const position = within / width + 1;
    text += `(${position}:${position})`;
  }
  return text;
}

function reportConflict(
  env: LayoutEnv,
  symbolId: SymbolId,
  anchor: { offset: number; object: EquivalenceObject },
  other: { offset: number; object: EquivalenceObject },
): void {
  const symbol = symbolAt(env.table, symbolId);
  const x = designatorAt(env, symbol, anchor.offset);
  const y = designatorAt(env, symbol, other.offset);
  if (x !== undefined && y !== undefined) {
    report(
      env,
      DiagnosticIds.EquivalenceConflict,
      'error',
      `'${x}' and '${y}' cannot have the same first storage unit`,
      anchor.object.span,
      [noteAt(env, `Incompatible reference to '${y}'`, other.object.span)],
    );
    return;
  }
  report(
    env,
    DiagnosticIds.EquivalenceConflict,
    'error',
    `'${symbol.name}' (offset ${anchor.offset} bytes and ${other.offset} bytes) ` +
      `cannot have the same first storage unit`,
    anchor.object.span,
    [
      noteAt(
        env,
        `Incompatible reference to '${symbol.name}' offset ${other.offset} bytes`,
        other.object.span,
      ),
    ],
  );
}

function addEquivalenceSet(env: LayoutEnv, layout: EquivalenceLayout, set: EquivalenceSet): void {
  const resolved: Dependency[] = [];
  let representative: Dependency | undefined;
  for (const object of set) {
    const r = resolveDependency(layout.dependents, {
      base: object.symbol,
      offset: computeEquivalenceOffset(env, object),
      object,
    });
    resolved.push(r);
    // Anchor on the object furthest into its storage so every other edge offset is non-negative.
    if (!representative || r.offset >= representative.offset) {
      representative = r;
    }
  }
  if (!representative) internalError('EQUIVALENCE set without objects.');

  for (const r of resolved) {
    if (r === representative) continue;
    if (r.base === representative.base) {
      if (r.offset !== representative.offset) {
        reportConflict(env, r.base, representative, r);
      }
      continue;
    }

    const edgeOffset = representative.offset - r.offset;
    const existing = layout.dependents.get(r.base);
    if (existing) {
      // An earlier object of this set already tied the same variable to the representative.
      const prior = resolveDependency(layout.dependents, existing);
      if (prior.base !== representative.base || prior.offset !== edgeOffset) {
        reportConflict(
          env,
          r.base,
          { offset: representative.offset - prior.offset, object: existing.object },
          r,
        );
      }
      continue;
    }
    layout.dependents.set(r.base, {
      base: representative.base,
      offset: edgeOffset,
      object: r.object,
    });
  }
}

/**
 * Resolve every EQUIVALENCE set of `scope` into dependency edges and per-base block extents.
 *
 * Sizes of aliased symbols are assigned here; each must still be unsized.
 */
export function resolveEquivalenceSets(env: LayoutEnv, scope: Scope): EquivalenceLayout {
  const layout: EquivalenceLayout = {
    dependents: new Map(),
    blocks: new Map(),
    rejected: new Set(),
  };
  for (const set of scope.equivalenceSets) {
    addEquivalenceSet(env, layout, set);
  }

  const blocks = new Map<SymbolId, SizeAndAlignment>();
  for (const [id, dep] of layout.dependents) {
    const resolved = resolveDependency(layout.dependents, dep);
    layout.dependents.set(id, resolved);

    const symbol = symbolAt(env.table, id);
    if (symbol.size !== 0) {
      internalError(
        `Symbol '${symbol.name}' already has size ${symbol.size} before EQUIVALENCE layout.`,
      );
    }
    const info = getSizeAndAlignment(env, symbol, true);
    symbol.size = info.size;

    const minBlockSize = resolved.offset + info.size;
    const block = blocks.get(resolved.base);
    if (!block) {
      blocks.set(resolved.base, { size: minBlockSize, alignment: info.alignment });
    } else {
      block.size = Math.max(block.size, minBlockSize);
      block.alignment = Math.max(block.alignment, info.alignment);
    }
  }

  for (const base of [...blocks.keys()].sort((a, b) => a - b)) {
    const block = blocks.get(base);
    if (block) layout.blocks.set(base, block);
  }
  return layout;
}
