import type { Scope, SymbolNode } from '../frontend/symbols.js';
import { isWideReal, symbolAt } from '../frontend/symbols.js';
import type { LayoutEnv } from './env.js';
import { getSizeAndAlignment } from './sizing.js';
import type { TargetCharacteristics } from './target.js';

/**
 * Round `offset` up to `alignment`, never beyond the target's maximum alignment.
 */
export function align(offset: number, alignment: number, target: TargetCharacteristics): number {
  const effective = Math.min(alignment, target.maxAlignment);
  if (effective <= 1) return offset;
  return Math.ceil(offset / effective) * effective;
}

/**
 * Outcome of an alignment-policy lookup for one symbol.
 *
 * - `none`: use the type's natural alignment.
 * - `override`: use `alignment` instead.
 * - `malformed`: the type could not be examined (unknown, cyclic or too deeply nested); callers
 *   treat this like `none`.
 */
export type AlignmentOverride =
  | { kind: 'none' }
  | { kind: 'override'; alignment: number }
  | { kind: 'malformed'; reason: string };

/**
 * Target-specific alignment rule consulted before placing each top-level symbol of a scope.
 */
export interface AlignmentPolicy {
  readonly name: string;
  overrideFor(symbol: SymbolNode, scope: Scope, env: LayoutEnv): AlignmentOverride;
}

const NO_OVERRIDE: AlignmentOverride = { kind: 'none' };

const MAX_COMPONENT_NESTING = 32;

const WIDE_REAL_ALIGNMENT = 4;

export const naturalAlignmentPolicy: AlignmentPolicy = {
  name: 'natural',
  overrideFor: () => NO_OVERRIDE,
};

/**
 * Alignment of a nested BIND(C) component on AIX: wide reals count as 4-byte aligned, anything else
 * keeps its natural alignment, nested derived-type components included. Yields `none` unless the
 * type has a wide real among its direct components and every nested type yields an override too.
 */
function componentAlignment(env: LayoutEnv, typeName: string): AlignmentOverride {
  type Frame = {
    scope: Scope;
    name: string;
    /** Component of the enclosing frame whose type this frame walks. */
    component?: SymbolNode;
    next: number;
    maxAlign: number;
    wide: boolean;
  };

  const lookup = (name: string): Scope | undefined => env.table.derivedTypes.get(name);
  const root = lookup(typeName);
  if (!root) return { kind: 'malformed', reason: `unknown derived type "${typeName}"` };

  const stack: Frame[] = [{ scope: root, name: typeName, next: 0, maxAlign: 0, wide: false }];
  let finished: AlignmentOverride = NO_OVERRIDE;

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (!frame) break;

    const componentId = frame.scope.symbols[frame.next];
    if (componentId === undefined) {
      stack.pop();
      const result: AlignmentOverride = frame.wide
        ? { kind: 'override', alignment: frame.maxAlign }
        : NO_OVERRIDE;
      const parent = stack[stack.length - 1];
      if (!parent) {
        finished = result;
        break;
      }
      // A nested type without wide reals voids the override for the whole aggregate.
      if (result.kind !== 'override' || !frame.component) return result;
      const natural = getSizeAndAlignment(env, frame.component, true).alignment;
      parent.maxAlign = Math.max(parent.maxAlign, natural);
      continue;
    }
    frame.next++;

    const component = symbolAt(env.table, componentId);
    const type = component.type;
    if (isWideReal(type)) {
      frame.maxAlign = Math.max(frame.maxAlign, WIDE_REAL_ALIGNMENT);
      frame.wide = true;
    } else if (type?.kind === 'DerivedType') {
      if (stack.some((f) => f.name === type.name)) {
        return { kind: 'malformed', reason: `derived type "${type.name}" contains itself` };
      }
      if (stack.length >= MAX_COMPONENT_NESTING) {
        return { kind: 'malformed', reason: `derived type "${typeName}" is nested too deeply` };
      }
      const nested = lookup(type.name);
      if (!nested) return { kind: 'malformed', reason: `unknown derived type "${type.name}"` };
      stack.push({
        scope: nested,
        name: type.name,
        component,
        next: 0,
        maxAlign: 0,
        wide: false,
      });
    } else {
      const natural = getSizeAndAlignment(env, component, true).alignment;
      frame.maxAlign = Math.max(frame.maxAlign, natural);
    }
  }

  return finished;
}

/**
 * AIX rule for BIND(C) derived types: a component other than the first that is a REAL or COMPLEX
 * wider than 4 bytes is 4-byte aligned; a derived-type component takes the alignment computed the
 * same way over its own components.
 */
export const bindCAggregatePolicy: AlignmentPolicy = {
  name: 'aix-bind-c',
  overrideFor(symbol, scope, env) {
    if (scope.kind !== 'DerivedType' || !scope.bindC) return NO_OVERRIDE;
    if (scope.symbols[0] === symbol.id) return NO_OVERRIDE;
    const type = symbol.type;
    if (!type) return NO_OVERRIDE;
    if (isWideReal(type)) return { kind: 'override', alignment: WIDE_REAL_ALIGNMENT };
    if (type.kind === 'DerivedType') return componentAlignment(env, type.name);
    return NO_OVERRIDE;
  },
};

/**
 * Pick the alignment policy for a target once, so layout code never branches on the OS.
 */
export function selectAlignmentPolicy(target: TargetCharacteristics): AlignmentPolicy {
  return target.os === 'aix' ? bindCAggregatePolicy : naturalAlignmentPolicy;
}
