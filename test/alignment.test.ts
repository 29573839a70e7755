import { describe, expect, it } from 'vitest';

import {
  align,
  bindCAggregatePolicy,
  naturalAlignmentPolicy,
  selectAlignmentPolicy,
} from '../src/semantics/alignment.js';
import { defaultTarget, resolveTarget } from '../src/semantics/target.js';
import {
  addScope,
  addSymbol,
  createProgram,
  derived,
  int,
  layoutEnv,
  real,
} from './helpers/builders.js';

describe('align', () => {
  it('rounds up to the alignment', () => {
    expect(align(5, 4, defaultTarget)).toBe(8);
    expect(align(8, 4, defaultTarget)).toBe(8);
    expect(align(0, 8, defaultTarget)).toBe(0);
  });

  it('leaves offsets alone for alignments of 0 and 1', () => {
    expect(align(3, 0, defaultTarget)).toBe(3);
    expect(align(3, 1, defaultTarget)).toBe(3);
  });

  it('never aligns beyond the target maximum', () => {
    expect(align(9, 16, defaultTarget)).toBe(16);
    expect(align(5, 16, resolveTarget({ maxAlignment: 4 }))).toBe(8);
  });
});

describe('selectAlignmentPolicy', () => {
  it('uses the BIND(C) aggregate rule only on AIX', () => {
    expect(selectAlignmentPolicy(resolveTarget({ os: 'aix' })).name).toBe('aix-bind-c');
    expect(selectAlignmentPolicy(defaultTarget).name).toBe('natural');
    expect(selectAlignmentPolicy(resolveTarget({ os: 'darwin' }))).toBe(naturalAlignmentPolicy);
  });
});

describe('bindCAggregatePolicy', () => {
  it('aligns wide reals after the first component to 4 bytes', () => {
    const t = createProgram();
    const ty = addScope(t, t.root, 'DerivedType', 'pair');
    ty.bindC = true;
    const a = addSymbol(t, ty, 'a', { type: int() });
    const b = addSymbol(t, ty, 'b', { type: real(8) });
    const env = layoutEnv(t, { target: { os: 'aix' } });

    expect(bindCAggregatePolicy.overrideFor(a, ty, env)).toEqual({ kind: 'none' });
    expect(bindCAggregatePolicy.overrideFor(b, ty, env)).toEqual({
      kind: 'override',
      alignment: 4,
    });
  });

  it('leaves the first component and non-BIND(C) types alone', () => {
    const t = createProgram();
    const ty = addScope(t, t.root, 'DerivedType', 'wide');
    ty.bindC = true;
    const first = addSymbol(t, ty, 'x', { type: real(8) });
    const plain = addScope(t, t.root, 'DerivedType', 'plain');
    addSymbol(t, plain, 'p', { type: int() });
    const second = addSymbol(t, plain, 'q', { type: real(8) });
    const env = layoutEnv(t, { target: { os: 'aix' } });

    expect(bindCAggregatePolicy.overrideFor(first, ty, env)).toEqual({ kind: 'none' });
    expect(bindCAggregatePolicy.overrideFor(second, plain, env)).toEqual({ kind: 'none' });
  });

  it('computes the alignment of nested derived-type components', () => {
    const t = createProgram();
    const inner = addScope(t, t.root, 'DerivedType', 'inner');
    addSymbol(t, inner, 'x', { type: int(2) });
    addSymbol(t, inner, 'y', { type: real(8) });
    const outer = addScope(t, t.root, 'DerivedType', 'outer');
    outer.bindC = true;
    addSymbol(t, outer, 'c', { type: int(1) });
    const d = addSymbol(t, outer, 'd', { type: derived('inner') });
    const env = layoutEnv(t, { target: { os: 'aix' } });

    expect(bindCAggregatePolicy.overrideFor(d, outer, env)).toEqual({
      kind: 'override',
      alignment: 4,
    });
  });

  it('keeps the natural alignment when a nested type has no wide real', () => {
    const t = createProgram();
    const inner = addScope(t, t.root, 'DerivedType', 'ints');
    addSymbol(t, inner, 'x', { type: int(8) });
    const outer = addScope(t, t.root, 'DerivedType', 'outer');
    outer.bindC = true;
    addSymbol(t, outer, 'c', { type: int(1) });
    const d = addSymbol(t, outer, 'd', { type: derived('ints') });
    const env = layoutEnv(t, { target: { os: 'aix' } });

    expect(bindCAggregatePolicy.overrideFor(d, outer, env)).toEqual({ kind: 'none' });
  });

  it('reports unknown and self-containing types as malformed', () => {
    const t = createProgram();
    const selfish = addScope(t, t.root, 'DerivedType', 'selfish');
    addSymbol(t, selfish, 'w', { type: real(8) });
    addSymbol(t, selfish, 'me', { type: derived('selfish') });
    const outer = addScope(t, t.root, 'DerivedType', 'outer');
    outer.bindC = true;
    addSymbol(t, outer, 'c', { type: int(1) });
    const loop = addSymbol(t, outer, 'loop', { type: derived('selfish') });
    const missing = addSymbol(t, outer, 'missing', { type: derived('nowhere') });
    const env = layoutEnv(t, { target: { os: 'aix' } });

    expect(bindCAggregatePolicy.overrideFor(loop, outer, env)).toEqual({
      kind: 'malformed',
      reason: 'derived type "selfish" contains itself',
    });
    expect(bindCAggregatePolicy.overrideFor(missing, outer, env)).toEqual({
      kind: 'malformed',
      reason: 'unknown derived type "nowhere"',
    });
  });

  it('counts a nested aggregate by its natural alignment', () => {
    const t = createProgram();
    const inner = addScope(t, t.root, 'DerivedType', 'inner');
    addSymbol(t, inner, 'x', { type: int(2) });
    addSymbol(t, inner, 'y', { type: real(8) });
    const mid = addScope(t, t.root, 'DerivedType', 'mid');
    addSymbol(t, mid, 'm', { type: int(1) });
    addSymbol(t, mid, 'n', { type: derived('inner') });
    const mid2 = addScope(t, t.root, 'DerivedType', 'mid2');
    addSymbol(t, mid2, 'w', { type: real(8) });
    addSymbol(t, mid2, 'n', { type: derived('inner') });
    const outer = addScope(t, t.root, 'DerivedType', 'outer');
    outer.bindC = true;
    addSymbol(t, outer, 'c', { type: int(1) });
    const e = addSymbol(t, outer, 'e', { type: derived('mid') });
    const f = addSymbol(t, outer, 'f', { type: derived('mid2') });
    const env = layoutEnv(t, { target: { os: 'aix' } });

    // Only a direct wide real makes a type eligible; `mid` has none of its own.
    expect(bindCAggregatePolicy.overrideFor(e, outer, env)).toEqual({ kind: 'none' });
    expect(bindCAggregatePolicy.overrideFor(f, outer, env)).toEqual({
      kind: 'override',
      alignment: 8,
    });
  });

  it('walks the types of pointer and allocatable components', () => {
    const t = createProgram();
    const ints = addScope(t, t.root, 'DerivedType', 'ints');
    addSymbol(t, ints, 'k', { type: int(8) });
    const inner = addScope(t, t.root, 'DerivedType', 'inner');
    addSymbol(t, inner, 'x', { type: int(2) });
    addSymbol(t, inner, 'y', { type: real(8) });
    const viaPointer = addScope(t, t.root, 'DerivedType', 'via_pointer');
    addSymbol(t, viaPointer, 'w', { type: real(8) });
    addSymbol(t, viaPointer, 'p', { type: derived('inner'), attrs: ['pointer'] });
    const viaAllocatable = addScope(t, t.root, 'DerivedType', 'via_allocatable');
    addSymbol(t, viaAllocatable, 'w', { type: real(8) });
    addSymbol(t, viaAllocatable, 'q', { type: derived('ints'), attrs: ['allocatable'] });
    const outer = addScope(t, t.root, 'DerivedType', 'outer');
    outer.bindC = true;
    addSymbol(t, outer, 'c', { type: int(1) });
    const g = addSymbol(t, outer, 'g', { type: derived('via_pointer') });
    const h = addSymbol(t, outer, 'h', { type: derived('via_allocatable') });
    const env = layoutEnv(t, { target: { os: 'aix' } });

    // The pointer component counts with its descriptor alignment.
    expect(bindCAggregatePolicy.overrideFor(g, outer, env)).toEqual({
      kind: 'override',
      alignment: 8,
    });
    expect(bindCAggregatePolicy.overrideFor(h, outer, env)).toEqual({ kind: 'none' });
  });

  it('treats a type that points to itself as malformed', () => {
    const t = createProgram();
    const node = addScope(t, t.root, 'DerivedType', 'node');
    addSymbol(t, node, 'next', { type: derived('node'), attrs: ['pointer'] });
    addSymbol(t, node, 'value', { type: real(8) });
    const outer = addScope(t, t.root, 'DerivedType', 'outer');
    outer.bindC = true;
    addSymbol(t, outer, 'c', { type: int(1) });
    const n = addSymbol(t, outer, 'n', { type: derived('node') });
    const env = layoutEnv(t, { target: { os: 'aix' } });

    expect(bindCAggregatePolicy.overrideFor(n, outer, env)).toEqual({
      kind: 'malformed',
      reason: 'derived type "node" contains itself',
    });
  });
});
