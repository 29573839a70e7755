import { describe, expect, it } from 'vitest';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { CommonBlock } from '../src/frontend/symbols.js';
import { createCommonBlockMap } from '../src/semantics/common.js';
import {
  addCommon,
  addSymbol,
  at,
  createProgram,
  dims,
  equivalence,
  int,
  layout,
  layoutEnv,
  real,
  SOURCE,
} from './helpers/builders.js';

function block(name: string, size: number, line: number, initialized = false): CommonBlock {
  return { name, members: [], span: at(line), initialized, size, alignment: 4 };
}

describe('layoutCommonBlock', () => {
  it('places members in order and warns about padding', () => {
    const t = createProgram();
    const a = addSymbol(t, t.root, 'a', { type: int() });
    const b = addSymbol(t, t.root, 'b', { type: real(8) });
    const c = addCommon(t.root, 'c', [a, b], { line: 3 });

    layout(t);

    expect([a.offset, b.offset]).toEqual([0, 8]);
    expect([c.size, c.alignment]).toEqual([16, 8]);
    expect(t.diagnostics).toEqual([
      {
        id: DiagnosticIds.CommonPadding,
        severity: 'warning',
        message: "COMMON block /c/ requires 4 bytes of padding before 'b' for alignment",
        file: SOURCE,
        line: 3,
        column: 1,
      },
    ]);
  });

  it('can stay quiet about padding', () => {
    const t = createProgram();
    const a = addSymbol(t, t.root, 'a', { type: int() });
    const b = addSymbol(t, t.root, 'b', { type: real(8) });
    addCommon(t.root, 'c', [a, b], { line: 3 });

    layout(t, { commonPaddingWarnings: false });

    expect(b.offset).toBe(8);
    expect(t.diagnostics).toEqual([]);
  });

  it('reports padding in blank common at the member', () => {
    const t = createProgram();
    const a = addSymbol(t, t.root, 'a', { type: int(2) });
    const b = addSymbol(t, t.root, 'b', { type: int(), line: 7 });
    addCommon(t.root, '', [a, b], { line: 2 });

    layout(t);

    expect(t.diagnostics.map((d) => [d.message, d.line])).toEqual([
      ["COMMON block // requires 2 bytes of padding before 'b' for alignment", 7],
    ]);
  });

  it('adopts an EQUIVALENCE block through one of its members', () => {
    const t = createProgram();
    const x = addSymbol(t, t.root, 'x');
    const y = addSymbol(t, t.root, 'y');
    const z = addSymbol(t, t.root, 'z', { type: real(), shape: dims(3) });
    const c = addCommon(t.root, 'c', [x, y]);
    equivalence(t.root, y, { symbol: z, subscripts: [1] });

    layout(t);

    expect(z.commonBlock).toBe('c');
    expect(z.offset).toBe(4);
    expect(y.offset).toBe(4);
    expect(c.size).toBe(16);
    expect(c.alignment).toBe(4);
    expect(t.diagnostics).toEqual([]);
  });

  it('rejects extending a block before its first storage unit', () => {
    const t = createProgram();
    const x = addSymbol(t, t.root, 'x', { line: 2 });
    const z = addSymbol(t, t.root, 'z', { type: real(), shape: dims(4) });
    const c = addCommon(t.root, 'c', [x]);
    equivalence(t.root, x, { symbol: z, subscripts: [2] });

    layout(t);

    expect(t.diagnostics).toEqual([
      {
        id: DiagnosticIds.CommonBackwardExtend,
        severity: 'error',
        message: "'x' cannot backward-extend COMMON block /c/ via EQUIVALENCE with 'z'",
        file: SOURCE,
        line: 2,
        column: 1,
      },
    ]);
    expect(x.offset).toBe(0);
    expect(x.commonBlock).toBe('c');
    expect(z.commonBlock).toBeUndefined();
    expect(c.size).toBe(4);
  });

  it('rejects associating members of two blocks', () => {
    const t = createProgram();
    const a = addSymbol(t, t.root, 'a');
    const b = addSymbol(t, t.root, 'b');
    addCommon(t.root, 'c1', [a], { line: 4 });
    addCommon(t.root, 'c2', [b], { line: 5 });
    equivalence(t.root, a, b);

    layout(t);

    expect(t.diagnostics.map((d) => [d.id, d.message, d.line])).toEqual([
      [
        DiagnosticIds.CommonCrossBlock,
        "'a' in COMMON block /c1/ must not be storage associated with 'b' in COMMON block /c2/ " +
          'by EQUIVALENCE',
        4,
      ],
    ]);
    expect([a.commonBlock, a.offset]).toEqual(['c1', 0]);
    expect([b.commonBlock, b.offset]).toEqual(['c2', 0]);
  });

  it('rejects associations that contradict the block sequence', () => {
    const t = createProgram();
    const a = addSymbol(t, t.root, 'a');
    const b = addSymbol(t, t.root, 'b');
    const c = addCommon(t.root, 'c', [a, b], { line: 6 });
    equivalence(t.root, a, b);

    layout(t);

    expect(t.diagnostics.map((d) => [d.id, d.message])).toEqual([
      [
        DiagnosticIds.CommonEquivalenceMismatch,
        "'a' is storage associated with 'b' by EQUIVALENCE elsewhere in COMMON block /c/",
      ],
    ]);
    expect([a.offset, b.offset]).toEqual([0, 4]);
    expect(c.size).toBe(8);
  });

  it('rejects an association that would overlay two members', () => {
    const t = createProgram();
    const a = addSymbol(t, t.root, 'a');
    const b = addSymbol(t, t.root, 'b', { type: real(), shape: dims(2) });
    const d = addSymbol(t, t.root, 'd', { type: real(), shape: dims(3) });
    addCommon(t.root, 'c', [a, b]);
    equivalence(t.root, { symbol: d, subscripts: [1] }, b);
    equivalence(t.root, { symbol: b, subscripts: [1] }, a);

    layout(t);

    expect(t.diagnostics.map((x) => x.message)).toEqual([
      "'b' is storage associated with 'a' by EQUIVALENCE elsewhere in COMMON block /c/",
    ]);
  });

  it('accepts associations consistent with the block sequence', () => {
    const t = createProgram();
    const a = addSymbol(t, t.root, 'a', { type: real() });
    const b = addSymbol(t, t.root, 'b', { type: real() });
    const w = addSymbol(t, t.root, 'w', { type: real(), shape: dims(2) });
    const c = addCommon(t.root, 'c', [a, b]);
    equivalence(t.root, { symbol: w, subscripts: [1] }, a);
    equivalence(t.root, { symbol: w, subscripts: [2] }, b);

    layout(t);

    expect(t.diagnostics).toEqual([]);
    expect([w.commonBlock, w.offset]).toEqual(['c', 0]);
    expect(b.offset).toBe(4);
    expect(c.size).toBe(8);
  });
});

describe('createCommonBlockMap', () => {
  it('warns when a named block changes size', () => {
    const t = createProgram();
    const env = layoutEnv(t);
    const map = createCommonBlockMap();

    map.mapAndCheck(env, block('c', 8, 2));
    map.mapAndCheck(env, block('c', 16, 9));

    expect(map.sizeOf('c')).toBe(16);
    expect(t.diagnostics).toEqual([
      {
        id: DiagnosticIds.CommonDistinctSizes,
        severity: 'warning',
        message:
          'A named COMMON block should have the same size everywhere it appears (16 bytes here)',
        file: SOURCE,
        line: 9,
        column: 1,
        notes: [
          {
            message: 'Previously defined with a size of 8 bytes',
            file: SOURCE,
            line: 2,
            column: 1,
          },
        ],
      },
    ]);
  });

  it('compares against the largest size seen', () => {
    const t = createProgram();
    const env = layoutEnv(t);
    const map = createCommonBlockMap();

    map.mapAndCheck(env, block('c', 16, 2));
    map.mapAndCheck(env, block('c', 8, 3));
    map.mapAndCheck(env, block('c', 16, 4));

    expect(map.sizeOf('c')).toBe(16);
    expect(t.diagnostics.map((d) => d.line)).toEqual([3]);
  });

  it('lets blank common differ in size', () => {
    const t = createProgram();
    const env = layoutEnv(t);
    const map = createCommonBlockMap();

    map.mapAndCheck(env, block('', 8, 2));
    map.mapAndCheck(env, block('', 32, 3));

    expect(map.sizeOf('')).toBe(32);
    expect(map.sizeOf('other')).toBeUndefined();
    expect(t.diagnostics).toEqual([]);
  });

  it('can stay quiet about differing sizes', () => {
    const t = createProgram();
    const env = layoutEnv(t, { distinctCommonSizeWarnings: false });
    const map = createCommonBlockMap();

    map.mapAndCheck(env, block('c', 8, 2));
    map.mapAndCheck(env, block('c', 16, 3));

    expect(t.diagnostics).toEqual([]);
  });

  it('reports a block initialized in two places', () => {
    const t = createProgram();
    const env = layoutEnv(t);
    const map = createCommonBlockMap();

    map.mapAndCheck(env, block('init', 8, 2, true));
    map.mapAndCheck(env, block('init', 8, 5));
    map.mapAndCheck(env, block('init', 8, 8, true));

    expect(t.diagnostics).toEqual([
      {
        id: DiagnosticIds.CommonMultipleInit,
        severity: 'error',
        message: 'Multiple initialization of COMMON block /init/',
        file: SOURCE,
        line: 8,
        column: 1,
        notes: [
          {
            message: 'Previous initialization of COMMON block /init/',
            file: SOURCE,
            line: 2,
            column: 1,
          },
        ],
      },
    ]);
  });
});
