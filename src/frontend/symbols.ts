import { internalError } from '../diagnostics/internal.js';

/**
 * 1-based line/column position plus 0-based character offset.
 */
export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

/**
 * Source span for an entity, in a specific file.
 */
export interface SourceSpan {
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Index of a symbol in {@link SymbolTable.symbols}.
 */
export type SymbolId = number;

export type IntrinsicCategory = 'integer' | 'real' | 'complex' | 'logical' | 'character';

export type TypeSpec =
  | {
      kind: 'IntrinsicType';
      category: IntrinsicCategory;
      /** Kind type parameter (bytes per element for numeric types, per character for character). */
      typeKind: number;
      /** Character length; absent for assumed/deferred length and for non-character types. */
      length?: number;
    }
  | { kind: 'DerivedType'; name: string; polymorphic: boolean }
  | { kind: 'UnlimitedPolymorphic' };

export type DimSpec =
  | { kind: 'Explicit'; lower: number; upper: number }
  | { kind: 'Deferred' }
  | { kind: 'AssumedShape'; lower: number }
  | { kind: 'AssumedSize'; lower: number };

export type SymbolAttr = 'allocatable' | 'pointer' | 'dummy';

export type SymbolDetails =
  | { kind: 'Object' }
  | { kind: 'ProcPointer' }
  | { kind: 'Procedure' }
  | {
      kind: 'Generic';
      /** Specific procedure shadowed by the generic name, when distinct. */
      specific?: SymbolId;
    }
  | { kind: 'Other' };

/**
 * A named entity of a scope. `offset` and `size` are written by the layout pass.
 */
export interface SymbolNode {
  id: SymbolId;
  name: string;
  span?: SourceSpan;
  details: SymbolDetails;
  type?: TypeSpec;
  shape: DimSpec[];
  attrs: Set<SymbolAttr>;
  /**
   * Name of the COMMON block holding this symbol (`''` for blank common).
   *
   * Set upstream for declared members; set by layout when a symbol joins a block via EQUIVALENCE.
   */
  commonBlock?: string;
  /** Byte offset relative to the owning scope or COMMON block. */
  offset: number;
  size: number;
}

/**
 * One element of an EQUIVALENCE set: a variable, array element or substring.
 */
export interface EquivalenceObject {
  symbol: SymbolId;
  /** Constant subscripts, one per dimension. */
  subscripts: number[];
  /** 1-based substring start, for character data. */
  substringStart?: number;
  span?: SourceSpan;
}

export type EquivalenceSet = EquivalenceObject[];

export interface CommonBlock {
  /** Block name; `''` for blank common. */
  name: string;
  /** Members in declaration order. */
  members: SymbolId[];
  span?: SourceSpan;
  /** True when some member is initialized (DATA or BLOCK DATA). */
  initialized: boolean;
  size: number;
  alignment: number;
}

export type ScopeKind =
  | 'Global'
  | 'Module'
  | 'MainProgram'
  | 'Subprogram'
  | 'BlockData'
  | 'DerivedType'
  | 'BlockConstruct'
  | 'Other';

/**
 * Lowercase names of scope kinds, as written in symbol-table descriptions and listings.
 */
export const SCOPE_KIND_NAMES: Record<ScopeKind, string> = {
  Global: 'global',
  Module: 'module',
  MainProgram: 'program',
  Subprogram: 'subprogram',
  BlockData: 'block-data',
  DerivedType: 'derived-type',
  BlockConstruct: 'block',
  Other: 'other',
};

export function isScopeKind(value: string): value is ScopeKind {
  return Object.prototype.hasOwnProperty.call(SCOPE_KIND_NAMES, value);
}

export type ScopeStatus = 'unprocessed' | 'in-progress' | 'done';

export interface Scope {
  kind: ScopeKind;
  name?: string;
  span?: SourceSpan;
  /** Symbols in declaration order (for derived types, the components). */
  symbols: SymbolId[];
  equivalenceSets: EquivalenceSet[];
  commonBlocks: Map<string, CommonBlock>;
  children: Scope[];
  /** Derived type declared with BIND(C). */
  bindC: boolean;
  /** Derived type with KIND parameters: only its instantiations are laid out. */
  kindParameterized: boolean;
  /** Number of LEN type parameters of a derived type. */
  lenParameterCount: number;
  status: ScopeStatus;
  size: number;
  alignment: number;
}

export interface SymbolTable {
  symbols: SymbolNode[];
  /** Derived type name -> the scope holding its components. */
  derivedTypes: Map<string, Scope>;
}

/**
 * A loaded symbol table description: the arena plus the root of the scope tree.
 */
export interface Program {
  file: string;
  table: SymbolTable;
  root: Scope;
}

export function symbolAt(table: SymbolTable, id: SymbolId): SymbolNode {
  const symbol = table.symbols[id];
  if (!symbol) internalError(`Unknown symbol id ${id}.`);
  return symbol;
}

export function makeScope(kind: ScopeKind, name?: string): Scope {
  return {
    kind,
    ...(name !== undefined ? { name } : {}),
    symbols: [],
    equivalenceSets: [],
    commonBlocks: new Map(),
    children: [],
    bindC: false,
    kindParameterized: false,
    lenParameterCount: 0,
    status: 'unprocessed',
    size: 0,
    alignment: 0,
  };
}

/**
 * COMMON blocks of a scope in name order (code-unit order, so blank common comes first).
 */
export function commonBlocksByName(scope: Scope): CommonBlock[] {
  return [...scope.commonBlocks.values()].sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
  );
}

/**
 * Display form of a COMMON block name: `/c/`, or `//` for blank common.
 */
export function commonBlockLabel(name: string): string {
  return `/${name}/`;
}

export function isWideReal(type: TypeSpec | undefined): boolean {
  return (
    type?.kind === 'IntrinsicType' &&
    (type.category === 'real' || type.category === 'complex') &&
    type.typeKind > 4
  );
}
