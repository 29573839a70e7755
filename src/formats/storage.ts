import type { Scope, SymbolNode, SymbolTable } from '../frontend/symbols.js';
import { SCOPE_KIND_NAMES, symbolAt } from '../frontend/symbols.js';

function holdsStorage(symbol: SymbolNode): boolean {
  const kind = symbol.details.kind;
  return (kind === 'Object' || kind === 'ProcPointer') && symbol.size > 0;
}

function byOffset(a: SymbolNode, b: SymbolNode): number {
  return a.offset - b.offset || a.id - b.id;
}

/**
 * Symbols of `scope` that occupy storage, including specifics shadowed by a generic name.
 */
export function storageSymbols(table: SymbolTable, scope: Scope): SymbolNode[] {
  const out: SymbolNode[] = [];
  for (const id of scope.symbols) {
    const symbol = symbolAt(table, id);
    if (holdsStorage(symbol)) out.push(symbol);
    if (symbol.details.kind === 'Generic' && symbol.details.specific !== undefined) {
      const specific = symbolAt(table, symbol.details.specific);
      if (specific.id !== symbol.id && holdsStorage(specific)) out.push(specific);
    }
  }
  return out;
}

/**
 * Storage of the scope itself (outside COMMON), by offset.
 */
export function localSymbols(table: SymbolTable, scope: Scope): SymbolNode[] {
  return storageSymbols(table, scope)
    .filter((s) => s.commonBlock === undefined)
    .sort(byOffset);
}

/**
 * Symbols of the scope stored in COMMON block `name`, by offset.
 */
export function commonSymbols(table: SymbolTable, scope: Scope, name: string): SymbolNode[] {
  return storageSymbols(table, scope)
    .filter((s) => s.commonBlock === name)
    .sort(byOffset);
}

/**
 * Scopes in pre-order: each scope before the scopes nested in it.
 */
export function scopesInOrder(root: Scope): Scope[] {
  const out: Scope[] = [];
  const visit = (scope: Scope) => {
    out.push(scope);
    for (const child of scope.children) visit(child);
  };
  visit(root);
  return out;
}

export function scopeTitle(scope: Scope): string {
  const kind = SCOPE_KIND_NAMES[scope.kind];
  return scope.name !== undefined ? `${kind} ${scope.name}` : kind;
}
