import { commonBlockLabel, commonBlocksByName } from '../frontend/symbols.js';
import type { SymbolNode } from '../frontend/symbols.js';
import { commonSymbols, localSymbols, scopesInOrder, scopeTitle } from './storage.js';
import type { LayoutSnapshot, ListingArtifact, WriteListingOptions } from './types.js';

const COLUMN = 8;

function entryLine(symbol: SymbolNode): string {
  const offset = String(symbol.offset).padStart(COLUMN);
  const size = String(symbol.size).padStart(COLUMN);
  return `  ${offset}  ${size}  ${symbol.name}`;
}

/**
 * Create a deterministic `.lst` listing artifact.
 *
 * One section per scope, outer scopes first: the scope's own storage by offset, then each COMMON
 * block it declares, in name order.
 */
export function writeListing(
  snapshot: LayoutSnapshot,
  opts?: WriteListingOptions,
): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const { program, target } = snapshot;

  const lines: string[] = [];
  lines.push('; offlay listing');
  lines.push(`; target: ${target.os} (max alignment ${target.maxAlignment})`);
  lines.push('');

  for (const scope of scopesInOrder(program.root)) {
    if (scope.status !== 'done') {
      lines.push(`${scopeTitle(scope)}: not laid out`);
      lines.push('');
      continue;
    }
    lines.push(`${scopeTitle(scope)}: size ${scope.size}, alignment ${scope.alignment}`);
    const locals = localSymbols(program.table, scope);
    if (locals.length > 0) {
      lines.push(`  ${'offset'.padStart(COLUMN)}  ${'size'.padStart(COLUMN)}  name`);
      for (const symbol of locals) lines.push(entryLine(symbol));
    }
    for (const block of commonBlocksByName(scope)) {
      const name = block.name;
      lines.push(
        `  common ${commonBlockLabel(name)}: size ${block.size}, alignment ${block.alignment}`,
      );
      for (const symbol of commonSymbols(program.table, scope, name)) lines.push(entryLine(symbol));
    }
    lines.push('');
  }

  return { kind: 'lst', text: lines.join(lineEnding) };
}
