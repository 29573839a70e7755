import type { Scope } from '../frontend/symbols.js';
import { commonBlocksByName, SCOPE_KIND_NAMES } from '../frontend/symbols.js';
import { commonSymbols, storageSymbols } from './storage.js';
import type { LayoutMapScope, LayoutSnapshot, MapArtifact } from './types.js';

function mapScope(snapshot: LayoutSnapshot, scope: Scope): LayoutMapScope {
  const table = snapshot.program.table;
  const laidOut = scope.status === 'done';
  return {
    kind: SCOPE_KIND_NAMES[scope.kind],
    ...(scope.name !== undefined ? { name: scope.name } : {}),
    laidOut,
    size: laidOut ? scope.size : 0,
    alignment: laidOut ? scope.alignment : 0,
    symbols: storageSymbols(table, scope).map((s) => ({
      name: s.name,
      offset: s.offset,
      size: s.size,
      ...(s.commonBlock !== undefined ? { commonBlock: s.commonBlock } : {}),
    })),
    commonBlocks: commonBlocksByName(scope).map((block) => ({
      name: block.name,
      size: block.size,
      alignment: block.alignment,
      members: commonSymbols(table, scope, block.name).map((s) => s.name),
    })),
    children: scope.children.map((child) => mapScope(snapshot, child)),
  };
}

/**
 * Create the machine-readable layout map: the scope tree with every offset, size and alignment.
 */
export function writeMap(snapshot: LayoutSnapshot): MapArtifact {
  return {
    kind: 'map',
    json: {
      format: 'offlay-layout-map',
      version: 1,
      target: { ...snapshot.target },
      root: mapScope(snapshot, snapshot.program.root),
    },
  };
}
