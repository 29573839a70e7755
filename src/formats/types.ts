import type { Program } from '../frontend/symbols.js';
import type { TargetCharacteristics } from '../semantics/target.js';

/**
 * A program whose scopes have been laid out, together with the target they were laid out for.
 */
export interface LayoutSnapshot {
  program: Program;
  target: TargetCharacteristics;
}

/**
 * Options for listing writing.
 */
export interface WriteListingOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * In-memory listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  path?: string;
  text: string;
}

/**
 * In-memory layout map artifact.
 */
export interface MapArtifact {
  kind: 'map';
  path?: string;
  json: LayoutMapJson;
}

/**
 * Union of all artifact kinds produced by the layout pipeline.
 */
export type Artifact = ListingArtifact | MapArtifact;

export interface LayoutMapSymbol {
  name: string;
  offset: number;
  size: number;
  commonBlock?: string;
}

export interface LayoutMapCommonBlock {
  name: string;
  size: number;
  alignment: number;
  /** Every symbol of the scope stored in the block, by offset. */
  members: string[];
}

export interface LayoutMapScope {
  kind: string;
  name?: string;
  /** False for scopes the layout pass skips (derived types with KIND parameters). */
  laidOut: boolean;
  size: number;
  alignment: number;
  symbols: LayoutMapSymbol[];
  commonBlocks: LayoutMapCommonBlock[];
  children: LayoutMapScope[];
}

/**
 * Layout map v1 JSON shape.
 */
export type LayoutMapJson = {
  format: 'offlay-layout-map';
  version: 1;
  target: TargetCharacteristics;
  root: LayoutMapScope;
};

/**
 * Format writers used by the pipeline to turn a laid-out program into artifacts.
 */
export interface FormatWriters {
  writeListing?(snapshot: LayoutSnapshot, opts?: WriteListingOptions): ListingArtifact;
  writeMap(snapshot: LayoutSnapshot): MapArtifact;
}
