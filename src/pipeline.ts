import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';
import type { Program } from './frontend/symbols.js';
import type { TargetCharacteristics } from './semantics/target.js';

/**
 * Options that influence layout and which artifacts are produced.
 */
export interface LayoutOptions {
  /**
   * JSON file of target characteristics, applied over the built-in defaults.
   */
  targetFile?: string;
  /** Overrides applied after `targetFile` (command-line flags). */
  target?: Partial<TargetCharacteristics>;
  /** Emit listing (`.lst`). */
  emitListing?: boolean;
  /** Emit layout map (`.layout.json`). */
  emitMap?: boolean;
  /** Warn about alignment padding inside COMMON blocks (default on). */
  commonPaddingWarnings?: boolean;
  /** Warn when a named COMMON block has different sizes in different scopes (default on). */
  distinctCommonSizeWarnings?: boolean;
}

/**
 * Result of a layout run: diagnostics plus any produced artifacts.
 */
export interface LayoutResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  /** The laid-out program, when the input could be loaded. */
  program?: Program;
  target?: TargetCharacteristics;
}

/**
 * Dependency injection surface for the layout pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level layout function signature used by the pipeline contract.
 */
export type LayoutFn = (
  entryFile: string,
  options: LayoutOptions,
  deps: PipelineDeps,
) => Promise<LayoutResult>;
