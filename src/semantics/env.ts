import type { Diagnostic } from '../diagnostics/types.js';
import type { Program, SymbolTable } from '../frontend/symbols.js';
import type { AlignmentPolicy } from './alignment.js';
import { selectAlignmentPolicy } from './alignment.js';
import type { CommonBlockMap } from './common.js';
import { createCommonBlockMap } from './common.js';
import { computeOffsets } from './offsets.js';
import type { TypeSizeOracle } from './sizing.js';
import { createTypeSizeOracle } from './sizing.js';
import type { TargetCharacteristics } from './target.js';
import { resolveTarget } from './target.js';

/**
 * Layout behavior switches that do not change offsets.
 */
export interface LayoutSwitches {
  /** Warn when alignment inserts padding before a COMMON block member. */
  commonPaddingWarnings: boolean;
  /** Warn when a named COMMON block is laid out with different sizes in different scopes. */
  distinctCommonSizeWarnings: boolean;
}

/**
 * Everything a layout pass consults: the symbol table it annotates, the target it lays out for, the
 * oracles it queries and the diagnostics it reports to.
 */
export interface LayoutEnv {
  /** File used for diagnostics about entities without a source span. */
  readonly file: string;
  readonly table: SymbolTable;
  readonly target: TargetCharacteristics;
  readonly oracle: TypeSizeOracle;
  readonly alignmentPolicy: AlignmentPolicy;
  readonly commonBlocks: CommonBlockMap;
  readonly diagnostics: Diagnostic[];
  readonly switches: LayoutSwitches;
}

export interface BuildEnvOptions {
  target?: Partial<TargetCharacteristics>;
  /** Replaces the default intrinsic/derived-type oracle. */
  oracle?: TypeSizeOracle;
  /** Replaces the policy selected from `target.os`. */
  alignmentPolicy?: AlignmentPolicy;
  commonPaddingWarnings?: boolean;
  distinctCommonSizeWarnings?: boolean;
}

/**
 * Build the layout environment for a loaded program.
 *
 * The default oracle measures a derived type by laying out its type scope first, through the same
 * environment.
 */
export function buildEnv(
  program: Program,
  diagnostics: Diagnostic[],
  options?: BuildEnvOptions,
): LayoutEnv {
  const target = resolveTarget(options?.target);
  const env: LayoutEnv = {
    file: program.file,
    table: program.table,
    target,
    oracle:
      options?.oracle ?? createTypeSizeOracle(program.table, (scope) => computeOffsets(scope, env)),
    alignmentPolicy: options?.alignmentPolicy ?? selectAlignmentPolicy(target),
    commonBlocks: createCommonBlockMap(),
    diagnostics,
    switches: {
      commonPaddingWarnings: options?.commonPaddingWarnings ?? true,
      distinctCommonSizeWarnings: options?.distinctCommonSizeWarnings ?? true,
    },
  };
  return env;
}
