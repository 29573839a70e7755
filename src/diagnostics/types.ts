/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * Secondary location attached to a diagnostic (e.g. the other half of a conflict).
 */
export interface DiagnosticNote {
  message: string;
  file: string;
  line?: number;
  column?: number;
}

/**
 * A layout diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `LAY300`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
  notes?: DiagnosticNote[];
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /**
   * Unknown/unclassified diagnostic.
   *
   * Use a more specific ID when possible; this remains for forward compatibility.
   */
  Unknown: 'LAY000',

  /** Failed to read an input file from disk. */
  IoReadFailed: 'LAY001',

  /** Internal invariant violation (a bug upstream, not a user error). */
  InternalError: 'LAY002',

  /** Target configuration file is malformed. */
  TargetConfigError: 'LAY003',

  /** Malformed symbol-table description. */
  InputError: 'LAY100',

  /** Two EQUIVALENCE chains place the same first storage unit at different offsets. */
  EquivalenceConflict: 'LAY300',

  /** EQUIVALENCE associates members of two different COMMON blocks. */
  CommonCrossBlock: 'LAY301',

  /** EQUIVALENCE would extend a COMMON block before its first storage unit. */
  CommonBackwardExtend: 'LAY302',

  /** EQUIVALENCE disagrees with the sequence of one COMMON block. */
  CommonEquivalenceMismatch: 'LAY303',

  /** Alignment padding inserted before a COMMON block member (informational warning). */
  CommonPadding: 'LAY310',

  /** Named COMMON block appears with different sizes. */
  CommonDistinctSizes: 'LAY311',

  /** COMMON block initialized in more than one place. */
  CommonMultipleInit: 'LAY312',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
