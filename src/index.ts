export { layoutFile } from './compile.js';
export type { LayoutFn, LayoutOptions, LayoutResult, PipelineDeps } from './pipeline.js';

export type { Diagnostic, DiagnosticId, DiagnosticNote } from './diagnostics/types.js';
export { DiagnosticIds } from './diagnostics/types.js';
export { isInternalLayoutError } from './diagnostics/internal.js';

export type * from './frontend/symbols.js';
export {
  commonBlockLabel,
  commonBlocksByName,
  makeScope,
  SCOPE_KIND_NAMES,
  symbolAt,
} from './frontend/symbols.js';
export type { DefaultKinds } from './frontend/parser.js';
export { implicitType, parseProgramDescription, parseTypeSpec } from './frontend/parser.js';

export type { AlignmentOverride, AlignmentPolicy } from './semantics/alignment.js';
export {
  align,
  bindCAggregatePolicy,
  naturalAlignmentPolicy,
  selectAlignmentPolicy,
} from './semantics/alignment.js';
export type { CommonBlockMap } from './semantics/common.js';
export { createCommonBlockMap, layoutCommonBlock } from './semantics/common.js';
export type { BuildEnvOptions, LayoutEnv, LayoutSwitches } from './semantics/env.js';
export { buildEnv } from './semantics/env.js';
export type { Dependency, EquivalenceLayout } from './semantics/equivalence.js';
export {
  computeEquivalenceOffset,
  designatorAt,
  resolveEquivalenceSets,
} from './semantics/equivalence.js';
export type { LayoutCursor } from './semantics/layout.js';
export { createCursor, extendBlockBase, placeSymbol } from './semantics/layout.js';
export { computeOffsets, computeProgramOffsets } from './semantics/offsets.js';
export type { SizeAndAlignment, TypeSizeOracle } from './semantics/sizing.js';
export { createTypeSizeOracle, getSizeAndAlignment } from './semantics/sizing.js';
export type { TargetCharacteristics, TargetOs } from './semantics/target.js';
export { defaultTarget, parseTargetConfig, resolveTarget } from './semantics/target.js';

export type * from './formats/types.js';
export { defaultFormatWriters } from './formats/index.js';
