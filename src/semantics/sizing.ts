import type { DimSpec, Scope, SymbolNode, SymbolTable, TypeSpec } from '../frontend/symbols.js';
import type { LayoutEnv } from './env.js';

export interface SizeAndAlignment {
  size: number;
  alignment: number;
}

/**
 * Type characterization service: sizes plain data objects and runtime descriptors.
 */
export interface TypeSizeOracle {
  /**
   * Size and alignment of a data object: the whole object when `entire`, else one element.
   * `undefined` when the size is not a compile-time constant.
   */
  measure(symbol: SymbolNode, entire: boolean): SizeAndAlignment | undefined;
  descriptorSize(rank: number, addendum: boolean, lenParams: number): number;
}

const DESCRIPTOR_HEADER_BYTES = 24;
const DESCRIPTOR_DIMENSION_BYTES = 24;
const ADDENDUM_HEADER_BYTES = 8;
const LEN_PARAMETER_BYTES = 8;

/**
 * Upper bound on the size of a runtime descriptor.
 *
 * Header (base address, element length, version/rank/type/attribute bytes), one triple per
 * dimension, and an addendum (type description pointer + LEN parameter values) when needed.
 */
export function maxDescriptorSizeInBytes(
  rank: number,
  addendum: boolean,
  lenParams: number,
): number {
  let bytes = DESCRIPTOR_HEADER_BYTES + rank * DESCRIPTOR_DIMENSION_BYTES;
  if (addendum || lenParams > 0) {
    bytes += ADDENDUM_HEADER_BYTES + lenParams * LEN_PARAMETER_BYTES;
  }
  return bytes;
}

/**
 * Objects whose shape, allocation status or dynamic type live in a runtime descriptor.
 */
export function isDescriptor(symbol: SymbolNode): boolean {
  if (symbol.details.kind !== 'Object') return false;
  if (symbol.attrs.has('allocatable') || symbol.attrs.has('pointer')) return true;
  if (symbol.shape.some((d) => d.kind === 'Deferred' || d.kind === 'AssumedShape')) return true;
  const type = symbol.type;
  return (
    type?.kind === 'UnlimitedPolymorphic' || (type?.kind === 'DerivedType' && type.polymorphic)
  );
}

function realStorage(typeKind: number): SizeAndAlignment | undefined {
  switch (typeKind) {
    case 2:
    case 3:
      return { size: 2, alignment: 2 };
    case 4:
    case 8:
      return { size: typeKind, alignment: typeKind };
    case 10:
    case 16:
      return { size: 16, alignment: 16 };
    default:
      return undefined;
  }
}

function intrinsicStorage(
  type: Extract<TypeSpec, { kind: 'IntrinsicType' }>,
): SizeAndAlignment | undefined {
  switch (type.category) {
    case 'integer':
    case 'logical':
      return [1, 2, 4, 8, 16].includes(type.typeKind)
        ? { size: type.typeKind, alignment: type.typeKind }
        : undefined;
    case 'real':
      return realStorage(type.typeKind);
    case 'complex': {
      const part = realStorage(type.typeKind);
      return part ? { size: 2 * part.size, alignment: part.alignment } : undefined;
    }
    case 'character':
      if (type.length === undefined || ![1, 2, 4].includes(type.typeKind)) return undefined;
      return { size: type.typeKind * Math.max(0, type.length), alignment: type.typeKind };
  }
}

/**
 * Number of elements of an explicit-shape array (1 for scalars); `undefined` otherwise.
 */
export function elementCount(shape: DimSpec[]): number | undefined {
  let count = 1;
  for (const dim of shape) {
    if (dim.kind !== 'Explicit') return undefined;
    count *= Math.max(0, dim.upper - dim.lower + 1);
  }
  return count;
}

/**
 * Default oracle: intrinsic types by kind, derived types by the finalized size of their type scope.
 *
 * `ensureLayout` lays out a type scope that has not been processed yet; a type scope that is still
 * in progress (a type that contains itself) is not measurable.
 */
export function createTypeSizeOracle(
  table: SymbolTable,
  ensureLayout: (scope: Scope) => void,
): TypeSizeOracle {
  const elementStorage = (type: TypeSpec | undefined): SizeAndAlignment | undefined => {
    if (!type) return undefined;
    switch (type.kind) {
      case 'IntrinsicType':
        return intrinsicStorage(type);
      case 'DerivedType': {
        const scope = table.derivedTypes.get(type.name);
        if (!scope) return undefined;
        if (scope.status === 'unprocessed') ensureLayout(scope);
        if (scope.status !== 'done') return undefined;
        return { size: scope.size, alignment: scope.alignment };
      }
      case 'UnlimitedPolymorphic':
        return undefined;
    }
  };

  return {
    measure(symbol, entire) {
      const element = elementStorage(symbol.type);
      if (!element || !entire) return element;
      const count = elementCount(symbol.shape);
      if (count === undefined) return undefined;
      return { size: element.size * count, alignment: element.alignment };
    },
    descriptorSize(rank, addendum, lenParams) {
      return maxDescriptorSizeInBytes(rank, addendum, lenParams);
    },
  };
}

/**
 * Size and alignment of any symbol, by class:
 * descriptor entities, procedure pointers, procedures and other non-storage symbols (zero), data
 * objects (the oracle; zero when unmeasurable).
 */
export function getSizeAndAlignment(
  env: LayoutEnv,
  symbol: SymbolNode,
  entire: boolean,
): SizeAndAlignment {
  if (isDescriptor(symbol)) {
    const type = symbol.type;
    const derived =
      type?.kind === 'DerivedType' ? env.table.derivedTypes.get(type.name) : undefined;
    const lenParams = derived?.lenParameterCount ?? 0;
    const addendum = type?.kind === 'DerivedType' || type?.kind === 'UnlimitedPolymorphic';
    return {
      size: env.oracle.descriptorSize(symbol.shape.length, addendum, lenParams),
      alignment: env.target.descriptorAlignment,
    };
  }
  switch (symbol.details.kind) {
    case 'ProcPointer':
      return {
        size: env.target.procedurePointerByteSize,
        alignment: env.target.procedurePointerAlignment,
      };
    case 'Object':
      return env.oracle.measure(symbol, entire) ?? { size: 0, alignment: 0 };
    default:
      return { size: 0, alignment: 0 };
  }
}

/**
 * Bytes per character for substring offsets: the kind of the symbol's intrinsic type, else the
 * target's default character kind.
 */
export function characterKindWidth(env: LayoutEnv, symbol: SymbolNode): number {
  const type = symbol.type;
  return type?.kind === 'IntrinsicType' ? type.typeKind : env.target.defaultCharacterKind;
}
