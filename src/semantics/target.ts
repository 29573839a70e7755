import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

export type TargetOs = 'linux' | 'darwin' | 'windows' | 'aix' | 'freebsd';

export const TARGET_OS_NAMES: readonly TargetOs[] = [
  'linux',
  'darwin',
  'windows',
  'aix',
  'freebsd',
];

/**
 * Characteristics of the code-generation target that affect storage layout.
 *
 * Queried by the layout pass, never computed by it.
 */
export interface TargetCharacteristics {
  os: TargetOs;
  /** No entity is aligned beyond this many bytes. */
  maxAlignment: number;
  descriptorAlignment: number;
  procedurePointerByteSize: number;
  procedurePointerAlignment: number;
  /** Kind (bytes per character) of default CHARACTER. */
  defaultCharacterKind: number;
  defaultIntegerKind: number;
  defaultRealKind: number;
}

/**
 * 64-bit Linux host.
 */
export const defaultTarget: TargetCharacteristics = {
  os: 'linux',
  maxAlignment: 8,
  descriptorAlignment: 8,
  procedurePointerByteSize: 8,
  procedurePointerAlignment: 8,
  defaultCharacterKind: 1,
  defaultIntegerKind: 4,
  defaultRealKind: 4,
};

const targetOsNames: ReadonlySet<string> = new Set<string>(TARGET_OS_NAMES);

export function isTargetOs(value: string): value is TargetOs {
  return targetOsNames.has(value);
}

export function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;
}

type NumericTargetKey = Exclude<keyof TargetCharacteristics, 'os'>;

const numericKeys: readonly NumericTargetKey[] = [
  'maxAlignment',
  'descriptorAlignment',
  'procedurePointerByteSize',
  'procedurePointerAlignment',
  'defaultCharacterKind',
  'defaultIntegerKind',
  'defaultRealKind',
];

const alignmentKeys: ReadonlySet<NumericTargetKey> = new Set([
  'maxAlignment',
  'descriptorAlignment',
  'procedurePointerAlignment',
]);

const numericKeyNames: ReadonlySet<string> = new Set<string>(numericKeys);

function isNumericKey(key: string): key is NumericTargetKey {
  return numericKeyNames.has(key);
}

/**
 * Validate a target configuration object (typically parsed from a `--target` JSON file).
 *
 * Unknown keys and bad values are reported; the valid subset is returned as overrides.
 */
export function parseTargetConfig(
  raw: unknown,
  file: string,
  diagnostics: Diagnostic[],
): Partial<TargetCharacteristics> {
  const diag = (message: string) => {
    diagnostics.push({ id: DiagnosticIds.TargetConfigError, severity: 'error', message, file });
  };

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    diag('Target configuration must be a JSON object.');
    return {};
  }

  const out: Partial<TargetCharacteristics> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key === 'os') {
      if (typeof value !== 'string' || !isTargetOs(value)) {
        const expected = TARGET_OS_NAMES.join('|');
        diag(`Unsupported target os ${JSON.stringify(value)} (expected ${expected}).`);
        continue;
      }
      out.os = value;
      continue;
    }
    if (!isNumericKey(key)) {
      diag(`Unknown target characteristic "${key}".`);
      continue;
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      diag(`Target characteristic "${key}" must be a positive integer.`);
      continue;
    }
    if (alignmentKeys.has(key) && !isPowerOfTwo(value)) {
      diag(`Target characteristic "${key}" must be a power of two (got ${value}).`);
      continue;
    }
    out[key] = value;
  }
  return out;
}

/**
 * Apply configuration layers over the defaults; later layers win.
 */
export function resolveTarget(
  ...layers: Array<Partial<TargetCharacteristics> | undefined>
): TargetCharacteristics {
  let target: TargetCharacteristics = { ...defaultTarget };
  for (const layer of layers) {
    if (layer) target = { ...target, ...layer };
  }
  return target;
}
