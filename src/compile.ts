import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { isInternalLayoutError } from './diagnostics/internal.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type { Artifact } from './formats/types.js';
import { parseProgramDescription } from './frontend/parser.js';
import type { LayoutFn, LayoutOptions, LayoutResult, PipelineDeps } from './pipeline.js';
import { buildEnv } from './semantics/env.js';
import { computeProgramOffsets } from './semantics/offsets.js';
import type { TargetCharacteristics } from './semantics/target.js';
import { parseTargetConfig, resolveTarget } from './semantics/target.js';

function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

async function readText(
  path: string,
  what: string,
  diagnostics: Diagnostic[],
): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read ${what}: ${String(err)}`,
      file: path,
    });
    return undefined;
  }
}

/**
 * Defaults, then the target file, then explicit overrides.
 */
async function loadTarget(
  options: Pick<LayoutOptions, 'targetFile' | 'target'>,
  diagnostics: Diagnostic[],
): Promise<TargetCharacteristics> {
  let fromFile: Partial<TargetCharacteristics> | undefined;
  if (options.targetFile !== undefined) {
    const path = resolve(options.targetFile);
    const text = await readText(path, 'target configuration', diagnostics);
    if (text !== undefined) {
      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch (err) {
        diagnostics.push({
          id: DiagnosticIds.TargetConfigError,
          severity: 'error',
          message: `Invalid JSON in target configuration: ${
            err instanceof Error ? err.message : String(err)
          }`,
          file: path,
        });
      }
      if (raw !== undefined) fromFile = parseTargetConfig(raw, path, diagnostics);
    }
  }
  return resolveTarget(fromFile, options.target);
}

/**
 * Lay out the storage of every scope of a symbol-table description.
 *
 * - Diagnostics are collected rather than thrown; an inconsistent table aborts the pass with
 *   `LAY002`.
 * - Produces artifacts in-memory via `deps.formats`, and only when no error was reported.
 * - Emits the listing and the layout map unless an emit flag turns one off.
 */
export const layoutFile: LayoutFn = async (
  entryFile: string,
  options: LayoutOptions,
  deps: PipelineDeps,
): Promise<LayoutResult> => {
  const entryPath = resolve(entryFile);
  const diagnostics: Diagnostic[] = [];

  const target = await loadTarget(options, diagnostics);
  if (hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const text = await readText(entryPath, 'input file', diagnostics);
  if (text === undefined) return { diagnostics, artifacts: [], target };

  const program = parseProgramDescription(entryPath, text, diagnostics, target);
  if (!program) return { diagnostics, artifacts: [], target };

  const env = buildEnv(program, diagnostics, {
    target,
    ...(options.commonPaddingWarnings !== undefined
      ? { commonPaddingWarnings: options.commonPaddingWarnings }
      : {}),
    ...(options.distinctCommonSizeWarnings !== undefined
      ? { distinctCommonSizeWarnings: options.distinctCommonSizeWarnings }
      : {}),
  });

  try {
    computeProgramOffsets(program, env);
  } catch (err) {
    if (!isInternalLayoutError(err)) throw err;
    diagnostics.push({
      id: DiagnosticIds.InternalError,
      severity: 'error',
      message: `Internal error during layout: ${err.message}`,
      file: entryPath,
    });
  }
  if (hasErrors(diagnostics)) return { diagnostics, artifacts: [], program, target };

  const snapshot = { program, target };
  const artifacts: Artifact[] = [];
  if (options.emitListing ?? true) {
    if (deps.formats.writeListing) {
      artifacts.push(deps.formats.writeListing(snapshot));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitListing=true but no listing writer is configured; skipping .lst artifact.',
        file: entryPath,
      });
    }
  }
  if (options.emitMap ?? true) {
    artifacts.push(deps.formats.writeMap(snapshot));
  }

  return { diagnostics, artifacts, program, target };
};
