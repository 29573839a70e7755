#!/usr/bin/env node
import { readFileSync, realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { layoutFile } from './compile.js';
import type { Diagnostic, DiagnosticNote } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import type { TargetCharacteristics } from './semantics/target.js';
import { isPowerOfTwo, isTargetOs, TARGET_OS_NAMES } from './semantics/target.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  emitListing: boolean;
  emitMap: boolean;
  targetFile?: string;
  target: Partial<TargetCharacteristics>;
  commonPaddingWarnings: boolean;
};

function usage(): string {
  return [
    'offlay [options] <input.json>',
    '',
    'Options:',
    '  -o, --output <file>   Artifact base path (extension is dropped)',
    '  -n, --nolist          Suppress .lst',
    '      --nomap           Suppress .layout.json',
    `      --os <name>       Target operating system: ${TARGET_OS_NAMES.join('|')}`,
    '      --max-align <n>   Maximum alignment in bytes (power of two)',
    '      --target <file>   Target characteristics JSON file',
    '      --no-padding-warn Do not warn about padding inside COMMON blocks',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <input.json> must be the last argument.',
    '  - Artifacts are written next to the input unless --output names another base.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function packageVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts when run from sources, dist/src/cli.js when built.
  const candidates = [
    resolve(here, '..', 'package.json'),
    resolve(here, '..', '..', 'package.json'),
  ];
  for (const candidate of candidates) {
    let text: string;
    try {
      text = readFileSync(candidate, 'utf8');
    } catch {
      continue;
    }
    const pkg: unknown = JSON.parse(text);
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg) {
      return String(pkg.version);
    }
  }
  return '0.0.0';
}

function optionValue(argv: string[], i: number, flag: string): { value: string; next: number } {
  const a = argv[i] ?? '';
  if (a.startsWith(`${flag}=`)) {
    const value = a.slice(flag.length + 1);
    if (!value) fail(`${flag} expects a value`);
    return { value, next: i };
  }
  const value = argv[i + 1];
  if (!value) fail(`${a} expects a value`);
  return { value, next: i + 1 };
}

function matches(a: string, ...flags: string[]): boolean {
  return flags.some((f) => a === f || (f.startsWith('--') && a.startsWith(`${f}=`)));
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let emitListing = true;
  let emitMap = true;
  let targetFile: string | undefined;
  const target: Partial<TargetCharacteristics> = {};
  let commonPaddingWarnings = true;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${packageVersion()}\n`);
      return { code: 0 };
    }
    if (matches(a, '-o', '--output')) {
      const { value, next } = optionValue(argv, i, '--output');
      outputPath = value;
      i = next;
      continue;
    }
    if (a === '-n' || a === '--nolist') {
      emitListing = false;
      continue;
    }
    if (a === '--nomap') {
      emitMap = false;
      continue;
    }
    if (matches(a, '--os')) {
      const { value, next } = optionValue(argv, i, '--os');
      if (!isTargetOs(value)) {
        fail(`Unsupported --os "${value}" (expected ${TARGET_OS_NAMES.join('|')})`);
      }
      target.os = value;
      i = next;
      continue;
    }
    if (matches(a, '--max-align')) {
      const { value, next } = optionValue(argv, i, '--max-align');
      const n = Number(value);
      if (!/^\d+$/.test(value) || !isPowerOfTwo(n)) {
        fail(`--max-align expects a power of two (got "${value}")`);
      }
      target.maxAlignment = n;
      i = next;
      continue;
    }
    if (matches(a, '--target')) {
      const { value, next } = optionValue(argv, i, '--target');
      targetFile = value;
      i = next;
      continue;
    }
    if (a === '--no-padding-warn') {
      commonPaddingWarnings = false;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <input.json> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <input.json> argument (and it must be last)`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    emitListing,
    emitMap,
    ...(targetFile ? { targetFile } : {}),
    target,
    commonPaddingWarnings,
  };
}

function artifactBase(entryFile: string, outputPath?: string): string {
  const path = resolve(outputPath ?? entryFile);
  const ext = extname(path);
  return ext.length > 0 ? path.slice(0, -ext.length) : path;
}

async function writeArtifacts(base: string, artifacts: Artifact[]): Promise<void> {
  const lstPath = `${base}.lst`;
  const mapPath = `${base}.layout.json`;
  await mkdir(dirname(base), { recursive: true });

  const writes: Array<Promise<void>> = [];
  let primaryPath: string | undefined;
  for (const artifact of artifacts) {
    if (artifact.kind === 'lst') {
      writes.push(writeFile(lstPath, artifact.text, 'utf8'));
      if (primaryPath === undefined) primaryPath = lstPath;
    } else {
      writes.push(writeFile(mapPath, JSON.stringify(artifact.json, null, 2) + '\n', 'utf8'));
      primaryPath = mapPath;
    }
  }
  await Promise.all(writes);

  if (primaryPath !== undefined) process.stdout.write(`${primaryPath}\n`);
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

function location(d: Diagnostic | DiagnosticNote): string {
  if (d.line === undefined) return d.file;
  return d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : `${d.file}:${d.line}`;
}

/**
 * Render one diagnostic and its notes as stderr lines.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const lines = [`${location(d)}: ${d.severity}: [${d.id}] ${d.message}`];
  for (const note of d.notes ?? []) {
    lines.push(`  ${location(note)}: note: ${note.message}`);
  }
  return lines.map((l) => `${l}\n`).join('');
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const base = artifactBase(parsed.entryFile, parsed.outputPath);

    const res = await layoutFile(
      parsed.entryFile,
      {
        ...(parsed.targetFile ? { targetFile: parsed.targetFile } : {}),
        target: parsed.target,
        emitListing: parsed.emitListing,
        emitMap: parsed.emitMap,
        commonPaddingWarnings: parsed.commonPaddingWarnings,
      },
      { formats: defaultFormatWriters },
    );

    for (const d of [...res.diagnostics].sort(compareDiagnosticsForCli)) {
      process.stderr.write(formatDiagnostic(d));
    }

    if (res.diagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    await writeArtifacts(base, res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`offlay: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function stripExtendedWindowsPrefix(path: string): string {
  if (path.startsWith('\\\\?\\UNC\\')) return `\\\\${path.slice(8)}`;
  if (path.startsWith('\\\\?\\')) return path.slice(4);
  return path;
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const stripped = stripExtendedWindowsPrefix(real);
  const normalized = stripped.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  const invoked = normalizePathForCompare(invokedAs);
  const normalizedSelf = normalizePathForCompare(self);
  if (invoked === normalizedSelf) return true;
  // Windows CI can surface different canonical path spellings for the same file.
  return invoked.endsWith('/dist/src/cli.js') && normalizedSelf.endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
