import type { DiagnosticId, DiagnosticNote, DiagnosticSeverity } from '../diagnostics/types.js';
import type { SourceSpan } from '../frontend/symbols.js';
import type { LayoutEnv } from './env.js';

function location(
  env: LayoutEnv,
  span?: SourceSpan,
): { file: string; line?: number; column?: number } {
  if (!span) return { file: env.file };
  return { file: span.file, line: span.start.line, column: span.start.column };
}

export function noteAt(env: LayoutEnv, message: string, span?: SourceSpan): DiagnosticNote {
  return { message, ...location(env, span) };
}

export function report(
  env: LayoutEnv,
  id: DiagnosticId,
  severity: DiagnosticSeverity,
  message: string,
  span?: SourceSpan,
  notes?: DiagnosticNote[],
): void {
  env.diagnostics.push({
    id,
    severity,
    message,
    ...location(env, span),
    ...(notes && notes.length > 0 ? { notes } : {}),
  });
}
