/** Severity classes used by import and batch diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Strictness of an import: strict mode escalates warnings to errors. */
export type ImportMode = 'strict' | 'lenient';

/** Optional source location attached to a diagnostic record. */
export interface DiagnosticSource {
  name?: string;
  line: number;
  column: number;
}

/** Canonical diagnostic object emitted by import, fixture, and batch operations. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  layer?: string;
  path?: string;
  source?: DiagnosticSource;
}

/** Mutable diagnostic sink shared by the helper passes of one import. */
export interface DiagnosticContext {
  mode: ImportMode;
  sourceName?: string;
  diagnostics: Diagnostic[];
  validationFailure: boolean;
}

/** Create a diagnostic context for one import invocation. */
export function createDiagnosticContext(mode: ImportMode, sourceName?: string): DiagnosticContext {
  return {
    mode,
    sourceName,
    diagnostics: [],
    validationFailure: false
  };
}

/**
 * Record a diagnostic entry, escalating warnings to errors in strict mode.
 * All importers report through here so escalation stays uniform.
 */
export function addDiagnostic(
  ctx: DiagnosticContext,
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  details: Pick<Diagnostic, 'layer' | 'path' | 'source'> = {}
): void {
  let actualSeverity = severity;
  if (ctx.mode === 'strict' && severity === 'warning') {
    actualSeverity = 'error';
  }

  if (actualSeverity === 'error') {
    ctx.validationFailure = true;
  }

  ctx.diagnostics.push({
    code,
    severity: actualSeverity,
    message,
    ...details
  });
}

/** True when any diagnostic in the list is an error. */
export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}
