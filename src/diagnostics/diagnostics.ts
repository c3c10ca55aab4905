export type DiagnosticCode =
  | 'STRUCTURAL_ERROR'
  | 'TYPE_ERROR'
  | 'SAFETY_ERROR'
  | 'OWNER_PATH_ERROR'
  | 'SYMBOL_COLLISION';

export type Diagnostic = {
  code: DiagnosticCode;
  message: string;
  /** Name of the offending declaration, when it has one. */
  item: string | null;
  line: number;
  file?: string;
};

export function diagnostic(
  code: DiagnosticCode,
  message: string,
  item: string | null,
  line: number,
): Diagnostic {
  return { code, message, item, line };
}

function escapeRustString(s: string): string {
  return s.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/** The Rust item substituted for a declaration that failed to generate. */
export function renderCompileError(d: Diagnostic): string {
  return `compile_error!("${escapeRustString(d.message)}");`;
}

export function formatDiagnostic(d: Diagnostic): string {
  const where = d.file ? `${d.file}:${d.line}` : `line ${d.line}`;
  return `- ${d.code} at ${where}: ${d.message}`;
}

/** Thrown by file-level generation when any declaration failed. */
export class BindingDiagnosticsError extends Error {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    super(
      `Binding generation failed with ${diagnostics.length} diagnostic(s):\n` +
        diagnostics.map(formatDiagnostic).join('\n'),
    );
    this.name = 'BindingDiagnosticsError';
    this.diagnostics = diagnostics;
  }
}
