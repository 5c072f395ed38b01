import type { DiagnosticEvent, DiagnosticLevel } from '../instrumentation/diagnostics.js';

/**
 * Minimal interface describing a writable target suitable for reporter output streams.
 */
export interface WritableTarget {
  write(line: string): void;
}

const LINE_TERMINATOR = '\n';

const LEVEL_LABELS: Readonly<Record<DiagnosticLevel, string>> = {
  info: 'info',
  warn: 'warning',
  error: 'error',
};

/**
 * Formats a millisecond duration with a single decimal place suffix.
 *
 * @param value - Duration in milliseconds to format.
 * @returns String representation with a millisecond suffix.
 */
export function formatDurationMs(value: number): string {
  return `${value.toFixed(1)}ms`;
}

/**
 * Formats a diagnostic as `<source>:<line>:<column> <level> <message>`. Line and column are
 * printed one-based, the way editors and terminals expect them.
 *
 * @param event - Diagnostic to format.
 * @returns Single-line description of the diagnostic.
 */
export function formatDiagnostic(event: DiagnosticEvent): string {
  const location = formatDiagnosticLocation(event);
  const prefix = location ? `${location} ` : '';
  return `${prefix}${LEVEL_LABELS[event.level]} ${event.message}`;
}

function formatDiagnosticLocation(event: DiagnosticEvent): string | undefined {
  if (!event.source) {
    return undefined;
  }
  if (!event.span) {
    return event.source;
  }
  return `${event.source}:${event.span.start.line + 1}:${event.span.start.column + 1}`;
}

/**
 * Writes a plain-text line to the provided target followed by a newline terminator.
 *
 * @param target - Writable destination for the text content.
 * @param line - Text content to emit.
 */
export function writeLine(target: WritableTarget, line: string): void {
  target.write(`${line}${LINE_TERMINATOR}`);
}
