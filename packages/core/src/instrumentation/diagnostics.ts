export type DiagnosticLevel = 'info' | 'warn' | 'error';

/**
 * Zero-based position inside a source document.
 */
export interface DiagnosticSpanPosition {
  readonly line: number;
  readonly column: number;
}

export interface DiagnosticSpan {
  readonly start: DiagnosticSpanPosition;
  readonly end: DiagnosticSpanPosition;
}

export interface DiagnosticRelatedInformation {
  readonly message: string;
  readonly source?: string;
  readonly pointer?: string;
  readonly span?: DiagnosticSpan;
}

/**
 * Canonical diagnostic namespaces exposed as constants so emitters and tests stay consistent.
 */
export const DiagnosticCategories = {
  document: 'schema.document',
  entity: 'schema.entity',
  field: 'schema.field',
  typeResolution: 'schema.type-resolution',
  relation: 'schema.relation',
  index: 'schema.index',
  module: 'schema.module',
} as const;

/**
 * Discrete namespaces that downstream collectors can use to filter diagnostics.
 *
 * - `schema.document` – YAML syntax problems and documents that are not a mapping.
 * - `schema.entity` – Entity-level problems such as missing or duplicated kind keywords.
 * - `schema.field` – Malformed field expressions, annotations and default values.
 * - `schema.type-resolution` – Type names that cannot be found in the compiled module set.
 * - `schema.relation` – Inconsistent or incomplete relation declarations.
 * - `schema.index` – Invalid index declarations.
 * - `schema.module` – Clashes between modules (duplicate classes, tables or index names).
 */
export type DiagnosticCategory =
  | (typeof DiagnosticCategories)[keyof typeof DiagnosticCategories]
  | (string & {});

export interface DiagnosticEvent {
  readonly level: DiagnosticLevel;
  readonly message: string;
  readonly code?: string;
  readonly category?: DiagnosticCategory;
  readonly source?: string;
  readonly pointer?: string;
  readonly span?: DiagnosticSpan;
  readonly related?: readonly DiagnosticRelatedInformation[];
}

export interface DiagnosticsPort<Event = DiagnosticEvent> {
  emit(event: Event): void;
}

/**
 * Creates a diagnostics port that ignores all emitted events.
 *
 * @returns A diagnostics port implementation that performs no I/O.
 */
export function createNullDiagnosticsPort<Event = DiagnosticEvent>(): DiagnosticsPort<Event> {
  return {
    emit() {
      // Intentionally empty: default no-op diagnostics implementation.
    },
  };
}

/**
 * Accumulates diagnostics for a single compilation. Emitting never throws, so every stage can
 * report all of its findings and callers inspect the collector once the stage has finished.
 */
export class DiagnosticsCollector implements DiagnosticsPort {
  private readonly recorded: DiagnosticEvent[] = [];

  emit(event: DiagnosticEvent): void {
    this.recorded.push(Object.freeze({ ...event }));
  }

  get events(): readonly DiagnosticEvent[] {
    return this.recorded;
  }

  get errors(): readonly DiagnosticEvent[] {
    return this.recorded.filter((event) => event.level === 'error');
  }

  get warnings(): readonly DiagnosticEvent[] {
    return this.recorded.filter((event) => event.level === 'warn');
  }

  get errorCount(): number {
    return this.errors.length;
  }

  hasErrors(): boolean {
    return this.recorded.some((event) => event.level === 'error');
  }

  /**
   * Returns a frozen copy of everything recorded so far.
   */
  snapshot(): readonly DiagnosticEvent[] {
    return Object.freeze([...this.recorded]);
  }
}

/**
 * Builds a span from zero-based coordinates.
 *
 * @param startLine - Line of the first character.
 * @param startColumn - Column of the first character.
 * @param endLine - Line just after the region.
 * @param endColumn - Column just after the region.
 * @returns The diagnostic span.
 */
export function createDiagnosticSpan(
  startLine: number,
  startColumn: number,
  endLine: number,
  endColumn: number,
): DiagnosticSpan {
  return {
    start: { line: startLine, column: startColumn },
    end: { line: endLine, column: endColumn },
  };
}
