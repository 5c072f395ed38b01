import type {
  DiagnosticCategory,
  DiagnosticLevel,
  DiagnosticSpan,
  DiagnosticsPort,
} from '@protoyard/core';

import type { SchemaDiagnosticCode } from './codes.js';

export interface SchemaIssue {
  readonly message: string;
  readonly code: SchemaDiagnosticCode;
  readonly category: DiagnosticCategory;
  readonly span?: DiagnosticSpan | undefined;
  readonly pointer?: string | undefined;
  readonly level?: DiagnosticLevel;
}

export type IssueReporter = (issue: SchemaIssue) => void;

/**
 * Binds a diagnostics port to one source document so emitters only describe the problem.
 *
 * @param diagnostics - Port receiving the diagnostics.
 * @param source - Source file name attached to every event.
 * @returns Reporter forwarding issues as error-level diagnostics unless a level is given.
 */
export function createIssueReporter(diagnostics: DiagnosticsPort, source: string): IssueReporter {
  return (issue) => {
    diagnostics.emit({
      level: issue.level ?? 'error',
      message: issue.message,
      code: issue.code,
      category: issue.category,
      source,
      ...(issue.pointer ? { pointer: issue.pointer } : {}),
      ...(issue.span ? { span: issue.span } : {}),
    });
  };
}
