import { createTableDefinitions, type CompilationResult, type ProtocolDefinition } from '@protoyard/compiler';
import { formatDiagnostic, writeLine, type DiagnosticEvent, type WritableTarget } from '@protoyard/core';
import type { TableDefinition } from '@protoyard/protocol';
import stringify from 'safe-stable-stringify';

export interface CompilationSummary {
  readonly modules: number;
  readonly models: number;
  readonly errorCount: number;
  readonly warningCount: number;
}

export interface AnalyzeReport {
  readonly summary: CompilationSummary;
  readonly diagnostics: readonly DiagnosticEvent[];
}

export interface InspectedModule extends ProtocolDefinition {
  readonly tables: readonly TableDefinition[];
}

export interface InspectReport {
  readonly project: InspectedModule;
  readonly dependencies: readonly InspectedModule[];
  readonly diagnostics: readonly DiagnosticEvent[];
}

const pluralize = (count: number, noun: string): string => `${count} ${noun}${count === 1 ? '' : 's'}`;

export function summarizeCompilation(result: CompilationResult): CompilationSummary {
  const modules = [result.project, ...result.dependencies];
  return {
    modules: modules.length,
    models: modules.reduce((total, module) => total + module.models.length, 0),
    errorCount: result.diagnostics.filter((event) => event.level === 'error').length,
    warningCount: result.diagnostics.filter((event) => event.level === 'warn').length,
  };
}

export function createAnalyzeReport(result: CompilationResult): AnalyzeReport {
  return { summary: summarizeCompilation(result), diagnostics: result.diagnostics };
}

/**
 * Attaches the projected tables to every compiled module. Enums declared by any module of the
 * compilation are visible to every other module's column defaults.
 */
export function createInspectReport(result: CompilationResult): InspectReport {
  const modules = [result.project, ...result.dependencies];
  const inspect = (protocol: ProtocolDefinition): InspectedModule => ({
    ...protocol,
    tables: createTableDefinitions(
      protocol,
      modules.filter((module) => module !== protocol),
    ),
  });

  return {
    project: inspect(result.project),
    dependencies: result.dependencies.map((protocol) => inspect(protocol)),
    diagnostics: result.diagnostics,
  };
}

/**
 * Serialises a report with sorted keys so the output is stable across runs.
 */
export function formatJsonReport(report: AnalyzeReport | InspectReport): string {
  return `${stringify(report, null, 2)}\n`;
}

/**
 * Writes one line per diagnostic followed by a summary line.
 */
export function writeHumanReport(result: CompilationResult, target: WritableTarget): void {
  for (const event of result.diagnostics) {
    writeLine(target, formatDiagnostic(event));
  }

  const summary = summarizeCompilation(result);
  writeLine(
    target,
    `Analyzed ${pluralize(summary.models, 'model')} in ${pluralize(summary.modules, 'module')}: ` +
      `${pluralize(summary.errorCount, 'error')}, ${pluralize(summary.warningCount, 'warning')}.`,
  );
}
