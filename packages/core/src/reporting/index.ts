export {
  formatDiagnostic,
  formatDurationMs,
  writeLine,
} from './formatting.js';

export type { WritableTarget } from './formatting.js';
