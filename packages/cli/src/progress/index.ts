/**
 * Progress output exports
 */

export { ProgressReporter } from './reporter.js';
export { RateMeter } from './rate-meter.js';
export { createColorFns } from './colors.js';
export { formatBoard, formatMessages } from './board-view.js';
export {
  formatConfigDisplay,
  formatDuration,
  formatEta,
  formatTileValue,
  formatScore,
  formatMoveRate,
  formatSummaryLine,
} from './formatters.js';
export type {
  ColorFn,
  ColorFunctions,
  StopReason,
  GameStartInfo,
  MoveUpdate,
  GameSummary,
  GameProgressListener,
  ProgressReporterOptions,
} from './types.js';
