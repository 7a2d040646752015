import type { EngineLike, GenerationSummary } from './evolution.types';

/**
 * Generation telemetry: recording, the summary log line, and JSONL / CSV
 * exports.
 *
 * Summaries are kept in a bounded buffer (`options.telemetry.maxEntries`,
 * oldest dropped first). The log line is always emitted through the engine
 * logger, whether or not the buffer is enabled.
 */

/** CSV column order; matches the {@link GenerationSummary} fields. */
export const SUMMARY_COLUMNS: readonly (keyof GenerationSummary)[] = [
  'generation',
  'bestScore',
  'bestFitness',
  'meanFitness',
  'championScore',
  'championFitness',
  'mutationRate',
  'mutationStep',
  'eliteCount',
  'hallOfFameSize',
  'durationMs',
];

/**
 * One-line human summary.
 *
 * @example
 * formatSummaryLine(summary);
 * // '=== Generation 3 === bestScore(gen)=4 | championScore=6 | rate=0.180 step=0.450'
 */
export function formatSummaryLine(summary: GenerationSummary): string {
  const champion = summary.championScore === null ? '-' : String(summary.championScore);
  return (
    `=== Generation ${summary.generation} === bestScore(gen)=${summary.bestScore}` +
    ` | championScore=${champion}` +
    ` | rate=${summary.mutationRate.toFixed(3)} step=${summary.mutationStep.toFixed(3)}`
  );
}

/**
 * Buffer a summary (when telemetry is enabled) and log it.
 */
export function recordGeneration(this: EngineLike, summary: GenerationSummary): void {
  const { enabled, maxEntries } = this.options.telemetry;
  if (enabled) {
    this._telemetry.push(summary);
    if (this._telemetry.length > maxEntries) {
      this._telemetry.splice(0, this._telemetry.length - maxEntries);
    }
  }
  this.logger.info(formatSummaryLine(summary));
}

/**
 * Serialize the buffered summaries to JSON Lines, one object per line.
 */
export function exportTelemetryJSONL(this: EngineLike): string {
  return this._telemetry.map((entry) => JSON.stringify(entry)).join('\n');
}

/**
 * Export the most recent `maxEntries` summaries as CSV (header row first).
 * Missing champion values are written as empty cells.
 *
 * @returns CSV text, or an empty string when nothing is buffered.
 */
export function exportTelemetryCSV(this: EngineLike, maxEntries = 500): string {
  const recent = this._telemetry.slice(-maxEntries);
  if (!recent.length) return '';
  const lines = [SUMMARY_COLUMNS.join(',')];
  for (const entry of recent) {
    lines.push(
      SUMMARY_COLUMNS.map((column) => {
        const value = entry[column];
        return value === null ? '' : String(value);
      }).join(',')
    );
  }
  return lines.join('\n');
}
