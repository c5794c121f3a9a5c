import { RunResult } from '@stockfeed/shared';

export function formatDuration(milliseconds: number): string {
  const seconds = Math.floor(milliseconds / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${seconds}s`;
  }
}

/**
 * Plain-text lines describing a finished run, one per symbol plus the warnings
 */
export function formatRunSummary(result: RunResult): string[] {
  const duration = formatDuration(result.finishedAt.getTime() - result.startedAt.getTime());
  const lines = [`${result.status}: ${result.rowsWritten} rows written in ${duration}`];

  for (const outcome of result.outcomes) {
    const detail = outcome.error
      ? `failed while ${outcome.error.stage} (${outcome.error.kind})`
      : `${outcome.rowsWritten} written, ${outcome.rowsSkipped} skipped`;
    lines.push(`  ${outcome.symbol}: ${detail}`);
  }

  for (const warning of result.warnings) {
    lines.push(`  warning: ${warning}`);
  }

  return lines;
}
