import type { RunProgress, RunSummary } from "../orchestrator/run-coordinator.js";

export function printProgress(progress: RunProgress, startTime: number): void {
  const elapsed = (Date.now() - startTime) / 1000;
  const rate = elapsed > 0 ? progress.processed / elapsed : 0;
  const remaining = progress.total - progress.processed;
  const eta = rate > 0 ? remaining / rate : 0;
  const pct = progress.total > 0 ? ((progress.processed / progress.total) * 100).toFixed(1) : "100.0";

  process.stdout.write(
    `\r[${progress.processed}/${progress.total}] ${pct}% | ` +
      `ETA: ${formatDuration(eta)} | ${progress.current.slice(0, 40)}${"".padEnd(20)}`,
  );
}

export function printSummary(summary: RunSummary): void {
  console.log(summary.cancelled ? "\n\n=== Run Cancelled ===" : "\n\n=== Run Complete ===");
  console.log(`  Books found:    ${summary.total}`);
  console.log(`  Processed:      ${summary.processed}`);
  console.log(`  Filed:          ${summary.moved}`);
  console.log(`  Unresolved:     ${summary.unresolved}`);
  console.log(`  Skipped:        ${summary.skipped}`);
  console.log(`  Errors:         ${summary.errors}`);
  console.log(`  Duration:       ${formatDuration(summary.durationMs / 1000)}`);
  if (summary.report) {
    console.log(`  Action log:     ${summary.report.actions}`);
    console.log(`  Library index:  ${summary.report.libraryIndex}`);
  }
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${Math.round(seconds)}s`;
  const m = Math.floor(seconds / 60);
  const s = Math.round(seconds % 60);
  if (m < 60) return `${m}m ${s}s`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return `${h}h ${rm}m`;
}
