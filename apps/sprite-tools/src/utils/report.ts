import type { SpriteReport } from '@pixelpet/protocol';

/**
 * One console line per sprite outcome
 */
export function formatReportLine(report: SpriteReport): string {
  const from = report.source ? ` (${report.source})` : '';

  switch (report.status) {
    case 'converted':
      return `  OK   ${report.name}: ${report.frameCount} frame(s)${from}`;
    case 'missing':
      return `  MISS ${report.name}: no source, placeholder row written${from}`;
    case 'failed':
      return `  FAIL ${report.name}: ${report.error.message}${from}`;
    case 'skipped':
      return `  SKIP ${report.name}: ${report.reason}${from}`;
  }
}

export function summarizeReports(reports: readonly SpriteReport[]): string {
  let sprites = 0;
  let frames = 0;
  for (const report of reports) {
    if (report.status !== 'converted') continue;
    sprites++;
    frames += report.frameCount;
  }
  return `Total: ${sprites} sprites processed, ${frames} frames`;
}

/**
 * Print every report line and the summary
 */
export function printReports(reports: readonly SpriteReport[]): void {
  for (const report of reports) {
    const line = formatReportLine(report);
    if (report.status === 'failed') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
  console.log(summarizeReports(reports));
}
