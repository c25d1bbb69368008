import type { ChalkInstance } from 'chalk';
import type { SimulationReport } from '@core/index';

export function formatReport(report: SimulationReport, c: ChalkInstance): string {
  const lines = [c.bold(`${report.preset}: ${report.rounds} rounds, ${report.relief}`)];
  report.counts.forEach((count, workerId) => {
    lines.push(`  monkey ${workerId}: ${count} inspections`);
  });
  const [first, second] = report.top;
  lines.push(
    `  monkey business: ${c.green(String(report.monkeyBusiness))} ` +
      c.dim(`(monkey ${first.workerId} x monkey ${second.workerId})`),
  );
  return lines.join('\n');
}

export function formatReportsJson(reports: SimulationReport[]): string {
  return JSON.stringify(reports, null, 2);
}
