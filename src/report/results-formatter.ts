/**
 * Formatters for benchmark results in terminal, markdown and JSON form
 */

import chalk from 'chalk';
import { ConfigurationFailure, AccuracyWarning, MetricsRecord } from '../benchmarks/benchmark-types';
import { ResultsFormat } from '../types';
import { BenchmarkReport } from './report-builder';

interface Column {
  header: string;
  align: 'left' | 'right';
  cell: (record: MetricsRecord) => string;
}

function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(4)}%`;
}

function buildColumns(report: BenchmarkReport): Column[] {
  const columns: Column[] = [
    { header: 'Method', align: 'left', cell: r => r.method },
    { header: 'Threads', align: 'right', cell: r => String(r.threadCount) },
    { header: 'Time (s)', align: 'right', cell: r => r.meanElapsedSeconds.toFixed(6) },
  ];

  const { resultLabel, expectedValue } = report.benchmark;
  if (resultLabel) {
    columns.push({
      header: resultLabel,
      align: 'right',
      cell: r => (r.meanResultValue !== undefined ? r.meanResultValue.toFixed(8) : '-'),
    });
  }
  if (expectedValue !== undefined) {
    columns.push({
      header: 'Rel. Error',
      align: 'right',
      cell: r => (r.relativeError !== undefined ? formatPercent(r.relativeError) : '-'),
    });
  }

  columns.push(
    { header: 'Speedup', align: 'right', cell: r => r.speedup.toFixed(2) },
    { header: 'Efficiency', align: 'right', cell: r => r.efficiency.toFixed(2) }
  );
  return columns;
}

function formatParameters(parameters: Record<string, number>): string {
  return Object.entries(parameters)
    .map(([name, value]) => `${name}=${value}`)
    .join(', ');
}

function describeConfiguration(method: string, threadCount: number): string {
  return `${method} with ${threadCount} ${threadCount === 1 ? 'thread' : 'threads'}`;
}

function describeFailure(failure: ConfigurationFailure): string {
  const label = describeConfiguration(failure.method, failure.threadCount);
  if (failure.reason === 'baseline-unavailable') {
    return `${label}: baseline unavailable (${failure.details.join('; ')})`;
  }
  const reasons = failure.details.length > 0 ? ` (${failure.details.join('; ')})` : '';
  return `${label}: ${failure.successfulTrials}/${failure.attemptedTrials} trials succeeded${reasons}`;
}

function describeWarning(warning: AccuracyWarning): string {
  return (
    `${describeConfiguration(warning.method, warning.threadCount)}: ` +
    `${warning.flaggedTrials}/${warning.successfulTrials} trials exceeded tolerance ` +
    `(max error ${formatPercent(warning.maxRelativeError)})`
  );
}

/**
 * Lists every configuration that produced no record. Returns an empty string
 * when nothing failed.
 */
export function formatFailureSummary(
  failures: readonly ConfigurationFailure[],
  colorize: boolean = true
): string {
  if (failures.length === 0) {
    return '';
  }
  const c = colorize ? chalk : new chalk.Instance({ level: 0 });
  const lines = [c.red.bold(`Failed configurations (${failures.length}):`)];
  for (const failure of failures) {
    lines.push(`  - ${describeFailure(failure)}`);
  }
  return lines.join('\n');
}

/**
 * Formats the report as an aligned table for terminal display
 *
 * @param colorize - Whether to use colors (default: true)
 */
export function formatReportPretty(report: BenchmarkReport, colorize: boolean = true): string {
  const c = colorize ? chalk : new chalk.Instance({ level: 0 });
  const { benchmark, records } = report;
  const lines: string[] = [];

  lines.push(c.bold(`${benchmark.title} Results`));
  lines.push(c.gray('─'.repeat(40)));
  lines.push(`Parameters: ${formatParameters(benchmark.parameters)}`);
  lines.push(`Trials per configuration: ${report.options.trialsPerConfiguration}`);
  if (benchmark.expectedValue !== undefined && benchmark.relativeTolerance !== undefined) {
    lines.push(
      `Expected result: ${benchmark.expectedValue} (tolerance ${formatPercent(benchmark.relativeTolerance)})`
    );
  }
  lines.push('');

  if (records.length === 0) {
    lines.push('No successful configurations.');
  } else {
    const columns = buildColumns(report);
    const cells = records.map(record => columns.map(column => column.cell(record)));
    const widths = columns.map((column, i) =>
      Math.max(column.header.length, ...cells.map(row => row[i].length))
    );
    const renderRow = (row: string[]): string =>
      row
        .map((text, i) => (columns[i].align === 'left' ? text.padEnd(widths[i]) : text.padStart(widths[i])))
        .join('  ')
        .trimEnd();

    lines.push(c.bold(renderRow(columns.map(column => column.header))));
    for (const row of cells) {
      lines.push(renderRow(row));
    }
  }

  if (report.warnings.length > 0) {
    lines.push('');
    lines.push(c.yellow('Accuracy warnings:'));
    for (const warning of report.warnings) {
      lines.push(`  - ${describeWarning(warning)}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

/**
 * Formats the report as markdown (suitable for a GitHub Actions step summary)
 */
export function formatReportMarkdown(report: BenchmarkReport): string {
  const { benchmark, records } = report;
  const lines: string[] = [];

  lines.push(`### ${benchmark.title} Results\n`);
  lines.push(`**Parameters:** ${formatParameters(benchmark.parameters)}`);
  lines.push(`**Trials per configuration:** ${report.options.trialsPerConfiguration}`);
  lines.push(`**CPU:** ${report.environment.cpuModel} (${report.environment.cpuCount} cores)\n`);

  // failed configurations come before the table, as in the terminal output
  if (report.failures.length > 0) {
    lines.push('#### Failed configurations\n');
    for (const failure of report.failures) {
      lines.push(`- ${describeFailure(failure)}`);
    }
    lines.push('');
  }

  if (records.length === 0) {
    lines.push('No successful configurations.');
  } else {
    const columns = buildColumns(report);
    lines.push(`| ${columns.map(column => column.header).join(' | ')} |`);
    lines.push(`|${columns.map(column => (column.align === 'right' ? '---:' : '---')).join('|')}|`);
    for (const record of records) {
      lines.push(`| ${columns.map(column => column.cell(record)).join(' | ')} |`);
    }
  }

  if (report.warnings.length > 0) {
    lines.push('\n#### Accuracy warnings\n');
    for (const warning of report.warnings) {
      lines.push(`- ${describeWarning(warning)}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

/**
 * Formats the report as JSON
 */
export function formatReportJson(report: BenchmarkReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Formats the report based on the specified format
 *
 * @param colorize - Whether to use colors for pretty format
 */
export function formatReport(
  report: BenchmarkReport,
  format: ResultsFormat,
  colorize: boolean = true
): string {
  switch (format) {
    case 'json':
      return formatReportJson(report);
    case 'markdown':
      return formatReportMarkdown(report);
    case 'pretty':
    default:
      return formatReportPretty(report, colorize);
  }
}
