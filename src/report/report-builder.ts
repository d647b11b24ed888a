/**
 * Assembles the report handed to the formatters
 */

import * as os from 'os';
import {
  AccuracyWarning,
  BenchmarkSpec,
  ConfigurationFailure,
  ExperimentOptions,
  ExperimentResult,
  MetricsRecord,
} from '../benchmarks/benchmark-types';

export interface HostEnvironment {
  os: string;
  nodeVersion: string;
  cpuModel: string;
  cpuCount: number;
  totalMemoryMb: number;
}

/**
 * Complete results of one benchmark run
 */
export interface BenchmarkReport {
  /** Report version for future compatibility */
  version: string;
  benchmark: {
    id: string;
    title: string;
    executable: string;
    parameters: Record<string, number>;
    threadCounts: number[];
    resultLabel?: string;
    expectedValue?: number;
    relativeTolerance?: number;
  };
  options: ExperimentOptions;
  environment: HostEnvironment;
  records: readonly MetricsRecord[];
  failures: readonly ConfigurationFailure[];
  warnings: readonly AccuracyWarning[];
  generatedAt: string;
}

function getCpuModel(): string {
  const cpus = os.cpus();
  return cpus.length > 0 ? cpus[0].model : 'unknown';
}

export function collectEnvironment(): HostEnvironment {
  return {
    os: `${os.type()} ${os.release()}`,
    nodeVersion: process.version,
    cpuModel: getCpuModel(),
    cpuCount: os.cpus().length,
    totalMemoryMb: Math.round(os.totalmem() / (1024 * 1024)),
  };
}

export function buildReport(
  spec: BenchmarkSpec,
  options: ExperimentOptions,
  result: ExperimentResult,
  environment: HostEnvironment = collectEnvironment(),
  generatedAt: Date = new Date()
): BenchmarkReport {
  return {
    version: '1.0.0',
    benchmark: {
      id: spec.id,
      title: spec.title,
      executable: spec.executable,
      parameters: { ...spec.parameters },
      threadCounts: [...spec.threadCounts],
      resultLabel: spec.resultLabel,
      expectedValue: spec.accuracy?.expectedValue,
      relativeTolerance: spec.accuracy?.relativeTolerance,
    },
    options: { ...options },
    environment,
    records: result.records,
    failures: result.failures,
    warnings: result.warnings,
    generatedAt: generatedAt.toISOString(),
  };
}
