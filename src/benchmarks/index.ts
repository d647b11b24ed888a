/**
 * Benchmark orchestration and statistics engine
 */

export * from './benchmark-types';
export { defineBenchmark, orderVariants } from './benchmark-spec';
export { LaunchError, BenchmarkSpecError, AccuracyPreconditionError, MissingBaselineError } from './errors';
export { runProcess, ProcessOutcome, ProcessRunner, RunProcessOptions } from './process-runner';
export { parseResultLine, ParseResult, ParseError } from './result-parser';
export { validateAccuracy } from './accuracy-validator';
export { createTrialInvoker, buildKernelArgs, describeTrialFailure, TrialInvokerOptions } from './trial-invoker';
export { mean } from './sample-stats';
export { aggregateTrials, AggregationPolicy } from './trial-aggregator';
export { computeMetrics, findBaseline, BaselineMap } from './metrics-engine';
export { runExperiment, ExperimentDependencies } from './experiment-driver';
