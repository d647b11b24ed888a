export { createIntegrationBenchmark, IntegrationParameters } from './numerical-integration';
export { createMatrixBenchmark, MatrixParameters } from './matrix-multiplication';
