/**
 * Loader for YAML harness configuration files
 *
 * Example:
 * ```yaml
 * threads: [1, 2, 4, 8]
 * runs: 5
 * timeoutSeconds: 45
 * integration:
 *   executable: ./build/numerical-integration
 *   dx: 0.00001
 * matmul:
 *   matrixSize: 2048
 *   blockSize: 256
 * ```
 */

import * as fs from 'fs';
import { load } from 'js-yaml';
import { LogLevel, ResultsFormat, isLogLevel, isResultsFormat } from '../types';

export interface IntegrationFileConfig {
  executable?: string;
  x1?: number;
  x2?: number;
  dx?: number;
  expectedValue?: number;
  relativeTolerance?: number;
}

export interface MatrixFileConfig {
  executable?: string;
  matrixSize?: number;
  blockSize?: number;
}

export interface ConfigFile {
  threads?: number[];
  runs?: number;
  warmup?: number;
  timeoutSeconds?: number;
  minSuccesses?: number;
  format?: ResultsFormat;
  output?: string;
  logLevel?: LogLevel;
  integration?: IntegrationFileConfig;
  matmul?: MatrixFileConfig;
}

export class ConfigFileError extends Error {
  constructor(filePath: string, message: string) {
    super(`Invalid config file ${filePath}: ${message}`);
    this.name = 'ConfigFileError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class FieldReader {
  constructor(
    private readonly filePath: string,
    private readonly source: Record<string, unknown>,
    private readonly prefix: string
  ) {}

  private fail(key: string, expected: string): never {
    throw new ConfigFileError(this.filePath, `"${this.prefix}${key}" must be ${expected}`);
  }

  number(key: string): number | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.fail(key, 'a finite number');
    }
    return value;
  }

  positiveInteger(key: string, allowZero = false): number | undefined {
    const value = this.number(key);
    if (value !== undefined && (!Number.isInteger(value) || value < (allowZero ? 0 : 1))) {
      this.fail(key, allowZero ? 'a non-negative integer' : 'a positive integer');
    }
    return value;
  }

  string(key: string): string | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string' || value.trim() === '') {
      this.fail(key, 'a non-empty string');
    }
    return value;
  }

  threadList(key: string): number[] | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!Array.isArray(value) || value.length === 0) {
      this.fail(key, 'a non-empty list of thread counts');
    }
    return value.map(entry => {
      if (typeof entry !== 'number' || !Number.isInteger(entry) || entry < 1) {
        this.fail(key, 'a list of positive integers');
      }
      return entry;
    });
  }

  section(key: string): FieldReader | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!isRecord(value)) {
      this.fail(key, 'a mapping');
    }
    return new FieldReader(this.filePath, value, `${this.prefix}${key}.`);
  }
}

/**
 * Parses and validates YAML configuration text
 *
 * @param filePath - Used in error messages only
 * @throws ConfigFileError on YAML syntax errors or invalid values
 */
export function parseConfigFile(content: string, filePath: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = load(content);
  } catch (error) {
    throw new ConfigFileError(filePath, error instanceof Error ? error.message : String(error));
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigFileError(filePath, 'top level must be a mapping');
  }

  const root = new FieldReader(filePath, parsed, '');

  const format = root.string('format');
  if (format !== undefined && !isResultsFormat(format)) {
    throw new ConfigFileError(filePath, `unknown format "${format}"`);
  }
  const logLevel = root.string('logLevel');
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigFileError(filePath, `unknown log level "${logLevel}"`);
  }

  const config: ConfigFile = {
    threads: root.threadList('threads'),
    runs: root.positiveInteger('runs'),
    warmup: root.positiveInteger('warmup', true),
    timeoutSeconds: root.number('timeoutSeconds'),
    minSuccesses: root.positiveInteger('minSuccesses'),
    format,
    output: root.string('output'),
    logLevel,
  };
  if (config.timeoutSeconds !== undefined && config.timeoutSeconds <= 0) {
    throw new ConfigFileError(filePath, '"timeoutSeconds" must be positive');
  }

  const integration = root.section('integration');
  if (integration) {
    config.integration = {
      executable: integration.string('executable'),
      x1: integration.number('x1'),
      x2: integration.number('x2'),
      dx: integration.number('dx'),
      expectedValue: integration.number('expectedValue'),
      relativeTolerance: integration.number('relativeTolerance'),
    };
  }

  const matmul = root.section('matmul');
  if (matmul) {
    config.matmul = {
      executable: matmul.string('executable'),
      matrixSize: matmul.positiveInteger('matrixSize'),
      blockSize: matmul.positiveInteger('blockSize'),
    };
  }

  return config;
}

/**
 * Reads a YAML configuration file from disk
 *
 * @throws Error if the file doesn't exist, ConfigFileError if it is invalid
 */
export function loadConfigFile(filePath: string): ConfigFile {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }
  return parseConfigFile(fs.readFileSync(filePath, 'utf-8'), filePath);
}
