/**
 * Domain Error Types
 *
 * ドメインエラーの型定義。option-tのResult型と組み合わせて使用する。
 * タグ付きユニオン型により、エラーの種類を型安全に区別できる。
 */

import type { ProcessorId } from './branded.ts';

// ===== Control Errors =====

export type ControlError =
  | InvalidAlgorithmError
  | InvalidProcessorCountError
  | InvalidTaskParametersError
  | InvalidProcessorSpeedError
  | ProcessorNotFoundError;

export interface InvalidAlgorithmError {
  readonly type: 'InvalidAlgorithmError';
  readonly name: string;
  readonly message: string;
}

export interface InvalidProcessorCountError {
  readonly type: 'InvalidProcessorCountError';
  readonly count: number;
  readonly message: string;
}

export interface InvalidTaskParametersError {
  readonly type: 'InvalidTaskParametersError';
  readonly load: number;
  readonly executionTime: number;
  readonly details: string;
  readonly message: string;
}

export interface InvalidProcessorSpeedError {
  readonly type: 'InvalidProcessorSpeedError';
  readonly speed: number;
  readonly message: string;
}

export interface ProcessorNotFoundError {
  readonly type: 'ProcessorNotFoundError';
  readonly processorId: ProcessorId;
  readonly message: string;
}

// ControlError コンストラクタ
export const invalidAlgorithm = (name: string, known: readonly string[]): InvalidAlgorithmError => ({
  type: 'InvalidAlgorithmError',
  name,
  message: `Unknown algorithm: ${name} (expected one of ${known.join(', ')})`,
});

export const invalidProcessorCount = (count: number): InvalidProcessorCountError => ({
  type: 'InvalidProcessorCountError',
  count,
  message: `Invalid processor count: ${count} (must be an integer >= 1)`,
});

export const invalidTaskParameters = (
  load: number,
  executionTime: number,
  details: string,
): InvalidTaskParametersError => ({
  type: 'InvalidTaskParametersError',
  load,
  executionTime,
  details,
  message: `Invalid task parameters (load=${load}, executionTime=${executionTime}): ${details}`,
});

export const invalidProcessorSpeed = (speed: number): InvalidProcessorSpeedError => ({
  type: 'InvalidProcessorSpeedError',
  speed,
  message: `Invalid processing speed: ${speed} (must be a finite number >= 0)`,
});

export const processorNotFound = (processorId: ProcessorId): ProcessorNotFoundError => ({
  type: 'ProcessorNotFoundError',
  processorId,
  message: `Processor not found: ${processorId}`,
});

// ===== Config Errors =====

export type ConfigError =
  | ConfigFileNotFoundError
  | ConfigFileExistsError
  | ConfigParseError
  | ConfigValidationError;

export interface ConfigFileNotFoundError {
  readonly type: 'ConfigFileNotFoundError';
  readonly filePath: string;
  readonly message: string;
}

export interface ConfigFileExistsError {
  readonly type: 'ConfigFileExistsError';
  readonly filePath: string;
  readonly message: string;
}

export interface ConfigParseError {
  readonly type: 'ConfigParseError';
  readonly filePath: string;
  readonly cause?: unknown;
  readonly message: string;
}

export interface ConfigValidationError {
  readonly type: 'ConfigValidationError';
  readonly filePath?: string;
  readonly details: string;
  readonly message: string;
}

// ConfigError コンストラクタ
export const configFileNotFound = (filePath: string): ConfigFileNotFoundError => ({
  type: 'ConfigFileNotFoundError',
  filePath,
  message: `Configuration file not found: ${filePath}`,
});

export const configFileExists = (filePath: string): ConfigFileExistsError => ({
  type: 'ConfigFileExistsError',
  filePath,
  message: `Configuration file already exists: ${filePath}`,
});

export const configParseError = (filePath: string, cause?: unknown): ConfigParseError => ({
  type: 'ConfigParseError',
  filePath,
  cause,
  message: `Failed to parse configuration file: ${filePath}${cause instanceof Error ? `\n${cause.message}` : ''}`,
});

export const configValidationError = (details: string, filePath?: string): ConfigValidationError => ({
  type: 'ConfigValidationError',
  filePath,
  details,
  message: `Configuration validation failed${filePath ? ` (${filePath})` : ''}: ${details}`,
});
