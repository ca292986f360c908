/**
 * Common types and interfaces for the automark core library
 */

// Package metadata types

/**
 * Opaque package identifier. Only equality and ordering are interpreted.
 */
export type PackageName = string;

export interface DependencyRecord {
  name: PackageName;

  /**
   * Union of every dependency field's targets.
   * Version constraints are discarded and alternatives (`a | b`) are
   * flattened into independent members.
   */
  dependencies: Set<PackageName>;

  /** Virtual names this package satisfies, in declaration order */
  providedNames: PackageName[];
}

export type PackageRecords = Map<PackageName, DependencyRecord>;

export interface RecordParserOptions {
  /** Labels whose values are unioned into the dependency set */
  dependencyFields?: readonly string[];
  /** Label holding the provided virtual names */
  providesField?: string;
}

// Detection result types

export interface CycleGroup {
  /** Sorted, non-empty */
  members: PackageName[];
  /** Members joined for display, e.g. "a, b" */
  label: string;
}

export interface ReductionResult {
  /** Removed names, in removal order */
  acyclic: PackageName[];
  /** Names removed by each fixed-point pass */
  passes: PackageName[][];
}

export interface DetectionResult {
  recordCount: number;
  virtualEdges: number;
  passes: PackageName[][];
  acyclic: PackageName[];
  residual: PackageName[];
  cycles: CycleGroup[];
  nodes: PackageName[];
}

export type PackageStatus = 'acyclic' | 'cyclic';

export interface PackageStatusEntry {
  name: PackageName;
  status: PackageStatus;
}

// Configuration types

export interface AutomarkConfig {
  dependencyFields: string[];
  providesField: string;
  columns?: number;
}

// Command result

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// Error types
export class AutomarkError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AutomarkError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  CYCLE_INCONSISTENCY = 'CYCLE_INCONSISTENCY'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
