/**
 * Schema Validation with Zod
 * Runtime validation for the JSON files the toolset reads
 */

import { z } from 'zod';
import type { BenchmarkConfig } from './benchmark-config.schema';
import type { Verification, VerificationMessage } from '../types/verification';

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
}

function parseJson<T>(json: string, validate: (data: unknown) => ValidationResult<T>): ValidationResult<T> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
  return validate(data);
}

// =============================================================================
// Benchmark Config Schema
// =============================================================================

const benchmarkTestConfigSchema = z.object({
  approach: z.string().optional(),
  classification: z.string().optional(),
  database: z.string().optional(),
  framework: z.string().optional(),
  language: z.string().optional(),
  flavor: z.string().optional(),
  orm: z.string().optional(),
  platform: z.string().optional(),
  webserver: z.string().optional(),
  os: z.string().optional(),
  database_os: z.string().optional(),
  display_name: z.string().optional(),
  notes: z.string().optional(),
  versus: z.string().optional(),
  port: z.number().int().positive().optional(),
  tags: z.array(z.string()).default([]),
  json_url: z.string().optional(),
  plaintext_url: z.string().optional(),
  db_url: z.string().optional(),
  query_url: z.string().optional(),
  fortune_url: z.string().optional(),
  update_url: z.string().optional(),
  cached_query_url: z.string().optional(),
});

const benchmarkConfigSchema = z.object({
  framework: z.string().min(1, 'Framework name cannot be empty'),
  tests: z.array(z.record(benchmarkTestConfigSchema)).min(1, 'At least one test is required'),
});

/**
 * Validate a parsed benchmark_config.json
 */
export function validateBenchmarkConfig(data: unknown): ValidationResult<BenchmarkConfig> {
  const result = benchmarkConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Parse benchmark_config.json contents
 */
export function parseBenchmarkConfig(json: string): ValidationResult<BenchmarkConfig> {
  return parseJson(json, validateBenchmarkConfig);
}

// =============================================================================
// Verification Schema
// =============================================================================

const verificationMessageSchema = z
  .object({
    shortMessage: z.string().min(1, 'Short message cannot be empty'),
    message: z.string().optional(),
  })
  .transform(
    (entry): VerificationMessage => ({
      shortMessage: entry.shortMessage,
      message: entry.message ?? entry.shortMessage,
    })
  );

const verificationSchema = z.object({
  frameworkName: z.string().min(1, 'Framework name cannot be empty'),
  typeName: z.string().min(1, 'Type name cannot be empty'),
  errors: z.array(verificationMessageSchema).default([]),
  warnings: z.array(verificationMessageSchema).default([]),
});

const verificationListSchema = z.array(verificationSchema);

/**
 * Validate a parsed list of verification outcomes
 */
export function validateVerifications(data: unknown): ValidationResult<Verification[]> {
  const result = verificationListSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Parse a verification outcomes JSON document
 */
export function parseVerifications(json: string): ValidationResult<Verification[]> {
  return parseJson(json, validateVerifications);
}
