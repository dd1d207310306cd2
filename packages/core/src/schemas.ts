/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for strategy definitions and classification
 * results.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020, { type SchemaObject, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { BatchRecord, ClassificationResult, IndustryStrategy, Job } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

export const SCHEMA_FILES = {
  industryStrategy: 'industry_strategy.schema.json',
  classificationResult: 'classification_result.schema.json',
  jobRecord: 'job_record.schema.json',
  batchRecord: 'batch_record.schema.json',
} as const;

// Schema loading - compiled lazily on first use
let strategyValidator: ValidateFunction<IndustryStrategy> | null = null;
let resultValidator: ValidateFunction<ClassificationResult> | null = null;
let jobValidator: ValidateFunction<Job> | null = null;
let batchValidator: ValidateFunction<BatchRecord> | null = null;

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to core package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to core package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Return a permissive schema if file not found (for container environments)
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getStrategyValidator(): ValidateFunction<IndustryStrategy> {
  if (!strategyValidator) {
    strategyValidator = ajv.compile<IndustryStrategy>(loadSchema(SCHEMA_FILES.industryStrategy));
  }
  return strategyValidator;
}

function getResultValidator(): ValidateFunction<ClassificationResult> {
  if (!resultValidator) {
    resultValidator = ajv.compile<ClassificationResult>(loadSchema(SCHEMA_FILES.classificationResult));
  }
  return resultValidator;
}

function getJobValidator(): ValidateFunction<Job> {
  if (!jobValidator) {
    jobValidator = ajv.compile<Job>(loadSchema(SCHEMA_FILES.jobRecord));
  }
  return jobValidator;
}

function getBatchValidator(): ValidateFunction<BatchRecord> {
  if (!batchValidator) {
    batchValidator = ajv.compile<BatchRecord>(loadSchema(SCHEMA_FILES.batchRecord));
  }
  return batchValidator;
}

export type ValidationResult<T> = { valid: true; data: T } | { valid: false; errors: string[] };

function runValidation<T>(validate: ValidateFunction<T>, label: string, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data };
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  logger.warn(`${label} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate an industry strategy definition against industry_strategy.schema.json
 */
export function validateStrategyDefinition(data: unknown): ValidationResult<IndustryStrategy> {
  return runValidation(getStrategyValidator(), 'Strategy definition', data);
}

/**
 * Validate a ClassificationResult against classification_result.schema.json
 */
export function validateClassificationResult(data: unknown): ValidationResult<ClassificationResult> {
  return runValidation(getResultValidator(), 'ClassificationResult', data);
}

/**
 * Validate a stored job record read back from the job store
 */
export function validateJobRecord(data: unknown): ValidationResult<Job> {
  return runValidation(getJobValidator(), 'JobRecord', data);
}

/**
 * Validate a stored batch record read back from the job store
 */
export function validateBatchRecord(data: unknown): ValidationResult<BatchRecord> {
  return runValidation(getBatchValidator(), 'BatchRecord', data);
}
