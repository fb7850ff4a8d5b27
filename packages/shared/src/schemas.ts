/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for the audit payload returned by the model.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

// Compiled lazily on first use
let auditPayloadValidator: ValidateFunction | null = null;

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Relative to shared package src/ or dist/
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to project root (for containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Permissive schema if the contract is not shipped alongside the code
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getAuditPayloadValidator(): ValidateFunction {
  if (!auditPayloadValidator) {
    auditPayloadValidator = ajv.compile(loadSchema('audit_payload.schema.json'));
  }
  return auditPayloadValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate a parsed model payload against audit_payload.schema.json
 */
export function validateAuditPayload(data: unknown): ValidationResult {
  const validate = getAuditPayloadValidator();
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('Audit payload validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
