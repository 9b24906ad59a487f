import { readFileSync } from 'fs';
import Ajv from 'ajv';
import { rosterSchemaPath } from './paths.js';
import type { RosterFile } from './types.js';

export type SchemaResult = { valid: true; roster: RosterFile; errors: [] } | { valid: false; errors: string[] };

/**
 * Validates a roster against its JSON schema
 */
export function validateRosterSchema(data: unknown): SchemaResult {
  const schema = JSON.parse(readFileSync(rosterSchemaPath, 'utf-8'));
  const ajv = new Ajv({ allErrors: true, strict: false });

  const validate = ajv.compile<RosterFile>(schema);
  if (validate(data)) {
    return { valid: true, roster: data, errors: [] };
  }

  const errors: string[] = [];
  for (const error of validate.errors ?? []) {
    const path = error.instancePath || error.schemaPath;
    errors.push(`${path}: ${error.message}`);
  }

  return { valid: false, errors };
}
