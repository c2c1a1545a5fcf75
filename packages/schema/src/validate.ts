import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import { Ajv2020 } from 'ajv/dist/2020.js';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import type { LockDocument } from './lock.js';

let validateFn: ValidateFunction<LockDocument> | null = null;

function getValidator(): ValidateFunction<LockDocument> {
  if (validateFn) return validateFn;

  const ajv = new Ajv2020({ allErrors: true, strict: false });

  const schemaPath = getLockSchemaPath();
  const schema: SchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  validateFn = ajv.compile<LockDocument>(schema);
  return validateFn;
}

export function getLockSchemaPath(): string {
  const currentFile = fileURLToPath(import.meta.url);
  return resolve(dirname(currentFile), '..', 'lock.schema.json');
}

export type LockDocumentCheck =
  | { valid: true; document: LockDocument }
  | { valid: false; errors: string[] };

function formatError(err: ErrorObject): string {
  return `${err.instancePath || '/'} ${err.message ?? 'unknown error'}`;
}

export function checkLockDocument(data: unknown): LockDocumentCheck {
  const validate = getValidator();
  if (validate(data)) {
    return { valid: true, document: data };
  }
  return { valid: false, errors: (validate.errors ?? []).map(formatError) };
}
