import { LockfileParseError } from '../core/lock-codec.js';
import { loadLockState } from '../core/lock-store.js';
import { LockValidationError } from '../core/lock-validator.js';
import { icons, label } from '../utils/output.js';
import type { LockStoreOptions } from '../core/lock-store.js';
import type { LockValidationKind } from '../core/lock-validator.js';

export interface ValidateOptions {
  quiet?: boolean;
  json?: boolean;
}

export interface ValidateIssue {
  code: string;
  kind: LockValidationKind | 'parse';
  message: string;
  field?: string;
}

export interface ValidateResult {
  valid: boolean;
  issue?: ValidateIssue;
}

function reportResult(result: ValidateResult, options: ValidateOptions): void {
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (options.quiet) return;

  if (result.valid) {
    console.log(`${icons.success} Lockfile is valid`);
    return;
  }

  console.log(`${icons.error} Lockfile has validation errors`);
  if (result.issue) {
    const fieldStr = result.issue.field ? ` ${label(`(${result.issue.field})`)}` : '';
    console.log(`  ${icons.error} ${result.issue.message}${fieldStr}`);
  }
}

/**
 * Loads the lockfile, which runs every check. Filesystem errors are not
 * validation results and propagate to the caller.
 */
export async function validate(
  options: ValidateOptions = {},
  store: LockStoreOptions = {},
): Promise<ValidateResult> {
  let result: ValidateResult;
  try {
    await loadLockState(store);
    result = { valid: true };
  } catch (err) {
    if (err instanceof LockValidationError) {
      result = {
        valid: false,
        issue: { code: err.code, kind: err.kind, message: err.message, field: err.field },
      };
    } else if (err instanceof LockfileParseError) {
      result = {
        valid: false,
        issue: { code: 'PARSE_ERROR', kind: 'parse', message: err.message },
      };
    } else {
      throw err;
    }
  }

  reportResult(result, options);
  return result;
}
