import { isReposType } from '@repolock/schema';
import type { LockFilesystem } from './lock-filesystem.js';
import type { LockPathResolver } from './lock-paths.js';
import type { LockState, LockStateDraft } from '../types/lock-state.js';

export type LockValidationKind =
  | 'missing-field'
  | 'invalid-enum-value'
  | 'duplicate'
  | 'dangling-reference'
  | 'filesystem-mismatch'
  | 'ordering-violation';

export type LockValidationCode =
  | 'MISSING_FIELD'
  | 'INVALID_REPOS_TYPE'
  | 'DUPLICATE_REPOS'
  | 'DUPLICATE_PROFILE'
  | 'DUPLICATE_REPOS_PATH'
  | 'ACTIVE_PROFILE_NOT_FOUND'
  | 'REPOS_PATH_NOT_FOUND'
  | 'REPOS_DIR_MISSING'
  | 'REPOS_NOT_DIRECTORY'
  | 'TRX_ID_OUT_OF_ORDER';

const CODE_KINDS: Record<LockValidationCode, LockValidationKind> = {
  MISSING_FIELD: 'missing-field',
  INVALID_REPOS_TYPE: 'invalid-enum-value',
  DUPLICATE_REPOS: 'duplicate',
  DUPLICATE_PROFILE: 'duplicate',
  DUPLICATE_REPOS_PATH: 'duplicate',
  ACTIVE_PROFILE_NOT_FOUND: 'dangling-reference',
  REPOS_PATH_NOT_FOUND: 'dangling-reference',
  REPOS_DIR_MISSING: 'filesystem-mismatch',
  REPOS_NOT_DIRECTORY: 'filesystem-mismatch',
  TRX_ID_OUT_OF_ORDER: 'ordering-violation',
};

export class LockValidationError extends Error {
  readonly kind: LockValidationKind;

  constructor(
    message: string,
    public readonly code: LockValidationCode,
    /** Lockfile key path of the offending value, e.g. `repos[2].version`. */
    public readonly field: string,
  ) {
    super(message);
    this.name = 'LockValidationError';
    this.kind = CODE_KINDS[code];
  }
}

export interface ValidationContext {
  paths: LockPathResolver;
  fs: LockFilesystem;
}

function missing(field: string): LockValidationError {
  return new LockValidationError(`missing: ${field}`, 'MISSING_FIELD', field);
}

/**
 * Presence checks in document order: root keys, then each repos entry, then
 * each profile. Throws on the first violation.
 */
export function validateMissing(
  draft: LockStateDraft,
): asserts draft is LockState {
  if (draft.schemaVersion === 0) throw missing('version');
  if (draft.transactionID === 0) throw missing('trx_id');
  if (draft.resources === null) throw missing('repos');

  for (const [i, repos] of draft.resources.entries()) {
    const at = `repos[${i}]`;
    if (repos.kind === '') throw missing(`${at}.type`);
    if (!isReposType(repos.kind)) {
      throw new LockValidationError(
        `${at}.type is invalid type: ${repos.kind}`,
        'INVALID_REPOS_TYPE',
        `${at}.type`,
      );
    }
    if (repos.kind === 'git' && repos.versionLabel === '') {
      throw missing(`${at}.version`);
    }
    // Shared by both types
    if (repos.transactionID === 0) throw missing(`${at}.trx_id`);
    if (repos.path === '') throw missing(`${at}.path`);
  }

  if (draft.profiles === null) throw missing('profiles');

  for (const [i, profile] of draft.profiles.entries()) {
    const at = `profiles[${i}]`;
    if (profile.name === '') throw missing(`${at}.name`);
    if (profile.memberPaths === null) throw missing(`${at}.repos_path`);
    for (const [j, reposPath] of profile.memberPaths.entries()) {
      if (reposPath === '') throw missing(`${at}.repos_path[${j}]`);
    }
  }
}

function checkDuplicates(state: LockState): void {
  const paths = new Set<string>();
  for (const [i, repos] of state.resources.entries()) {
    if (paths.has(repos.path)) {
      throw new LockValidationError(
        `duplicate repos '${repos.path}'`,
        'DUPLICATE_REPOS',
        `repos[${i}].path`,
      );
    }
    paths.add(repos.path);
  }

  const names = new Set<string>();
  for (const [i, profile] of state.profiles.entries()) {
    if (names.has(profile.name)) {
      throw new LockValidationError(
        `duplicate profile '${profile.name}'`,
        'DUPLICATE_PROFILE',
        `profiles[${i}].name`,
      );
    }
    names.add(profile.name);
  }

  for (const [i, profile] of state.profiles.entries()) {
    const members = new Set<string>();
    for (const [j, reposPath] of profile.memberPaths.entries()) {
      if (members.has(reposPath)) {
        throw new LockValidationError(
          `duplicate '${reposPath}' (repos_path) in profile '${profile.name}'`,
          'DUPLICATE_REPOS_PATH',
          `profiles[${i}].repos_path[${j}]`,
        );
      }
      members.add(reposPath);
    }
  }
}

function checkReferences(state: LockState): void {
  if (!state.profiles.some((p) => p.name === state.activeProfile)) {
    throw new LockValidationError(
      `'${state.activeProfile}' (active_profile) doesn't exist in profiles`,
      'ACTIVE_PROFILE_NOT_FOUND',
      'active_profile',
    );
  }

  for (const [i, profile] of state.profiles.entries()) {
    for (const [j, reposPath] of profile.memberPaths.entries()) {
      if (!state.resources.some((r) => r.path === reposPath)) {
        const field = `profiles[${i}].repos_path[${j}]`;
        throw new LockValidationError(
          `'${reposPath}' (${field}) doesn't exist in repos`,
          'REPOS_PATH_NOT_FOUND',
          field,
        );
      }
    }
  }
}

async function checkFilesystem(
  state: LockState,
  { paths, fs }: ValidationContext,
): Promise<void> {
  for (const [i, repos] of state.resources.entries()) {
    const field = `repos[${i}].path`;
    const fullPath = paths.resolveResourcePath(repos.path);
    if (!(await fs.exists(fullPath))) {
      throw new LockValidationError(
        `'${fullPath}' (${field}) doesn't exist on filesystem`,
        'REPOS_DIR_MISSING',
        field,
      );
    }
    if (!(await fs.isDirectory(fullPath))) {
      throw new LockValidationError(
        `'${fullPath}' (${field}) is not a directory`,
        'REPOS_NOT_DIRECTORY',
        field,
      );
    }
  }
}

function checkTransactionOrder(state: LockState): void {
  // Strict `<`: on ties the first repos entry at the maximum is reported.
  let index = -1;
  let max = 0;
  for (const [i, repos] of state.resources.entries()) {
    if (index === -1 || max < repos.transactionID) {
      index = i;
      max = repos.transactionID;
    }
  }
  if (index !== -1 && max > state.transactionID) {
    const field = `repos[${index}].trx_id`;
    throw new LockValidationError(
      `'${max}' (${field}) is greater than '${state.transactionID}' (trx_id)`,
      'TRX_ID_OUT_OF_ORDER',
      field,
    );
  }
}

/**
 * Runs every lockfile invariant in a fixed order and rejects with the first
 * {@link LockValidationError}. Filesystem checks only run once the document
 * itself is consistent.
 */
export async function validateLockState(
  draft: LockStateDraft,
  context: ValidationContext,
): Promise<LockState> {
  validateMissing(draft);
  checkDuplicates(draft);
  checkReferences(draft);
  await checkFilesystem(draft, context);
  checkTransactionOrder(draft);
  return draft;
}
