import { checkLockDocument } from '@repolock/schema';
import type {
  LockDocument,
  LockDocumentProfile,
  LockDocumentRepos,
} from '@repolock/schema';
import type {
  LockState,
  LockStateDraft,
  ProfileDraft,
  ResourceDraft,
} from '../types/lock-state.js';

export class LockfileParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LockfileParseError';
  }
}

function decodeRepos(doc: LockDocumentRepos): ResourceDraft {
  return {
    kind: doc.type ?? '',
    transactionID: doc.trx_id ?? 0,
    path: doc.path ?? '',
    versionLabel: doc.version ?? '',
  };
}

function decodeProfile(doc: LockDocumentProfile): ProfileDraft {
  return {
    name: doc.name ?? '',
    memberPaths: doc.repos_path?.map((p) => p ?? '') ?? null,
    loadPrimaryConfig: doc.load_vimrc ?? false,
    loadSecondaryConfig: doc.load_gvimrc ?? false,
  };
}

export function decodeLockDocument(doc: LockDocument): LockStateDraft {
  return {
    schemaVersion: doc.version ?? 0,
    transactionID: doc.trx_id ?? 0,
    activeProfile: doc.active_profile ?? '',
    loadPrimaryConfig: doc.load_vimrc ?? false,
    loadSecondaryConfig: doc.load_gvimrc ?? false,
    resources: doc.repos?.map(decodeRepos) ?? null,
    profiles: doc.profiles?.map(decodeProfile) ?? null,
  };
}

/** Key order here is the order written to disk. */
export function encodeLockState(state: LockState): LockDocument {
  return {
    version: state.schemaVersion,
    trx_id: state.transactionID,
    active_profile: state.activeProfile,
    load_vimrc: state.loadPrimaryConfig,
    load_gvimrc: state.loadSecondaryConfig,
    repos: state.resources.map((r) => ({
      type: r.kind,
      trx_id: r.transactionID,
      path: r.path,
      version: r.versionLabel,
    })),
    profiles: state.profiles.map((p) => ({
      name: p.name,
      repos_path: [...p.memberPaths],
      load_vimrc: p.loadPrimaryConfig,
      load_gvimrc: p.loadSecondaryConfig,
    })),
  };
}

/**
 * Parses lock.json contents into an unvalidated draft. Only malformed JSON
 * and values of the wrong JSON type are rejected here.
 */
export function parseLockfile(raw: string, source = 'lock.json'): LockStateDraft {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new LockfileParseError(`Invalid JSON in ${source}`, { cause: err });
  }

  const result = checkLockDocument(parsed);
  if (!result.valid) {
    throw new LockfileParseError(
      `Malformed ${source}: ${result.errors.join('; ')}`,
    );
  }
  return decodeLockDocument(result.document);
}

export function serializeLockState(state: LockState): string {
  return JSON.stringify(encodeLockState(state), null, 2) + '\n';
}
