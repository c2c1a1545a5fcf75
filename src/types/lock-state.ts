import type { ReposType } from '@repolock/schema';

export type ResourceKind = ReposType;

export interface Resource {
  /** `git` resources are pinned to {@link Resource.versionLabel}; `static` ones are not. */
  kind: ResourceKind;
  transactionID: number;
  /** Slash-separated path relative to the resource root. Unique across resources. */
  path: string;
  versionLabel: string;
}

export interface Profile {
  name: string;
  memberPaths: string[];
  loadPrimaryConfig: boolean;
  loadSecondaryConfig: boolean;
}

export interface LockState {
  schemaVersion: number;
  transactionID: number;
  activeProfile: string;
  loadPrimaryConfig: boolean;
  loadSecondaryConfig: boolean;
  resources: Resource[];
  profiles: Profile[];
}

// Not-yet-validated forms. Absent collections are null; absent scalars are
// their zero value. validateMissing() narrows a draft to a LockState.

export interface ResourceDraft {
  kind: string;
  transactionID: number;
  path: string;
  versionLabel: string;
}

export interface ProfileDraft {
  name: string;
  memberPaths: string[] | null;
  loadPrimaryConfig: boolean;
  loadSecondaryConfig: boolean;
}

export interface LockStateDraft {
  schemaVersion: number;
  transactionID: number;
  activeProfile: string;
  loadPrimaryConfig: boolean;
  loadSecondaryConfig: boolean;
  resources: ResourceDraft[] | null;
  profiles: ProfileDraft[] | null;
}
