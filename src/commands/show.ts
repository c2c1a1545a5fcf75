import chalk from 'chalk';
import { findProfileByName, resourcesForProfile } from '../core/lock-accessors.js';
import { loadLockState } from '../core/lock-store.js';
import { header, icons, table, value } from '../utils/output.js';
import type { LockStoreOptions } from '../core/lock-store.js';

export interface ShowOptions {
  json?: boolean;
}

export async function show(
  profileName: string | undefined,
  options: ShowOptions = {},
  store: LockStoreOptions = {},
): Promise<void> {
  const state = await loadLockState(store);
  const profile = findProfileByName(state.profiles, profileName ?? state.activeProfile);
  const resources = resourcesForProfile(state, profile);

  if (options.json) {
    const output = resources.map((r) => ({
      type: r.kind,
      path: r.path,
      version: r.versionLabel,
      trxId: r.transactionID,
    }));
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  console.log('');
  console.log(header(`Profile ${profile.name}`));
  console.log('');

  if (resources.length === 0) {
    console.log(`${icons.info} No repos in profile ${value(profile.name)}.`);
    return;
  }

  const rows: string[][] = [
    [chalk.dim('TYPE'), chalk.dim('PATH'), chalk.dim('VERSION'), chalk.dim('TRX')],
  ];
  for (const r of resources) {
    rows.push([r.kind, r.path, r.versionLabel || '-', String(r.transactionID)]);
  }
  console.log(table(rows));
}
