import chalk from 'chalk';
import { loadLockState } from '../core/lock-store.js';
import { header, label, table, toggle } from '../utils/output.js';
import type { LockStoreOptions } from '../core/lock-store.js';

export interface ListOptions {
  json?: boolean;
}

export async function list(
  options: ListOptions = {},
  store: LockStoreOptions = {},
): Promise<void> {
  const state = await loadLockState(store);

  if (options.json) {
    const output = state.profiles.map((p) => ({
      name: p.name,
      active: p.name === state.activeProfile,
      repos: p.memberPaths.length,
      loadVimrc: p.loadPrimaryConfig,
      loadGvimrc: p.loadSecondaryConfig,
    }));
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  console.log('');
  console.log(header('Profiles'));
  console.log('');

  const rows: string[][] = [
    [
      chalk.dim(' '),
      chalk.dim('NAME'),
      chalk.dim('REPOS'),
      chalk.dim('VIMRC'),
      chalk.dim('GVIMRC'),
    ],
  ];

  for (const p of state.profiles) {
    rows.push([
      p.name === state.activeProfile ? '*' : ' ',
      p.name,
      String(p.memberPaths.length),
      toggle(p.loadPrimaryConfig),
      toggle(p.loadSecondaryConfig),
    ]);
  }

  console.log(table(rows));
  console.log('');
  console.log(`  ${label('Repos:')} ${state.resources.length}  ${label('trx_id:')} ${state.transactionID}`);
}
