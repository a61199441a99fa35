import ora from 'ora';
import type { SyncOutcome } from '../lib/sync/sync-worker.js';
import { shortCommit, printJson } from './format.js';
import { withEngine } from './engine.js';

export interface SyncOptions {
  json?: boolean;
}

export function outcomeLine(outcome: SyncOutcome): string {
  switch (outcome.status) {
    case 'synced': {
      const analysis = outcome.analysisError ? `, analysis failed: ${outcome.analysisError}` : '';
      return `✓ ${outcome.repository}: ${outcome.action} at ${shortCommit(outcome.commit)}, ${outcome.projects} project(s)${analysis}`;
    }
    case 'failed':
      return `✗ ${outcome.repository}: ${outcome.error} (${outcome.code})`;
    case 'skipped':
      return outcome.reason === 'removed'
        ? `- ${outcome.repository}: skipped, removed during the pass`
        : `- ${outcome.repository}: skipped, sync already in progress`;
  }
}

/** Sync one repository, or all of them. Exits 1 when any repository failed. */
export async function sync(name: string | undefined, options: SyncOptions = {}): Promise<void> {
  await withEngine('sync', async (engine) => {
    const spinner = options.json ? null : ora(name ? `Syncing ${name}...` : 'Syncing repositories...').start();

    let outcomes: SyncOutcome[];
    try {
      outcomes = await engine.triggerSync(name);
    } catch (error) {
      spinner?.fail('Sync failed');
      throw error;
    }

    const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
    if (failed > 0) process.exitCode = 1;

    if (options.json) {
      printJson(outcomes);
      return;
    }
    if (failed > 0) spinner?.warn(`${failed} of ${outcomes.length} repositories failed`);
    else spinner?.succeed(`Synced ${outcomes.length} repositories`);
    for (const outcome of outcomes) console.log(outcomeLine(outcome));
  });
}
