import fs from 'fs';
import { ValidationError, errorMessage } from '../lib/errors.js';
import { withEngine } from './engine.js';
import { printJson, repositoryRows, statusLines } from './format.js';

export interface RegisterOptions {
  branch?: string;
  /** Path to the SSH private key file. */
  key?: string;
  publicKey?: string;
  replace?: boolean;
  json?: boolean;
}

export interface OutputOptions {
  json?: boolean;
}

function readKeyFile(filePath: string, label: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ValidationError(`Cannot read ${label} ${filePath}: ${errorMessage(error)}`, { path: filePath });
  }
}

export async function register(name: string, url: string, options: RegisterOptions = {}): Promise<void> {
  await withEngine('register', async (engine) => {
    const repo = await engine.register(
      {
        name,
        url,
        defaultBranch: options.branch,
        privateKey: options.key ? readKeyFile(options.key, 'private key') : undefined,
        publicKey: options.publicKey ? readKeyFile(options.publicKey, 'public key') : undefined,
      },
      { replace: options.replace }
    );

    if (options.json) {
      printJson(repo);
      return;
    }
    console.log(`Registered ${repo.name} (id ${repo.id}, branch ${repo.defaultBranch})`);
    if (repo.credentialRef) console.log('SSH key stored in the credential vault');
  });
}

export async function repos(options: OutputOptions = {}): Promise<void> {
  await withEngine('repos', (engine) => {
    const repositories = engine.listRepositories();
    if (options.json) {
      printJson(repositories);
      return;
    }
    if (repositories.length === 0) {
      console.log('No repositories registered. Add one with `reposcope register <name> <url>`.');
      return;
    }
    for (const line of repositoryRows(repositories)) console.log(line);
  });
}

/** Status of one repository, or engine-wide numbers when none is named. */
export async function status(name: string | undefined, options: OutputOptions = {}): Promise<void> {
  await withEngine('status', (engine) => {
    if (name) {
      const syncStatus = engine.getStatus(name);
      if (options.json) printJson(syncStatus);
      else for (const line of statusLines(name, syncStatus)) console.log(line);
      return;
    }

    const stats = engine.getStats();
    if (options.json) {
      printJson(stats);
      return;
    }
    const { byState, metadata } = stats;
    console.log(`Repositories:  ${stats.repositories}`);
    console.log(
      `  synced ${byState.synced}, failed ${byState.failed}, syncing ${byState.syncing}, never synced ${byState['never-synced']}`
    );
    console.log(`Last sync:     ${stats.lastSyncAt ?? 'never'}`);
    console.log(`Projects:      ${metadata.projects}`);
    console.log(`Entry points:  ${metadata.entryPoints}`);
    console.log(`Dependencies:  ${metadata.dependencies}`);
    const types = Object.entries(metadata.byType).map(([type, count]) => `${type} ${count}`);
    if (types.length > 0) console.log(`By type:       ${types.join(', ')}`);
  });
}

export async function remove(name: string): Promise<void> {
  await withEngine('remove', async (engine) => {
    await engine.remove(name);
    console.log(`Removed ${name}`);
  });
}
