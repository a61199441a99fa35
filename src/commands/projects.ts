import { ValidationError } from '../lib/errors.js';
import { ECOSYSTEMS, PROJECT_TYPES } from '../lib/types.js';
import type { Ecosystem, EntryPointKind, ProjectType } from '../lib/types.js';
import { withEngine } from './engine.js';
import { entryPointLine, printJson, projectLines, projectRows } from './format.js';

const ENTRY_POINT_KINDS: readonly EntryPointKind[] = ['function', 'class', 'method', 'route'];

export interface ProjectsOptions {
  repository?: string;
  ecosystem?: string;
  type?: string;
  json?: boolean;
}

export interface EntryPointsOptions {
  kind?: string;
  json?: boolean;
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], label: string): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new ValidationError(`Unknown ${label} "${value}" (expected one of: ${allowed.join(', ')})`, { [label]: value });
  }
  return match;
}

export async function projects(options: ProjectsOptions = {}): Promise<void> {
  await withEngine('projects', (engine) => {
    const ecosystem: Ecosystem | undefined = oneOf(options.ecosystem, ECOSYSTEMS, 'ecosystem');
    const projectType: ProjectType | undefined = oneOf(options.type, PROJECT_TYPES, 'type');
    const list = engine.listProjects({ repository: options.repository, ecosystem, projectType });

    if (options.json) {
      printJson(list);
      return;
    }
    if (list.length === 0) {
      console.log('No projects found.');
      return;
    }
    for (const line of projectRows(list)) console.log(line);
  });
}

export async function project(id: string, options: { json?: boolean } = {}): Promise<void> {
  await withEngine('project', (engine) => {
    const metadata = engine.getProject(id);
    if (options.json) printJson(metadata);
    else for (const line of projectLines(metadata)) console.log(line);
  });
}

export async function entrypoints(id: string, options: EntryPointsOptions = {}): Promise<void> {
  await withEngine('entrypoints', (engine) => {
    const kind = oneOf(options.kind, ENTRY_POINT_KINDS, 'kind');
    const entries = engine.getEntryPoints(id, { kind });
    if (options.json) {
      printJson(entries);
      return;
    }
    if (entries.length === 0) {
      console.log(`No entry points in ${id}.`);
      return;
    }
    for (const entry of entries) console.log(entryPointLine(entry));
  });
}
