/**
 * Project type classification.
 *
 * Priority, first match wins:
 * 1. framework markers from dependencies (frameworks.json), most specific first
 * 2. CLI-parsing markers when no web framework is present
 * 3. manifest declarations (OutputType Exe, `bin`, `[lib]`, ...)
 * 4. library, when the project has source files
 * 5. unknown
 */

import fs from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import { normalizeDependencyName } from '../analyzers/manifests.js';
import { ECOSYSTEMS } from '../types.js';
import type { DependencyDeclaration, Ecosystem, ProjectType } from '../types.js';

const FrameworkMarkerSchema = z.object({
  ecosystem: z.enum(ECOSYSTEMS),
  dependency: z.string().min(1),
  framework: z.string().min(1),
  type: z.enum(['web-app', 'api', 'microservice', 'cli']),
  specificity: z.number().int().nonnegative(),
});

const FrameworkTableSchema = z.object({ markers: z.array(FrameworkMarkerSchema) });

export type FrameworkMarker = z.infer<typeof FrameworkMarkerSchema>;

let cachedMarkers: FrameworkMarker[] | null = null;

/** Framework markers shipped beside this module. */
export function loadFrameworkMarkers(): FrameworkMarker[] {
  if (cachedMarkers) return cachedMarkers;

  const file = new URL('./frameworks.json', import.meta.url);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read framework markers: ${errorMessage(error)}`, {
      path: file.pathname,
    });
  }

  const parsed = FrameworkTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid framework markers: ${issue?.path.join('.')}: ${issue?.message}`, { path: file.pathname });
  }
  cachedMarkers = parsed.data.markers;
  return cachedMarkers;
}

export interface ClassificationInput {
  ecosystem: Ecosystem;
  dependencies: readonly DependencyDeclaration[];
  /** Non-dependency markers from manifests, e.g. an MSBuild SDK. */
  manifestMarkers: readonly string[];
  declaresExecutable: boolean;
  declaresLibrary: boolean;
  sourceFileCount: number;
}

export interface Classification {
  projectType: ProjectType;
  /** Detected framework names, most specific first. */
  frameworks: string[];
}

function markerMatches(marker: string, name: string): boolean {
  return name === marker || name.startsWith(marker + '/') || name.startsWith(marker + ':');
}

/** Markers matched by the project's runtime and build dependencies, most specific first. */
export function matchFrameworks(
  input: Pick<ClassificationInput, 'ecosystem' | 'dependencies' | 'manifestMarkers'>,
  markers: readonly FrameworkMarker[] = loadFrameworkMarkers()
): FrameworkMarker[] {
  const names = [
    ...input.dependencies.filter((dep) => dep.scope !== 'dev').map((dep) => dep.name),
    ...input.manifestMarkers,
  ].map((name) => normalizeDependencyName(input.ecosystem, name));

  const matched = markers.filter(
    (marker) =>
      marker.ecosystem === input.ecosystem &&
      names.some((name) => markerMatches(normalizeDependencyName(input.ecosystem, marker.dependency), name))
  );
  // Array.prototype.sort is stable: equal specificity keeps table order
  return [...matched].sort((a, b) => b.specificity - a.specificity);
}

export function classifyProject(
  input: ClassificationInput,
  markers: readonly FrameworkMarker[] = loadFrameworkMarkers()
): Classification {
  const matched = matchFrameworks(input, markers);
  const frameworks = [...new Set(matched.map((marker) => marker.framework))];

  const web = matched.find((marker) => marker.type !== 'cli');
  if (web) return { projectType: web.type, frameworks };
  if (matched.length > 0) return { projectType: 'cli', frameworks };

  if (input.declaresExecutable) return { projectType: 'cli', frameworks };
  if (input.declaresLibrary) return { projectType: 'library', frameworks };
  return { projectType: input.sourceFileCount > 0 ? 'library' : 'unknown', frameworks };
}
