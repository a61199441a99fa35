/**
 * Manifest parsing for every supported ecosystem.
 *
 * Manifests are read with line and pattern matching rather than full
 * TOML/XML/Groovy parsers: only declared dependencies, the project's own
 * name/version/description and a few packaging flags are needed.
 * package.json is the exception and goes through JSON + zod.
 */

import { z } from 'zod';
import { ParseError } from '../errors.js';
import type { DependencyDeclaration, DependencyScope, Ecosystem } from '../types.js';
import type { ManifestKind } from './types.js';

export interface ManifestInfo {
  name?: string;
  version?: string;
  description?: string;
  dependencies: DependencyDeclaration[];
  /** Framework markers that are not dependencies, e.g. an MSBuild SDK. */
  markers: string[];
  /** bin entries, console scripts, OutputType Exe, `[[bin]]`, add_executable. */
  declaresExecutable: boolean;
  /** OutputType Library, Cargo `[lib]`, java-library, add_library. */
  declaresLibrary: boolean;
}

export const MANIFEST_ECOSYSTEM: Record<ManifestKind, Ecosystem> = {
  requirements: 'python',
  'setup-py': 'python',
  pyproject: 'python',
  pipfile: 'python',
  'package-json': 'node',
  pom: 'jvm',
  gradle: 'jvm',
  cargo: 'rust',
  'go-mod': 'go',
  csproj: 'dotnet',
  cmake: 'cmake',
};

const FIXED_MANIFESTS: Record<string, ManifestKind> = {
  'setup.py': 'setup-py',
  'pyproject.toml': 'pyproject',
  pipfile: 'pipfile',
  'package.json': 'package-json',
  'pom.xml': 'pom',
  'build.gradle': 'gradle',
  'build.gradle.kts': 'gradle',
  'cargo.toml': 'cargo',
  'go.mod': 'go-mod',
  'cmakelists.txt': 'cmake',
};

/** Manifest kind of a file name, or null when it is not a manifest. */
export function manifestKindOf(fileName: string): ManifestKind | null {
  const lower = fileName.toLowerCase();
  const fixed = FIXED_MANIFESTS[lower];
  if (fixed) return fixed;
  if (/^requirements([-_][\w.-]+)?\.txt$/.test(lower)) return 'requirements';
  if (lower.endsWith('.csproj')) return 'csproj';
  return null;
}

// ============================================================================
// Shared helpers
// ============================================================================

/**
 * Stored form of a version constraint: an exact `==X` pin becomes `X`,
 * an empty or wildcard constraint becomes null, anything else is kept.
 */
export function normalizeConstraint(constraint: string | null | undefined): string | null {
  const trimmed = constraint?.trim() ?? '';
  if (trimmed === '' || trimmed === '*') return null;
  const exact = /^==\s*([^\s=<>!~,;*]+)$/.exec(trimmed);
  return exact?.[1] ?? trimmed;
}

/** Comparable dependency name: lower-case, PEP 503 separators for Python. */
export function normalizeDependencyName(ecosystem: Ecosystem, name: string): string {
  const lower = name.trim().toLowerCase();
  return ecosystem === 'python' ? lower.replace(/[-_.]+/g, '-') : lower;
}

/** `name[extra] >= 1.0 ; python_version < "3.11"` → name and constraint. */
export function parseRequirement(spec: string): { name: string; version: string | null } | null {
  const withoutMarker = spec.split(';')[0]?.trim() ?? '';
  const match = /^([A-Za-z0-9][A-Za-z0-9._-]*)\s*(?:\[[^\]]*\])?\s*(.*)$/.exec(withoutMarker);
  if (!match?.[1]) return null;

  const rest = (match[2] ?? '').trim();
  if (rest.startsWith('@')) return { name: match[1], version: null };
  const constraint = rest.replace(/[()\s]/g, '');
  return { name: match[1], version: normalizeConstraint(constraint) };
}

function declaration(name: string, version: string | null, manifest: string, scope: DependencyScope): DependencyDeclaration {
  return { name, version, manifest, scope };
}

function emptyInfo(): ManifestInfo {
  return { dependencies: [], markers: [], declaresExecutable: false, declaresLibrary: false };
}

function quotedStrings(text: string): string[] {
  const values: string[] = [];
  for (const match of text.matchAll(/"((?:[^"\\]|\\.)*)"|'([^']*)'/g)) {
    values.push(match[1] ?? match[2] ?? '');
  }
  return values;
}

// ============================================================================
// TOML (tables, key = value, multi-line arrays)
// ============================================================================

interface TomlTable {
  name: string;
  /** Raw value text per key, in file order. */
  entries: Map<string, string>;
}

function stripTomlComment(line: string): string {
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === '\\' && quote === '"') i++;
      else if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '#') {
      return line.slice(0, i);
    }
  }
  return line;
}

function bracketDepth(text: string): number {
  let depth = 0;
  for (const value of text.replace(/"(?:[^"\\]|\\.)*"|'[^']*'/g, '')) {
    if (value === '[' || value === '{') depth++;
    else if (value === ']' || value === '}') depth--;
  }
  return depth;
}

function readToml(content: string): TomlTable[] {
  const tables: TomlTable[] = [{ name: '', entries: new Map() }];
  let current = tables[0];
  let pendingKey: string | null = null;
  let pendingValue = '';

  for (const rawLine of content.split(/\r?\n/)) {
    const line = stripTomlComment(rawLine).trim();

    if (pendingKey !== null) {
      pendingValue += ' ' + line;
      if (bracketDepth(pendingValue) <= 0) {
        current?.entries.set(pendingKey, pendingValue.trim());
        pendingKey = null;
      }
      continue;
    }

    if (!line) continue;

    const header = /^\[\[?\s*([^\]]+?)\s*\]\]?$/.exec(line);
    if (header?.[1]) {
      current = { name: header[1].replace(/\s*\.\s*/g, '.').replace(/["']/g, ''), entries: new Map() };
      tables.push(current);
      continue;
    }

    const pair = /^("[^"]*"|'[^']*'|[A-Za-z0-9_.-]+)\s*=\s*(.*)$/.exec(line);
    if (!pair?.[1] || pair[2] === undefined) continue;
    const key = pair[1].replace(/^["']|["']$/g, '');
    const value = pair[2].trim();
    if (bracketDepth(value) > 0) {
      pendingKey = key;
      pendingValue = value;
    } else {
      current?.entries.set(key, value);
    }
  }
  return tables;
}

function tomlTable(tables: TomlTable[], name: string): TomlTable | undefined {
  return tables.find((table) => table.name === name);
}

function tomlString(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  const match = /^"((?:[^"\\]|\\.)*)"$|^'([^']*)'$/.exec(raw.trim());
  if (!match) return undefined;
  return match[1] ?? match[2];
}

/** Version of a TOML dependency value: `"1.0"` or `{ version = "1.0", ... }`. */
function tomlDependencyVersion(raw: string): string | null {
  const direct = tomlString(raw);
  if (direct !== undefined) return normalizeConstraint(direct);
  const inline = /\bversion\s*=\s*(?:"([^"]*)"|'([^']*)')/.exec(raw);
  return normalizeConstraint(inline?.[1] ?? inline?.[2]);
}

/** Dependencies declared as `name = <version or table>` entries of a table. */
function tomlDependencyTable(table: TomlTable, manifest: string, scope: DependencyScope, skip: string[] = []): DependencyDeclaration[] {
  const deps = new Map<string, DependencyDeclaration>();
  for (const [key, raw] of table.entries) {
    const [name, subkey] = key.split('.', 2);
    if (!name || skip.includes(name.toLowerCase())) continue;
    if (subkey !== undefined && subkey !== 'version') {
      if (!deps.has(name)) deps.set(name, declaration(name, null, manifest, scope));
      continue;
    }
    const version = subkey === 'version' ? normalizeConstraint(tomlString(raw)) : tomlDependencyVersion(raw);
    deps.set(name, declaration(name, version, manifest, scope));
  }
  return [...deps.values()];
}

/** `[dependencies.serde]` style: one table per dependency. */
function tomlDependencySubtables(tables: TomlTable[], prefix: string, manifest: string, scope: DependencyScope): DependencyDeclaration[] {
  return tables
    .filter((table) => table.name.startsWith(prefix + '.') && !table.name.slice(prefix.length + 1).includes('.'))
    .map((table) =>
      declaration(table.name.slice(prefix.length + 1), normalizeConstraint(tomlString(table.entries.get('version'))), manifest, scope)
    );
}

// ============================================================================
// Python
// ============================================================================

const DEV_GROUP = /^(dev|develop|test|tests|testing|lint|docs|typing)$/i;

function parseRequirementsTxt(content: string, manifest: string): ManifestInfo {
  const info = emptyInfo();
  const base = manifest.split('/').pop() ?? manifest;
  const scope: DependencyScope = /(dev|test|lint|doc)/i.test(base) ? 'dev' : 'runtime';

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/(^|\s)#.*$/, '').trim();
    if (!line || line.startsWith('-') || line.includes('://') || line.startsWith('.') || line.startsWith('/')) continue;
    const requirement = parseRequirement(line);
    if (requirement) info.dependencies.push(declaration(requirement.name, requirement.version, manifest, scope));
  }
  return info;
}

function setupPyList(content: string, keyword: string): string[] {
  const match = new RegExp(`\\b${keyword}\\s*=\\s*\\[([\\s\\S]*?)\\]`).exec(content);
  return match?.[1] ? quotedStrings(match[1]) : [];
}

function setupPyString(content: string, keyword: string): string | undefined {
  const match = new RegExp(`\\b${keyword}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`).exec(content);
  return match ? (match[1] ?? match[2]) : undefined;
}

function parseSetupPy(content: string, manifest: string): ManifestInfo {
  const info = emptyInfo();
  info.name = setupPyString(content, 'name');
  info.version = setupPyString(content, 'version');
  info.description = setupPyString(content, 'description');

  const groups: Array<[string, DependencyScope]> = [
    ['install_requires', 'runtime'],
    ['tests_require', 'dev'],
    ['setup_requires', 'build'],
  ];
  for (const [keyword, scope] of groups) {
    for (const spec of setupPyList(content, keyword)) {
      const requirement = parseRequirement(spec);
      if (requirement) info.dependencies.push(declaration(requirement.name, requirement.version, manifest, scope));
    }
  }
  info.declaresExecutable = /console_scripts|\bscripts\s*=/.test(content);
  return info;
}

function requirementsFromArray(raw: string | undefined, manifest: string, scope: DependencyScope): DependencyDeclaration[] {
  if (!raw) return [];
  const deps: DependencyDeclaration[] = [];
  for (const spec of quotedStrings(raw)) {
    const requirement = parseRequirement(spec);
    if (requirement) deps.push(declaration(requirement.name, requirement.version, manifest, scope));
  }
  return deps;
}

function parsePyproject(content: string, manifest: string): ManifestInfo {
  const info = emptyInfo();
  const tables = readToml(content);

  const project = tomlTable(tables, 'project');
  const poetry = tomlTable(tables, 'tool.poetry');
  const identity = project ?? poetry;
  if (identity) {
    info.name = tomlString(identity.entries.get('name'));
    info.version = tomlString(identity.entries.get('version'));
    info.description = tomlString(identity.entries.get('description'));
  }

  if (project) {
    info.dependencies.push(...requirementsFromArray(project.entries.get('dependencies'), manifest, 'runtime'));
  }
  const optional = tomlTable(tables, 'project.optional-dependencies');
  if (optional) {
    for (const [group, raw] of optional.entries) {
      info.dependencies.push(...requirementsFromArray(raw, manifest, DEV_GROUP.test(group) ? 'dev' : 'runtime'));
    }
  }

  for (const table of tables) {
    if (table.name === 'tool.poetry.dependencies') {
      info.dependencies.push(...tomlDependencyTable(table, manifest, 'runtime', ['python']));
    } else if (table.name === 'tool.poetry.dev-dependencies' || /^tool\.poetry\.group\.[^.]+\.dependencies$/.test(table.name)) {
      info.dependencies.push(...tomlDependencyTable(table, manifest, 'dev'));
    }
  }

  const buildSystem = tomlTable(tables, 'build-system');
  info.dependencies.push(...requirementsFromArray(buildSystem?.entries.get('requires'), manifest, 'build'));

  info.declaresExecutable = tables.some(
    (table) => (table.name === 'project.scripts' || table.name === 'tool.poetry.scripts') && table.entries.size > 0
  );
  return info;
}

function parsePipfile(content: string, manifest: string): ManifestInfo {
  const info = emptyInfo();
  const tables = readToml(content);
  const packages = tomlTable(tables, 'packages');
  const devPackages = tomlTable(tables, 'dev-packages');
  if (packages) info.dependencies.push(...tomlDependencyTable(packages, manifest, 'runtime'));
  if (devPackages) info.dependencies.push(...tomlDependencyTable(devPackages, manifest, 'dev'));
  return info;
}

// ============================================================================
// Node
// ============================================================================

const DependencyMapSchema = z.record(z.string(), z.string());

const PackageJsonSchema = z
  .object({
    name: z.string().optional(),
    version: z.string().optional(),
    description: z.string().optional(),
    bin: z.union([z.string(), z.record(z.string(), z.string())]).optional(),
    dependencies: DependencyMapSchema.optional(),
    optionalDependencies: DependencyMapSchema.optional(),
    devDependencies: DependencyMapSchema.optional(),
  })
  .passthrough();

function parsePackageJson(content: string, manifest: string): ManifestInfo {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ParseError(manifest, `invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = PackageJsonSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ParseError(manifest, `invalid package.json: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`);
  }

  const pkg = parsed.data;
  const info = emptyInfo();
  info.name = pkg.name;
  info.version = pkg.version;
  info.description = pkg.description;

  const groups: Array<[Record<string, string> | undefined, DependencyScope]> = [
    [pkg.dependencies, 'runtime'],
    [pkg.optionalDependencies, 'runtime'],
    [pkg.devDependencies, 'dev'],
  ];
  for (const [group, scope] of groups) {
    for (const [name, version] of Object.entries(group ?? {})) {
      info.dependencies.push(declaration(name, normalizeConstraint(version), manifest, scope));
    }
  }

  info.declaresExecutable = typeof pkg.bin === 'string' ? pkg.bin.length > 0 : Object.keys(pkg.bin ?? {}).length > 0;
  return info;
}

// ============================================================================
// JVM
// ============================================================================

function xmlText(block: string, tag: string): string | undefined {
  const match = new RegExp(`<${tag}>\\s*([^<]*?)\\s*</${tag}>`).exec(block);
  return match?.[1] || undefined;
}

function stripXmlBlocks(xml: string, tags: string[]): string {
  let result = xml;
  for (const tag of tags) {
    result = result.replace(new RegExp(`<${tag}>[\\s\\S]*?</${tag}>`, 'g'), '');
  }
  return result;
}

function parsePom(content: string, manifest: string): ManifestInfo {
  const info = emptyInfo();
  const xml = content.replace(/<!--[\s\S]*?-->/g, '');

  const declared = stripXmlBlocks(xml, ['dependencyManagement', 'build', 'profiles']);
  for (const match of declared.matchAll(/<dependency>([\s\S]*?)<\/dependency>/g)) {
    const block = match[1] ?? '';
    const artifactId = xmlText(block, 'artifactId');
    if (!artifactId) continue;
    const groupId = xmlText(block, 'groupId');
    const scope: DependencyScope = xmlText(block, 'scope') === 'test' ? 'dev' : 'runtime';
    info.dependencies.push(
      declaration(groupId ? `${groupId}:${artifactId}` : artifactId, normalizeConstraint(xmlText(block, 'version')), manifest, scope)
    );
  }

  const own = stripXmlBlocks(xml, ['parent', 'dependencies', 'dependencyManagement', 'build', 'profiles', 'modules', 'properties']);
  info.name = xmlText(own, 'artifactId');
  info.version = xmlText(own, 'version');
  info.description = xmlText(own, 'description');
  info.declaresLibrary = xmlText(own, 'packaging') === 'jar' && !/<mainClass>/.test(xml);
  info.declaresExecutable = /<mainClass>/.test(xml);
  return info;
}

const GRADLE_CONFIGURATIONS: Record<string, DependencyScope> = {
  implementation: 'runtime',
  api: 'runtime',
  compile: 'runtime',
  runtimeOnly: 'runtime',
  compileOnly: 'build',
  annotationProcessor: 'build',
  kapt: 'build',
  testImplementation: 'dev',
  testRuntimeOnly: 'dev',
  testCompileOnly: 'dev',
  testCompile: 'dev',
};

function parseGradle(content: string, manifest: string): ManifestInfo {
  const info = emptyInfo();
  const source = content.replace(/\/\*[\s\S]*?\*\//g, '').replace(/\/\/.*$/gm, '');
  const configurations = Object.keys(GRADLE_CONFIGURATIONS).join('|');

  const coordinates = new RegExp(`^\\s*(${configurations})\\s*\\(?\\s*["']([^"':]+):([^"':]+)(?::([^"']+))?["']`, 'gm');
  for (const match of source.matchAll(coordinates)) {
    const [, configuration, group, artifact, version] = match;
    if (!configuration || !group || !artifact) continue;
    info.dependencies.push(
      declaration(`${group}:${artifact}`, normalizeConstraint(version), manifest, GRADLE_CONFIGURATIONS[configuration] ?? 'runtime')
    );
  }

  const mapNotation = new RegExp(
    `^\\s*(${configurations})\\s*\\(?\\s*group\\s*[:=]\\s*["']([^"']+)["']\\s*,\\s*name\\s*[:=]\\s*["']([^"']+)["'](?:\\s*,\\s*version\\s*[:=]\\s*["']([^"']+)["'])?`,
    'gm'
  );
  for (const match of source.matchAll(mapNotation)) {
    const [, configuration, group, artifact, version] = match;
    if (!configuration || !group || !artifact) continue;
    info.dependencies.push(
      declaration(`${group}:${artifact}`, normalizeConstraint(version), manifest, GRADLE_CONFIGURATIONS[configuration] ?? 'runtime')
    );
  }

  info.version = /^\s*version\s*=?\s*["']([^"']+)["']/m.exec(source)?.[1];
  info.description = /^\s*description\s*=?\s*["']([^"']+)["']/m.exec(source)?.[1];
  info.declaresExecutable = /\bid\s*\(?\s*["']application["']|apply\s+plugin\s*:\s*["']application["']|^\s*application\s*$/m.test(source);
  info.declaresLibrary = /\bjava-library\b/.test(source);
  return info;
}

// ============================================================================
// Rust, Go
// ============================================================================

function parseCargo(content: string, manifest: string): ManifestInfo {
  const info = emptyInfo();
  const tables = readToml(content);

  const pkg = tomlTable(tables, 'package');
  if (pkg) {
    info.name = tomlString(pkg.entries.get('name'));
    info.version = tomlString(pkg.entries.get('version'));
    info.description = tomlString(pkg.entries.get('description'));
  }

  const scopes: Array<[string, DependencyScope]> = [
    ['dependencies', 'runtime'],
    ['dev-dependencies', 'dev'],
    ['build-dependencies', 'build'],
  ];
  for (const [section, scope] of scopes) {
    for (const table of tables) {
      const isSection = table.name === section || (table.name.startsWith('target.') && table.name.endsWith('.' + section));
      if (isSection) info.dependencies.push(...tomlDependencyTable(table, manifest, scope));
    }
    info.dependencies.push(...tomlDependencySubtables(tables, section, manifest, scope));
  }

  info.declaresLibrary = tables.some((table) => table.name === 'lib');
  info.declaresExecutable = tables.some((table) => table.name === 'bin');
  return info;
}

function parseGoMod(content: string, manifest: string): ManifestInfo {
  const info = emptyInfo();
  const modulePath = /^module\s+(\S+)/m.exec(content)?.[1];
  if (modulePath) info.name = modulePath.split('/').pop();

  const lines: string[] = [];
  for (const block of content.matchAll(/^require\s*\(([\s\S]*?)^\)/gm)) {
    lines.push(...(block[1] ?? '').split(/\r?\n/));
  }
  for (const single of content.matchAll(/^require\s+([^\s(]+\s+\S+.*)$/gm)) {
    if (single[1]) lines.push(single[1]);
  }

  for (const line of lines) {
    const match = /^\s*(\S+)\s+(v\S+)/.exec(line.replace(/\/\/.*$/, ''));
    if (match?.[1] && match[2]) info.dependencies.push(declaration(match[1], match[2], manifest, 'runtime'));
  }
  return info;
}

// ============================================================================
// .NET, CMake
// ============================================================================

function xmlAttribute(attributes: string, name: string): string | undefined {
  return new RegExp(`\\b${name}\\s*=\\s*"([^"]*)"`).exec(attributes)?.[1];
}

function parseCsproj(content: string, manifest: string): ManifestInfo {
  const info = emptyInfo();
  const xml = content.replace(/<!--[\s\S]*?-->/g, '');

  for (const match of xml.matchAll(/<PackageReference\b([^>]*?)(?:\/>|>([\s\S]*?)<\/PackageReference>)/g)) {
    const attributes = match[1] ?? '';
    const name = xmlAttribute(attributes, 'Include') ?? xmlAttribute(attributes, 'Update');
    if (!name) continue;
    const version = xmlAttribute(attributes, 'Version') ?? (match[2] ? xmlText(match[2], 'Version') : undefined);
    const scope: DependencyScope = /PrivateAssets\s*=\s*"all"|<PrivateAssets>\s*all/i.test(match[0]) ? 'build' : 'runtime';
    info.dependencies.push(declaration(name, normalizeConstraint(version), manifest, scope));
  }

  const sdk = /<Project\b[^>]*\bSdk\s*=\s*"([^"]+)"/.exec(xml)?.[1];
  if (sdk) info.markers.push(sdk);

  const fileName = manifest.split('/').pop() ?? manifest;
  info.name = xmlText(xml, 'AssemblyName') ?? fileName.replace(/\.csproj$/i, '');
  info.version = xmlText(xml, 'Version');
  info.description = xmlText(xml, 'Description');

  const outputType = xmlText(xml, 'OutputType')?.toLowerCase();
  info.declaresExecutable = outputType === 'exe' || outputType === 'winexe';
  info.declaresLibrary = outputType === 'library';
  return info;
}

function parseCmake(content: string, manifest: string): ManifestInfo {
  const info = emptyInfo();
  const source = content.replace(/#.*$/gm, '');

  const project = /\bproject\s*\(\s*([A-Za-z0-9_.+-]+)([^)]*)\)/i.exec(source);
  if (project?.[1]) {
    info.name = project[1];
    const args = project[2] ?? '';
    info.version = /\bVERSION\s+([0-9][0-9.]*)/.exec(args)?.[1];
    info.description = /\bDESCRIPTION\s+"([^"]*)"/.exec(args)?.[1];
  }

  for (const match of source.matchAll(/\bfind_package\s*\(\s*([A-Za-z0-9_.+-]+)(?:\s+([0-9][0-9.]*))?/gi)) {
    if (match[1]) info.dependencies.push(declaration(match[1], match[2] ?? null, manifest, 'runtime'));
  }
  for (const match of source.matchAll(/\bFetchContent_Declare\s*\(\s*([A-Za-z0-9_.+-]+)/gi)) {
    if (match[1]) info.dependencies.push(declaration(match[1], null, manifest, 'runtime'));
  }

  info.declaresExecutable = /\badd_executable\s*\(/i.test(source);
  info.declaresLibrary = /\badd_library\s*\(/i.test(source);
  return info;
}

// ============================================================================
// Entry
// ============================================================================

const PARSERS: Record<ManifestKind, (content: string, manifest: string) => ManifestInfo> = {
  requirements: parseRequirementsTxt,
  'setup-py': parseSetupPy,
  pyproject: parsePyproject,
  pipfile: parsePipfile,
  'package-json': parsePackageJson,
  pom: parsePom,
  gradle: parseGradle,
  cargo: parseCargo,
  'go-mod': parseGoMod,
  csproj: parseCsproj,
  cmake: parseCmake,
};

/**
 * Read one manifest.
 * @param manifestPath - Repository-relative path, recorded on each dependency
 * @throws ParseError when a structured manifest (package.json) is malformed
 */
export function readManifest(content: string, kind: ManifestKind, manifestPath: string): ManifestInfo {
  return PARSERS[kind](content.replace(/^\uFEFF/, ''), manifestPath);
}

/** Dependencies of a manifest, or [] when `kind` is not one of `supported`. */
export function dependenciesFrom(
  supported: readonly ManifestKind[],
  content: string,
  kind: ManifestKind,
  manifestPath: string
): DependencyDeclaration[] {
  return supported.includes(kind) ? readManifest(content, kind, manifestPath).dependencies : [];
}
