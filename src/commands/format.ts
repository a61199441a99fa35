import type { EntryPoint, ProjectMetadata, RepositoryWithStatus, SyncStatus } from '../lib/types.js';

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** Left-aligned columns separated by two spaces; trailing padding trimmed. */
export function formatTable(header: string[], rows: string[][]): string[] {
  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  return [header, ...rows].map((row) =>
    row
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join('  ')
      .trimEnd()
  );
}

export function shortCommit(commit: string | null): string {
  return commit ? commit.slice(0, 7) : '-';
}

export function repositoryRows(repositories: RepositoryWithStatus[]): string[] {
  return formatTable(
    ['NAME', 'STATE', 'LAST SUCCESS', 'COMMIT', 'URL'],
    repositories.map((repo) => [
      repo.name,
      repo.status.state,
      repo.status.lastSuccessAt ?? 'never',
      shortCommit(repo.status.currentCommit),
      repo.url,
    ])
  );
}

export function statusLines(name: string, status: SyncStatus): string[] {
  const lines = [
    `Repository:    ${name}`,
    `State:         ${status.state}`,
    `Last attempt:  ${status.lastAttemptAt ?? 'never'}`,
    `Last success:  ${status.lastSuccessAt ?? 'never'}`,
    `Commit:        ${status.currentCommit ?? '-'}`,
    `Last analyzed: ${status.lastAnalyzedAt ?? 'never'}`,
  ];
  if (status.lastError) lines.push(`Last error:    ${status.lastError} (${status.errorCode ?? 'UNKNOWN'})`);
  if (status.lastAnalysisError) lines.push(`Analysis:      ${status.lastAnalysisError}`);
  return lines;
}

export function projectRows(projects: ProjectMetadata[]): string[] {
  return formatTable(
    ['ID', 'TYPE', 'LANGUAGE', 'FRAMEWORKS', 'FILES'],
    projects.map((project) => [
      project.id,
      project.projectType,
      project.primaryLanguage ?? '-',
      project.frameworks.join(', ') || '-',
      String(project.fileCount),
    ])
  );
}

export function projectLines(project: ProjectMetadata): string[] {
  const lines = [
    `${project.name}${project.version ? ` ${project.version}` : ''}`,
    `  id:          ${project.id}`,
    `  path:        ${project.relativePath || '.'}`,
    `  ecosystem:   ${project.ecosystem}`,
    `  type:        ${project.projectType}`,
    `  language:    ${project.primaryLanguage ?? '-'}`,
    `  frameworks:  ${project.frameworks.join(', ') || '-'}`,
    `  manifests:   ${project.manifests.join(', ')}`,
    `  files:       ${project.fileCount} (${project.linesOfCode} lines)`,
    `  commit:      ${shortCommit(project.commit)}`,
    `  analyzed:    ${project.analyzedAt}`,
  ];
  if (project.description) lines.push(`  description: ${project.description}`);

  lines.push(`  dependencies (${project.dependencies.length}):`);
  for (const dep of project.dependencies) {
    const scope = dep.scope === 'runtime' ? '' : ` [${dep.scope}]`;
    lines.push(`    ${dep.name} ${dep.version ?? '*'}${scope}`);
  }

  lines.push(`  entry points (${project.entryPoints.length}):`);
  lines.push(...project.entryPoints.map((entry) => `    ${entryPointLine(entry)}`));
  return lines;
}

export function entryPointLine(entry: EntryPoint): string {
  const params = entry.kind === 'route' ? '' : `(${entry.parameters.join(', ')})`;
  const hint = entry.frameworkHint ? `  [${entry.frameworkHint}]` : '';
  return `${entry.kind.padEnd(8)} ${entry.name}${params}  ${entry.filePath}:${entry.line}${hint}`;
}
