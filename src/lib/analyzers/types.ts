/**
 * Language analyzer capability set.
 *
 * Each supported language implements LanguageAnalyzer once; callers only
 * see this interface and pick an implementation from the analyzer registry.
 */

import type { AnalyzerLanguage, DependencyDeclaration, Ecosystem, EntryPoint } from '../types.js';

export const MANIFEST_KINDS = [
  'requirements',
  'setup-py',
  'pyproject',
  'pipfile',
  'package-json',
  'pom',
  'gradle',
  'cargo',
  'go-mod',
  'csproj',
  'cmake',
] as const;
export type ManifestKind = (typeof MANIFEST_KINDS)[number];

export interface LanguageAnalyzer {
  readonly language: AnalyzerLanguage;
  /** Lower-case extensions without the dot. */
  readonly extensions: readonly string[];
  /** Ecosystems whose projects contain this language's files. */
  readonly ecosystems: readonly Ecosystem[];
  /** Manifest kinds this analyzer reads dependencies from. */
  readonly manifestKinds: readonly ManifestKind[];

  /**
   * Entry points declared in one source file.
   * Throws ParseError when the file does not parse cleanly; resolves to []
   * when the grammar is not installed.
   */
  parseEntryPoints(content: string, filePath: string): Promise<EntryPoint[]>;

  /** Dependencies declared by one manifest. Unknown kinds yield []. */
  parseManifest(content: string, kind: ManifestKind, manifestPath: string): DependencyDeclaration[];
}
