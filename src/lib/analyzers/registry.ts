/**
 * Analyzer registry: one LanguageAnalyzer per AnalyzerLanguage.
 */

import type { AnalyzerLanguage, Ecosystem } from '../types.js';
import { ANALYZER_LANGUAGES } from '../types.js';
import { extensionOf } from '../tree-sitter/types.js';
import type { LanguageAnalyzer, ManifestKind } from './types.js';
import { pythonAnalyzer } from './python.js';
import { javascriptAnalyzer, typescriptAnalyzer } from './script.js';
import { javaAnalyzer } from './java.js';
import { cppAnalyzer } from './cpp.js';
import { goAnalyzer } from './go.js';
import { rustAnalyzer } from './rust.js';
import { csharpAnalyzer } from './csharp.js';

export type AnalyzerRegistry = Record<AnalyzerLanguage, LanguageAnalyzer>;

export const ANALYZERS: AnalyzerRegistry = {
  python: pythonAnalyzer,
  javascript: javascriptAnalyzer,
  typescript: typescriptAnalyzer,
  java: javaAnalyzer,
  cpp: cppAnalyzer,
  go: goAnalyzer,
  rust: rustAnalyzer,
  csharp: csharpAnalyzer,
};

/** Language of a source file by extension; declaration files (`.d.ts`) have none. */
export function languageForFile(filePath: string, analyzers: AnalyzerRegistry = ANALYZERS): AnalyzerLanguage | null {
  if (/\.d\.[mc]?ts$/i.test(filePath)) return null;
  const ext = extensionOf(filePath);
  if (!ext) return null;
  return ANALYZER_LANGUAGES.find((language) => analyzers[language].extensions.includes(ext)) ?? null;
}

export function languagesForEcosystem(ecosystem: Ecosystem, analyzers: AnalyzerRegistry = ANALYZERS): AnalyzerLanguage[] {
  return ANALYZER_LANGUAGES.filter((language) => analyzers[language].ecosystems.includes(ecosystem));
}

/** The analyzer that reads dependencies from a manifest kind. */
export function analyzerForManifest(kind: ManifestKind, analyzers: AnalyzerRegistry = ANALYZERS): LanguageAnalyzer | null {
  const language = ANALYZER_LANGUAGES.find((candidate) => analyzers[candidate].manifestKinds.includes(kind));
  return language ? analyzers[language] : null;
}
