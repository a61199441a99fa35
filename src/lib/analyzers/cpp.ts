/**
 * C/C++ analyzer. Only a global `main` (or `wmain`) counts as an entry point;
 * `.c` files use the C grammar, everything else the C++ one.
 */

import type { Node } from 'web-tree-sitter';
import type { EntryPoint } from '../types.js';
import { extensionOf } from '../tree-sitter/types.js';
import type { LanguageAnalyzer, ManifestKind } from './types.js';
import { dependenciesFrom } from './manifests.js';
import { extractFromTree, firstDescendant, lineOf, namedChildNodes } from './syntax.js';

const MANIFESTS: readonly ManifestKind[] = ['cmake'];
const MAIN_NAMES = new Set(['main', 'wmain']);

function functionDeclarator(definition: Node): Node | null {
  let declarator = definition.childForFieldName('declarator');
  // int *f() / int &f(): pointer and reference declarators wrap the function declarator
  while (declarator && declarator.type !== 'function_declarator') {
    declarator = declarator.childForFieldName('declarator') ?? null;
  }
  return declarator;
}

function parameterNames(declarator: Node): string[] {
  const parameters = declarator.childForFieldName('parameters');
  if (!parameters) return [];
  const names: string[] = [];
  for (const param of namedChildNodes(parameters)) {
    const inner = param.childForFieldName('declarator');
    if (!inner) continue;
    const identifier = inner.type === 'identifier' ? inner : firstDescendant(inner, ['identifier']);
    if (identifier) names.push(identifier.text);
  }
  return names;
}

function extract(root: Node, filePath: string): EntryPoint[] {
  const entries: EntryPoint[] = [];
  for (const node of namedChildNodes(root)) {
    if (node.type !== 'function_definition') continue;
    const declarator = functionDeclarator(node);
    const name = declarator?.childForFieldName('declarator')?.text;
    if (declarator && name && MAIN_NAMES.has(name)) {
      entries.push({ kind: 'function', name, filePath, line: lineOf(node), parameters: parameterNames(declarator) });
    }
  }
  return entries;
}

export const cppAnalyzer: LanguageAnalyzer = {
  language: 'cpp',
  extensions: ['c', 'h', 'cpp', 'cc', 'cxx', 'hpp', 'hh', 'hxx'],
  ecosystems: ['cmake'],
  manifestKinds: MANIFESTS,
  parseEntryPoints: (content, filePath) =>
    extractFromTree(content, extensionOf(filePath) === 'c' ? 'c' : 'cpp', filePath, (root) => extract(root, filePath)),
  parseManifest: (content, kind, manifestPath) => dependenciesFrom(MANIFESTS, content, kind, manifestPath),
};
