/**
 * Tree helpers shared by the language analyzers.
 */

import type { Node } from 'web-tree-sitter';
import { parseStrict } from '../tree-sitter/parser.js';
import type { GrammarName } from '../tree-sitter/types.js';
import type { EntryPoint } from '../types.js';

export const HTTP_METHODS = ['get', 'post', 'put', 'delete', 'patch', 'head', 'options'] as const;

export function isHttpMethod(name: string): boolean {
  return (HTTP_METHODS as readonly string[]).includes(name.toLowerCase());
}

/**
 * Parse `content` and run `extract` over the root node.
 * The tree is released afterwards; an unavailable grammar yields [].
 */
export async function extractFromTree(
  content: string,
  grammar: GrammarName,
  filePath: string,
  extract: (root: Node) => EntryPoint[]
): Promise<EntryPoint[]> {
  const tree = await parseStrict(content, grammar, filePath);
  if (!tree) return [];
  try {
    return extract(tree.rootNode);
  } finally {
    tree.delete();
  }
}

export function childNodes(node: Node): Node[] {
  const result: Node[] = [];
  for (const child of node.children) {
    if (child) result.push(child);
  }
  return result;
}

export function namedChildNodes(node: Node): Node[] {
  const result: Node[] = [];
  for (const child of node.namedChildren) {
    if (child) result.push(child);
  }
  return result;
}

/**
 * Pre-order walk. Returning false from `visit` skips the node's children.
 */
export function walk(node: Node, visit: (node: Node) => boolean | void): void {
  if (visit(node) === false) return;
  for (const child of childNodes(node)) {
    walk(child, visit);
  }
}

/** First strict descendant of one of `types`, in document order. */
export function firstDescendant(node: Node, types: readonly string[]): Node | null {
  for (const child of childNodes(node)) {
    if (types.includes(child.type)) return child;
    const found = firstDescendant(child, types);
    if (found) return found;
  }
  return null;
}

/** 1-based line of a node. */
export function lineOf(node: Node): number {
  return node.startPosition.row + 1;
}

const INTERPOLATION_TYPES = ['template_substitution', 'interpolation', 'string_interpolation'];

/**
 * Value of a string literal node, without prefix and quotes.
 * Returns null for anything that is not a plain literal (interpolations included).
 */
export function stringValue(node: Node | null): string | null {
  if (!node) return null;
  if (firstDescendant(node, INTERPOLATION_TYPES)) return null;
  const match = /^[A-Za-z@$]*("""|'''|"|'|`)([\s\S]*)\1$/.exec(node.text);
  if (!match) return null;
  if (/^[A-Za-z@$]*[fF$]/.test(node.text) && node.text.includes('{')) return null;
  return match[2] ?? null;
}

/** Joins route segments into `/a/b`, collapsing duplicate slashes. */
export function joinRoute(...parts: string[]): string {
  const segments = parts.flatMap((part) => part.split('/')).filter((segment) => segment.length > 0);
  return '/' + segments.join('/');
}

export function routeEntry(
  method: string,
  routePath: string,
  filePath: string,
  line: number,
  frameworkHint: string,
  parameters: string[] = []
): EntryPoint {
  const upper = method.toUpperCase();
  return {
    kind: 'route',
    name: `${upper} ${routePath}`,
    filePath,
    line,
    frameworkHint,
    route: { method: upper, path: routePath },
    parameters,
  };
}

/** Stable order for a file's entry points. */
export function sortEntryPoints(entries: EntryPoint[]): EntryPoint[] {
  return [...entries].sort(
    (a, b) => a.filePath.localeCompare(b.filePath) || a.line - b.line || a.name.localeCompare(b.name)
  );
}
