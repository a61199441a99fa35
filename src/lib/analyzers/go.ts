/**
 * Go analyzer.
 *
 * Entry points:
 * - `func main` in `package main`
 * - `http.HandleFunc("/x", h)` / `mux.Handle(...)`, including Go 1.22 `"GET /x"` patterns
 *   and gorilla `.Methods("POST")` chains
 * - gin/echo (`r.GET`), chi/fiber (`r.Get`) route registrations
 */

import type { Node } from 'web-tree-sitter';
import type { EntryPoint } from '../types.js';
import type { LanguageAnalyzer, ManifestKind } from './types.js';
import { dependenciesFrom } from './manifests.js';
import { extractFromTree, isHttpMethod, lineOf, namedChildNodes, routeEntry, stringValue, walk } from './syntax.js';

const MANIFESTS: readonly ManifestKind[] = ['go-mod'];

function importedPaths(root: Node): string[] {
  const paths: string[] = [];
  walk(root, (node) => {
    if (node.type === 'import_spec') {
      const path = stringValue(node.childForFieldName('path'));
      if (path) paths.push(path);
      return false;
    }
    return node.type === 'source_file' || node.type === 'import_declaration' || node.type === 'import_spec_list';
  });
  return paths;
}

function imports(paths: string[], prefix: string): boolean {
  return paths.some((path) => path === prefix || path.startsWith(prefix + '/'));
}

function frameworkHint(selector: string, paths: string[]): string {
  if (selector === 'Handle' || selector === 'HandleFunc') {
    return imports(paths, 'github.com/gorilla/mux') ? 'gorilla/mux route' : 'net/http handler';
  }
  if (imports(paths, 'github.com/gin-gonic/gin')) return 'Gin route';
  if (imports(paths, 'github.com/labstack/echo')) return 'Echo route';
  if (imports(paths, 'github.com/go-chi/chi')) return 'chi route';
  if (imports(paths, 'github.com/gofiber/fiber')) return 'Fiber route';
  return 'Go HTTP route';
}

/** `.Methods("POST")` chained onto a gorilla registration. */
function chainedMethod(call: Node): string | null {
  const selector = call.parent;
  if (selector?.type !== 'selector_expression' || selector.childForFieldName('field')?.text !== 'Methods') return null;
  const outer = selector.parent;
  const args = outer?.type === 'call_expression' ? outer.childForFieldName('arguments') : null;
  return args ? stringValue(namedChildNodes(args)[0] ?? null) : null;
}

function registeredRoute(call: Node, filePath: string, paths: string[]): EntryPoint | null {
  const callee = call.childForFieldName('function');
  if (callee?.type !== 'selector_expression') return null;
  const field = callee.childForFieldName('field');
  const selector = field?.text ?? '';
  if (!field) return null;

  const args = call.childForFieldName('arguments');
  const argNodes = args ? namedChildNodes(args) : [];
  if (argNodes.length < 2) return null;
  const pattern = stringValue(argNodes[0] ?? null);
  if (pattern === null) return null;

  let method: string;
  let path = pattern;
  if (selector === 'Handle' || selector === 'HandleFunc') {
    const split = /^([A-Z]+)\s+(\/.*)$/.exec(pattern);
    method = split?.[1] ?? chainedMethod(call) ?? 'ANY';
    path = split?.[2] ?? pattern;
  } else if (isHttpMethod(selector) || selector === 'Any') {
    method = selector === 'Any' ? 'ANY' : selector;
  } else {
    return null;
  }
  if (!path.startsWith('/')) return null;

  return routeEntry(method, path, filePath, lineOf(field), frameworkHint(selector, paths));
}

function extract(root: Node, filePath: string): EntryPoint[] {
  const entries: EntryPoint[] = [];
  const packageClause = namedChildNodes(root).find((node) => node.type === 'package_clause');
  const packageName = packageClause ? namedChildNodes(packageClause)[0]?.text : undefined;

  if (packageName === 'main') {
    for (const node of namedChildNodes(root)) {
      if (node.type === 'function_declaration' && node.childForFieldName('name')?.text === 'main') {
        entries.push({ kind: 'function', name: 'main', filePath, line: lineOf(node), parameters: [] });
      }
    }
  }

  const paths = importedPaths(root);
  walk(root, (node) => {
    if (node.type === 'call_expression') {
      const route = registeredRoute(node, filePath, paths);
      if (route) entries.push(route);
    }
    return true;
  });
  return entries;
}

export const goAnalyzer: LanguageAnalyzer = {
  language: 'go',
  extensions: ['go'],
  ecosystems: ['go'],
  manifestKinds: MANIFESTS,
  parseEntryPoints: (content, filePath) => extractFromTree(content, 'go', filePath, (root) => extract(root, filePath)),
  parseManifest: (content, kind, manifestPath) => dependenciesFrom(MANIFESTS, content, kind, manifestPath),
};
