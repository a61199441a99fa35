/**
 * Rust analyzer: `fn main`, attribute routes (`#[get("/")]`, actix-web and
 * Rocket) and axum `.route("/x", get(handler).post(other))` registrations.
 */

import type { Node } from 'web-tree-sitter';
import type { EntryPoint } from '../types.js';
import type { LanguageAnalyzer, ManifestKind } from './types.js';
import { dependenciesFrom } from './manifests.js';
import { extractFromTree, firstDescendant, isHttpMethod, lineOf, namedChildNodes, routeEntry, stringValue, walk } from './syntax.js';

const MANIFESTS: readonly ManifestKind[] = ['cargo'];
const COMMENTS = new Set(['line_comment', 'block_comment']);

function parameterNames(fn: Node): string[] {
  const parameters = fn.childForFieldName('parameters');
  if (!parameters) return [];
  const names: string[] = [];
  for (const param of namedChildNodes(parameters)) {
    if (param.type !== 'parameter') continue;
    const pattern = param.childForFieldName('pattern');
    if (pattern) names.push(pattern.text.replace(/^mut\s+/, ''));
  }
  return names;
}

function precedingAttributes(fn: Node): Node[] {
  const attributes: Node[] = [];
  let sibling = fn.previousNamedSibling;
  while (sibling && (sibling.type === 'attribute_item' || COMMENTS.has(sibling.type))) {
    if (sibling.type === 'attribute_item') attributes.unshift(sibling);
    sibling = sibling.previousNamedSibling;
  }
  return attributes;
}

function attributeRoute(item: Node): { method: string; path: string } | null {
  const attribute = namedChildNodes(item).find((child) => child.type === 'attribute');
  if (!attribute) return null;
  const pathNode = namedChildNodes(attribute)[0];
  const method = pathNode?.text.split('::').pop() ?? '';
  if (!isHttpMethod(method)) return null;

  const args = attribute.childForFieldName('arguments');
  const literal = args ? firstDescendant(args, ['string_literal']) : null;
  const path = stringValue(literal);
  return path === null ? null : { method, path };
}

/** HTTP methods named inside an axum method router such as `get(a).post(b)`. */
function methodRouterMethods(node: Node): string[] {
  const methods: string[] = [];
  walk(node, (current) => {
    if (current.type !== 'call_expression') return true;
    const callee = current.childForFieldName('function');
    let name: string | undefined;
    if (callee?.type === 'identifier') name = callee.text;
    else if (callee?.type === 'scoped_identifier') name = callee.childForFieldName('name')?.text;
    else if (callee?.type === 'field_expression') name = callee.childForFieldName('field')?.text;
    if (name && isHttpMethod(name) && !methods.includes(name)) methods.push(name);
    return true;
  });
  return methods;
}

function axumRoutes(call: Node, filePath: string): EntryPoint[] {
  const callee = call.childForFieldName('function');
  if (callee?.type !== 'field_expression') return [];
  const field = callee.childForFieldName('field');
  if (!field || field.text !== 'route') return [];

  const args = call.childForFieldName('arguments');
  const [first, second] = args ? namedChildNodes(args) : [];
  const path = stringValue(first ?? null);
  if (path === null || !path.startsWith('/') || !second) return [];

  return methodRouterMethods(second).map((method) => routeEntry(method, path, filePath, lineOf(field), 'axum route'));
}

function extract(root: Node, filePath: string): EntryPoint[] {
  const entries: EntryPoint[] = [];
  const usesRocket = namedChildNodes(root).some(
    (node) => (node.type === 'use_declaration' || node.type === 'extern_crate_declaration') && /\brocket\b/.test(node.text)
  );

  for (const node of namedChildNodes(root)) {
    if (node.type === 'function_item' && node.childForFieldName('name')?.text === 'main') {
      entries.push({ kind: 'function', name: 'main', filePath, line: lineOf(node), parameters: [] });
    }
  }

  walk(root, (node) => {
    if (node.type === 'function_item') {
      for (const attribute of precedingAttributes(node)) {
        const route = attributeRoute(attribute);
        if (!route) continue;
        const hint = usesRocket ? 'Rocket route' : 'actix-web route';
        entries.push(routeEntry(route.method, route.path, filePath, lineOf(attribute), hint, parameterNames(node)));
      }
    } else if (node.type === 'call_expression') {
      entries.push(...axumRoutes(node, filePath));
    }
    return true;
  });
  return entries;
}

export const rustAnalyzer: LanguageAnalyzer = {
  language: 'rust',
  extensions: ['rs'],
  ecosystems: ['rust'],
  manifestKinds: MANIFESTS,
  parseEntryPoints: (content, filePath) => extractFromTree(content, 'rust', filePath, (root) => extract(root, filePath)),
  parseManifest: (content, kind, manifestPath) => dependenciesFrom(MANIFESTS, content, kind, manifestPath),
};
