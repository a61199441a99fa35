/**
 * Java analyzer: `public static void main`, Spring MVC mappings and JAX-RS resources.
 */

import type { Node } from 'web-tree-sitter';
import type { EntryPoint } from '../types.js';
import type { LanguageAnalyzer, ManifestKind } from './types.js';
import { dependenciesFrom } from './manifests.js';
import { childNodes, extractFromTree, firstDescendant, joinRoute, lineOf, namedChildNodes, routeEntry, stringValue, walk } from './syntax.js';

const MANIFESTS: readonly ManifestKind[] = ['pom', 'gradle'];

const SPRING_MAPPINGS: Record<string, string | null> = {
  GetMapping: 'GET',
  PostMapping: 'POST',
  PutMapping: 'PUT',
  DeleteMapping: 'DELETE',
  PatchMapping: 'PATCH',
  RequestMapping: null,
};

const JAX_RS_METHODS = new Set(['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS']);

interface Annotation {
  /** Simple name, package prefix dropped. */
  name: string;
  node: Node;
}

function annotationsOf(declaration: Node): Annotation[] {
  const modifiers = childNodes(declaration).find((child) => child.type === 'modifiers');
  if (!modifiers) return [];
  return namedChildNodes(modifiers)
    .filter((child) => child.type === 'annotation' || child.type === 'marker_annotation')
    .map((node) => ({ name: (node.childForFieldName('name')?.text ?? '').split('.').pop() ?? '', node }));
}

function modifierWords(declaration: Node): Set<string> {
  const modifiers = childNodes(declaration).find((child) => child.type === 'modifiers');
  return new Set(modifiers ? childNodes(modifiers).filter((child) => !child.isNamed).map((child) => child.type) : []);
}

/** `@X("/a")`, `@X(value = "/a")`, `@X(path = {"/a", "/b"})` → `/a` */
function annotationPath(annotation: Node): string {
  const args = annotation.childForFieldName('arguments');
  if (!args) return '';
  for (const arg of namedChildNodes(args)) {
    if (arg.type === 'element_value_pair') {
      const key = arg.childForFieldName('key')?.text;
      if (key !== 'value' && key !== 'path') continue;
      const value = arg.childForFieldName('value');
      if (!value) continue;
      const literal = value.type === 'string_literal' ? value : firstDescendant(value, ['string_literal']);
      return stringValue(literal) ?? '';
    }
    const literal = arg.type === 'string_literal' ? arg : firstDescendant(arg, ['string_literal']);
    if (literal) return stringValue(literal) ?? '';
  }
  return '';
}

/** `method = RequestMethod.POST` on a @RequestMapping, else ANY. */
function requestMappingMethod(annotation: Node): string {
  const match = /RequestMethod\.(\w+)/.exec(annotation.childForFieldName('arguments')?.text ?? '');
  return match?.[1] ?? 'ANY';
}

function parameterNames(method: Node): string[] {
  const parameters = method.childForFieldName('parameters');
  if (!parameters) return [];
  const names: string[] = [];
  for (const param of namedChildNodes(parameters)) {
    const name =
      param.childForFieldName('name')?.text ?? firstDescendant(param, ['variable_declarator'])?.childForFieldName('name')?.text;
    if (name) names.push(name);
  }
  return names;
}

function typeEntries(typeNode: Node, filePath: string): EntryPoint[] {
  const typeName = typeNode.childForFieldName('name')?.text ?? '';
  const body = typeNode.childForFieldName('body');
  if (!body) return [];

  const typeAnnotations = annotationsOf(typeNode);
  const springPrefix = typeAnnotations.find((a) => a.name === 'RequestMapping');
  const jaxPrefix = typeAnnotations.find((a) => a.name === 'Path');

  const entries: EntryPoint[] = [];
  for (const member of namedChildNodes(body)) {
    if (member.type !== 'method_declaration') continue;
    const name = member.childForFieldName('name')?.text ?? '';
    const parameters = parameterNames(member);

    const words = modifierWords(member);
    if (name === 'main' && words.has('public') && words.has('static') && member.childForFieldName('type')?.text === 'void') {
      entries.push({ kind: 'method', name: `${typeName}.main`, filePath, line: lineOf(member), parameters });
    }

    const annotations = annotationsOf(member);
    const methodPath = annotations.find((a) => a.name === 'Path');
    for (const annotation of annotations) {
      if (Object.hasOwn(SPRING_MAPPINGS, annotation.name)) {
        const method = SPRING_MAPPINGS[annotation.name] ?? requestMappingMethod(annotation.node);
        const path = joinRoute(springPrefix ? annotationPath(springPrefix.node) : '', annotationPath(annotation.node));
        entries.push(routeEntry(method, path, filePath, lineOf(annotation.node), 'Spring endpoint', parameters));
      } else if (JAX_RS_METHODS.has(annotation.name)) {
        const path = joinRoute(jaxPrefix ? annotationPath(jaxPrefix.node) : '', methodPath ? annotationPath(methodPath.node) : '');
        entries.push(routeEntry(annotation.name, path, filePath, lineOf(annotation.node), 'JAX-RS resource', parameters));
      }
    }
  }
  return entries;
}

function extract(root: Node, filePath: string): EntryPoint[] {
  const entries: EntryPoint[] = [];
  walk(root, (node) => {
    if (node.type === 'class_declaration' || node.type === 'interface_declaration') {
      entries.push(...typeEntries(node, filePath));
    }
    return true;
  });
  return entries;
}

export const javaAnalyzer: LanguageAnalyzer = {
  language: 'java',
  extensions: ['java'],
  ecosystems: ['jvm'],
  manifestKinds: MANIFESTS,
  parseEntryPoints: (content, filePath) => extractFromTree(content, 'java', filePath, (root) => extract(root, filePath)),
  parseManifest: (content, kind, manifestPath) => dependenciesFrom(MANIFESTS, content, kind, manifestPath),
};
