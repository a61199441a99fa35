/**
 * C# analyzer.
 *
 * Entry points:
 * - `static Main` methods and top-level statements
 * - ASP.NET Core controller actions (`[HttpGet("{id}")]` under `[Route("api/[controller]")]`)
 * - minimal API registrations (`app.MapGet("/x", ...)`)
 */

import type { Node } from 'web-tree-sitter';
import type { EntryPoint } from '../types.js';
import type { LanguageAnalyzer, ManifestKind } from './types.js';
import { dependenciesFrom } from './manifests.js';
import { childNodes, extractFromTree, firstDescendant, joinRoute, lineOf, namedChildNodes, routeEntry, stringValue, walk } from './syntax.js';

const MANIFESTS: readonly ManifestKind[] = ['csproj'];

const HTTP_ATTRIBUTES: Record<string, string> = {
  HttpGet: 'GET',
  HttpPost: 'POST',
  HttpPut: 'PUT',
  HttpDelete: 'DELETE',
  HttpPatch: 'PATCH',
  HttpHead: 'HEAD',
  HttpOptions: 'OPTIONS',
};

const MAP_METHODS: Record<string, string> = {
  MapGet: 'GET',
  MapPost: 'POST',
  MapPut: 'PUT',
  MapDelete: 'DELETE',
  MapPatch: 'PATCH',
};

interface Attribute {
  /** Simple name without namespace or `Attribute` suffix. */
  name: string;
  /** First string argument, if any. */
  template: string | null;
  line: number;
}

function attributesOf(declaration: Node): Attribute[] {
  const attributes: Attribute[] = [];
  for (const list of childNodes(declaration)) {
    if (list.type !== 'attribute_list') continue;
    for (const attribute of namedChildNodes(list)) {
      if (attribute.type !== 'attribute') continue;
      const rawName = attribute.childForFieldName('name')?.text ?? '';
      const name = (rawName.split('.').pop() ?? '').replace(/Attribute$/, '');
      const args = namedChildNodes(attribute).find((child) => child.type === 'attribute_argument_list');
      const literal = args ? firstDescendant(args, ['string_literal', 'verbatim_string_literal']) : null;
      attributes.push({ name, template: stringValue(literal), line: lineOf(list) });
    }
  }
  return attributes;
}

function hasModifier(declaration: Node, modifier: string): boolean {
  return childNodes(declaration).some((child) => child.type === 'modifier' && child.text === modifier);
}

function parameterNames(method: Node): string[] {
  const parameters = method.childForFieldName('parameters');
  if (!parameters) return [];
  const names: string[] = [];
  for (const param of namedChildNodes(parameters)) {
    const name = param.childForFieldName('name')?.text;
    if (param.type === 'parameter' && name) names.push(name);
  }
  return names;
}

function actionPath(classTemplate: string, actionTemplate: string | null, controller: string, action: string): string {
  const template = actionTemplate ?? '';
  const combined = template.startsWith('/') || template.startsWith('~/') ? template.replace(/^~/, '') : joinRoute(classTemplate, template);
  return joinRoute(combined.replace(/\[controller\]/gi, controller).replace(/\[action\]/gi, action));
}

function classEntries(classNode: Node, filePath: string): EntryPoint[] {
  const className = classNode.childForFieldName('name')?.text ?? '';
  const body = classNode.childForFieldName('body');
  if (!body) return [];

  const classRoute = attributesOf(classNode).find((attribute) => attribute.name === 'Route');
  const controller = className.replace(/Controller$/, '');
  const entries: EntryPoint[] = [];

  for (const member of namedChildNodes(body)) {
    if (member.type !== 'method_declaration') continue;
    const name = member.childForFieldName('name')?.text ?? '';
    const parameters = parameterNames(member);

    if (name === 'Main' && hasModifier(member, 'static')) {
      entries.push({ kind: 'method', name: `${className}.Main`, filePath, line: lineOf(member), parameters });
    }

    const attributes = attributesOf(member);
    const methodRoute = attributes.find((attribute) => attribute.name === 'Route');
    for (const attribute of attributes) {
      const method = HTTP_ATTRIBUTES[attribute.name];
      if (!method) continue;
      const path = actionPath(classRoute?.template ?? '', attribute.template ?? methodRoute?.template ?? null, controller, name);
      entries.push(routeEntry(method, path, filePath, attribute.line, 'ASP.NET Core controller', parameters));
    }
  }
  return entries;
}

function minimalApiRoute(invocation: Node, filePath: string): EntryPoint | null {
  const callee = invocation.childForFieldName('function');
  if (callee?.type !== 'member_access_expression') return null;
  const nameNode = callee.childForFieldName('name');
  const method = nameNode ? MAP_METHODS[nameNode.text] : undefined;
  if (!nameNode || !method) return null;

  const args = invocation.childForFieldName('arguments');
  const first = args ? namedChildNodes(args)[0] : undefined;
  const literal = first ? firstDescendant(first, ['string_literal', 'verbatim_string_literal']) : null;
  const path = stringValue(literal);
  if (path === null) return null;

  return routeEntry(method, joinRoute(path), filePath, lineOf(nameNode), 'ASP.NET Core minimal API');
}

function extract(root: Node, filePath: string): EntryPoint[] {
  const entries: EntryPoint[] = [];

  const topLevel = namedChildNodes(root).find((node) => node.type === 'global_statement');
  if (topLevel) {
    entries.push({ kind: 'function', name: '<top-level statements>', filePath, line: lineOf(topLevel), parameters: [] });
  }

  walk(root, (node) => {
    if (node.type === 'class_declaration') {
      entries.push(...classEntries(node, filePath));
    } else if (node.type === 'invocation_expression') {
      const route = minimalApiRoute(node, filePath);
      if (route) entries.push(route);
    }
    return true;
  });
  return entries;
}

export const csharpAnalyzer: LanguageAnalyzer = {
  language: 'csharp',
  extensions: ['cs'],
  ecosystems: ['dotnet'],
  manifestKinds: MANIFESTS,
  parseEntryPoints: (content, filePath) => extractFromTree(content, 'c_sharp', filePath, (root) => extract(root, filePath)),
  parseManifest: (content, kind, manifestPath) => dependenciesFrom(MANIFESTS, content, kind, manifestPath),
};
