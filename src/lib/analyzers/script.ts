/**
 * JavaScript and TypeScript analyzers.
 *
 * Entry points:
 * - exported functions and classes (`export function`, `export const f = () =>`,
 *   `export default function`, `export class`)
 * - route registrations such as `app.get('/x', handler)` or `router.post(...)`
 * - NestJS controller methods (`@Get()`, `@Post(':id')` under `@Controller('prefix')`)
 */

import type { Node } from 'web-tree-sitter';
import type { AnalyzerLanguage, EntryPoint } from '../types.js';
import type { GrammarName } from '../tree-sitter/types.js';
import { extensionOf } from '../tree-sitter/types.js';
import type { LanguageAnalyzer, ManifestKind } from './types.js';
import { dependenciesFrom } from './manifests.js';
import {
  childNodes,
  extractFromTree,
  isHttpMethod,
  joinRoute,
  lineOf,
  namedChildNodes,
  routeEntry,
  stringValue,
  walk,
} from './syntax.js';

const MANIFESTS: readonly ManifestKind[] = ['package-json'];

const FUNCTION_VALUES = new Set(['arrow_function', 'function_expression', 'function', 'generator_function']);
const CLASS_DECLARATIONS = new Set(['class_declaration', 'abstract_class_declaration']);
const NEST_METHODS: Record<string, string> = {
  Get: 'GET',
  Post: 'POST',
  Put: 'PUT',
  Delete: 'DELETE',
  Patch: 'PATCH',
  Options: 'OPTIONS',
  Head: 'HEAD',
  All: 'ALL',
};

// ============================================================================
// Helpers
// ============================================================================

function parameterNames(fn: Node): string[] {
  const single = fn.childForFieldName('parameter');
  if (single) return [single.text];

  const parameters = fn.childForFieldName('parameters');
  if (!parameters) return [];
  return namedChildNodes(parameters)
    .filter((param) => param.type !== 'comment')
    .map((param) => {
      const pattern = param.childForFieldName('pattern') ?? param.childForFieldName('left');
      return (pattern ?? param).text;
    });
}

/** Module specifiers from `import … from 'x'` and `require('x')`. */
function importedModules(root: Node): Set<string> {
  const modules = new Set<string>();
  walk(root, (node) => {
    if (node.type === 'import_statement') {
      const source = stringValue(node.childForFieldName('source'));
      if (source) modules.add(source);
      return false;
    }
    if (node.type === 'call_expression' && node.childForFieldName('function')?.text === 'require') {
      const args = node.childForFieldName('arguments');
      const source = args ? stringValue(namedChildNodes(args)[0] ?? null) : null;
      if (source) modules.add(source);
    }
    return true;
  });
  return modules;
}

function routeHint(modules: Set<string>): string {
  if (modules.has('fastify')) return 'Fastify handler';
  if (modules.has('koa-router') || modules.has('@koa/router')) return 'Koa handler';
  if (modules.has('hono')) return 'Hono handler';
  return 'Express handler';
}

/** Decorators attached to a node, whether nested in it or preceding it. */
function decoratorsOf(node: Node): Node[] {
  const preceding: Node[] = [];
  let sibling = node.previousNamedSibling;
  while (sibling && sibling.type === 'decorator') {
    preceding.unshift(sibling);
    sibling = sibling.previousNamedSibling;
  }
  const own = childNodes(node).filter((child) => child.type === 'decorator');
  return [...preceding, ...own];
}

interface DecoratorInfo {
  name: string;
  node: Node;
  firstArgument: Node | null;
}

function decoratorInfo(decorator: Node): DecoratorInfo | null {
  const expression = namedChildNodes(decorator)[0];
  if (!expression) return null;
  if (expression.type === 'call_expression') {
    const callee = expression.childForFieldName('function');
    const args = expression.childForFieldName('arguments');
    if (!callee) return null;
    return { name: callee.text, node: decorator, firstArgument: args ? (namedChildNodes(args)[0] ?? null) : null };
  }
  return { name: expression.text, node: decorator, firstArgument: null };
}

/** Path of `@Controller('users')` or `@Controller({ path: 'users' })`. */
function decoratorPath(argument: Node | null): string {
  if (!argument) return '';
  if (argument.type === 'object') {
    for (const pair of namedChildNodes(argument)) {
      if (pair.type === 'pair' && pair.childForFieldName('key')?.text.replace(/['"]/g, '') === 'path') {
        return stringValue(pair.childForFieldName('value')) ?? '';
      }
    }
    return '';
  }
  return stringValue(argument) ?? '';
}

// ============================================================================
// Extraction
// ============================================================================

function exportedEntries(statement: Node, filePath: string): EntryPoint[] {
  const isDefault = childNodes(statement).some((child) => child.type === 'default');
  const declaration = statement.childForFieldName('declaration');
  const line = lineOf(statement);

  if (declaration) {
    const name = declaration.childForFieldName('name')?.text;
    if (declaration.type === 'function_declaration' || declaration.type === 'generator_function_declaration') {
      return [{ kind: 'function', name: name ?? 'default', filePath, line, parameters: parameterNames(declaration) }];
    }
    if (CLASS_DECLARATIONS.has(declaration.type)) {
      return [{ kind: 'class', name: name ?? 'default', filePath, line, parameters: [] }];
    }
    if (declaration.type === 'lexical_declaration' || declaration.type === 'variable_declaration') {
      const entries: EntryPoint[] = [];
      for (const declarator of namedChildNodes(declaration)) {
        const value = declarator.childForFieldName('value');
        const declaredName = declarator.childForFieldName('name')?.text;
        if (declarator.type !== 'variable_declarator' || !value || !declaredName) continue;
        if (FUNCTION_VALUES.has(value.type)) {
          entries.push({ kind: 'function', name: declaredName, filePath, line: lineOf(declarator), parameters: parameterNames(value) });
        } else if (value.type === 'class') {
          entries.push({ kind: 'class', name: declaredName, filePath, line: lineOf(declarator), parameters: [] });
        }
      }
      return entries;
    }
    return [];
  }

  const value = statement.childForFieldName('value');
  if (isDefault && value) {
    if (FUNCTION_VALUES.has(value.type)) {
      return [{ kind: 'function', name: value.childForFieldName('name')?.text ?? 'default', filePath, line, parameters: parameterNames(value) }];
    }
    if (value.type === 'class') {
      return [{ kind: 'class', name: value.childForFieldName('name')?.text ?? 'default', filePath, line, parameters: [] }];
    }
  }
  return [];
}

function registeredRoute(call: Node, filePath: string, hint: string): EntryPoint | null {
  const callee = call.childForFieldName('function');
  if (callee?.type !== 'member_expression') return null;
  const property = callee.childForFieldName('property');
  const method = property?.text ?? '';
  if (!property || (!isHttpMethod(method) && method !== 'all')) return null;

  const args = call.childForFieldName('arguments');
  const argNodes = args ? namedChildNodes(args) : [];
  if (argNodes.length < 2) return null;
  const path = stringValue(argNodes[0] ?? null);
  if (path === null || !path.startsWith('/')) return null;

  return routeEntry(method, path, filePath, lineOf(property), hint);
}

function controllerRoutes(classNode: Node, filePath: string): EntryPoint[] {
  const classDecorators = [
    ...decoratorsOf(classNode),
    ...(classNode.parent?.type === 'export_statement' ? decoratorsOf(classNode.parent) : []),
  ]
    .map(decoratorInfo)
    .filter((info): info is DecoratorInfo => info !== null);
  const controller = classDecorators.find((info) => info.name === 'Controller');
  if (!controller) return [];

  const prefix = decoratorPath(controller.firstArgument);
  const body = classNode.childForFieldName('body');
  if (!body) return [];

  const entries: EntryPoint[] = [];
  for (const member of namedChildNodes(body)) {
    if (member.type !== 'method_definition') continue;
    for (const decorator of decoratorsOf(member)) {
      const info = decoratorInfo(decorator);
      const method = info ? NEST_METHODS[info.name] : undefined;
      if (!info || !method) continue;
      const path = joinRoute(prefix, decoratorPath(info.firstArgument));
      entries.push(routeEntry(method, path, filePath, lineOf(decorator), 'NestJS controller', parameterNames(member)));
    }
  }
  return entries;
}

function extract(root: Node, filePath: string): EntryPoint[] {
  const entries: EntryPoint[] = [];
  const hint = routeHint(importedModules(root));

  for (const statement of namedChildNodes(root)) {
    if (statement.type === 'export_statement') entries.push(...exportedEntries(statement, filePath));
  }

  walk(root, (node) => {
    if (node.type === 'call_expression') {
      const route = registeredRoute(node, filePath, hint);
      if (route) entries.push(route);
    } else if (CLASS_DECLARATIONS.has(node.type)) {
      entries.push(...controllerRoutes(node, filePath));
    }
    return true;
  });

  return entries;
}

// ============================================================================
// Analyzers
// ============================================================================

function createScriptAnalyzer(
  language: AnalyzerLanguage,
  extensions: readonly string[],
  grammarFor: (filePath: string) => GrammarName
): LanguageAnalyzer {
  return {
    language,
    extensions,
    ecosystems: ['node'],
    manifestKinds: MANIFESTS,
    parseEntryPoints: (content, filePath) =>
      extractFromTree(content, grammarFor(filePath), filePath, (root) => extract(root, filePath)),
    parseManifest: (content, kind, manifestPath) => dependenciesFrom(MANIFESTS, content, kind, manifestPath),
  };
}

export const javascriptAnalyzer = createScriptAnalyzer('javascript', ['js', 'jsx', 'mjs', 'cjs'], () => 'javascript');

export const typescriptAnalyzer = createScriptAnalyzer('typescript', ['ts', 'tsx', 'mts', 'cts'], (filePath) =>
  extensionOf(filePath) === 'tsx' ? 'tsx' : 'typescript'
);
