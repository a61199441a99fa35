/**
 * Python analyzer.
 *
 * Entry points:
 * - `if __name__ == "__main__":` guards
 * - module-level `def main`
 * - route decorators (`@app.get("/x")`, `@router.post(...)`, `@app.route("/x", methods=[...])`)
 * - Click/Typer command decorators
 */

import type { Node } from 'web-tree-sitter';
import type { EntryPoint } from '../types.js';
import type { LanguageAnalyzer, ManifestKind } from './types.js';
import { dependenciesFrom } from './manifests.js';
import { childNodes, extractFromTree, isHttpMethod, lineOf, namedChildNodes, routeEntry, stringValue, walk } from './syntax.js';

const MANIFESTS: readonly ManifestKind[] = ['requirements', 'setup-py', 'pyproject', 'pipfile'];

const MAIN_GUARDS = new Set(['__name__=="__main__"', '"__main__"==__name__']);
const IGNORED_PARAMETERS = new Set(['self', 'cls']);

/** Top-level package names imported by a module. */
function importedModules(root: Node): Set<string> {
  const modules = new Set<string>();
  for (const statement of namedChildNodes(root)) {
    if (statement.type === 'import_from_statement') {
      const moduleName = statement.childForFieldName('module_name');
      if (moduleName) modules.add(moduleName.text.split('.')[0] ?? '');
    } else if (statement.type === 'import_statement') {
      for (const child of namedChildNodes(statement)) {
        const dotted = child.type === 'aliased_import' ? child.childForFieldName('name') : child;
        if (dotted) modules.add(dotted.text.split('.')[0] ?? '');
      }
    }
  }
  return modules;
}

function parameterNames(fn: Node): string[] {
  const parameters = fn.childForFieldName('parameters');
  if (!parameters) return [];

  const names: string[] = [];
  for (const param of namedChildNodes(parameters)) {
    let name: string | undefined;
    if (param.type === 'identifier' || param.type === 'list_splat_pattern' || param.type === 'dictionary_splat_pattern') {
      name = param.text;
    } else if (param.type === 'default_parameter' || param.type === 'typed_default_parameter') {
      name = param.childForFieldName('name')?.text;
    } else if (param.type === 'typed_parameter') {
      name = namedChildNodes(param)[0]?.text;
    }
    if (name && !IGNORED_PARAMETERS.has(name)) names.push(name);
  }
  return names;
}

function keywordArgument(args: Node, keyword: string): Node | null {
  for (const arg of namedChildNodes(args)) {
    if (arg.type === 'keyword_argument' && arg.childForFieldName('name')?.text === keyword) {
      return arg.childForFieldName('value');
    }
  }
  return null;
}

interface DecoratorCall {
  /** `app.get` → `get` */
  attribute: string;
  args: Node | null;
}

function decoratorCall(decorator: Node): DecoratorCall | null {
  const expression = namedChildNodes(decorator)[0];
  if (!expression) return null;

  const callee = expression.type === 'call' ? expression.childForFieldName('function') : expression;
  if (callee?.type !== 'attribute') return null;
  const attribute = callee.childForFieldName('attribute')?.text;
  if (!attribute) return null;
  return { attribute, args: expression.type === 'call' ? expression.childForFieldName('arguments') : null };
}

function routePath(args: Node): string | null {
  const first = namedChildNodes(args)[0];
  if (first && first.type === 'string') return stringValue(first);
  return stringValue(keywordArgument(args, 'path') ?? keywordArgument(args, 'rule'));
}

function routeMethods(call: DecoratorCall): string[] {
  if (isHttpMethod(call.attribute)) return [call.attribute];
  if (call.attribute !== 'route' && call.attribute !== 'api_route') return [];

  const listed = call.args ? keywordArgument(call.args, 'methods') : null;
  if (!listed) return ['GET'];
  const methods = namedChildNodes(listed)
    .map((item) => stringValue(item))
    .filter((method): method is string => method !== null);
  return methods.length > 0 ? methods : ['GET'];
}

function routeHint(call: DecoratorCall, modules: Set<string>): string {
  if (modules.has('fastapi')) return 'FastAPI route';
  if (modules.has('flask')) return 'Flask route';
  return isHttpMethod(call.attribute) ? 'FastAPI route' : 'Flask route';
}

function commandHint(call: DecoratorCall, modules: Set<string>): string | null {
  if (call.attribute !== 'command' && call.attribute !== 'group') return null;
  if (modules.has('click')) return 'Click command';
  if (modules.has('typer')) return 'Typer command';
  return null;
}

function extract(root: Node, filePath: string): EntryPoint[] {
  const modules = importedModules(root);
  const entries: EntryPoint[] = [];

  for (const statement of namedChildNodes(root)) {
    if (statement.type === 'if_statement') {
      const condition = statement.childForFieldName('condition')?.text.replace(/\s+/g, '').replace(/'/g, '"');
      if (condition && MAIN_GUARDS.has(condition)) {
        entries.push({ kind: 'function', name: '__main__', filePath, line: lineOf(statement), parameters: [] });
      }
    } else if (statement.type === 'function_definition' && statement.childForFieldName('name')?.text === 'main') {
      entries.push({ kind: 'function', name: 'main', filePath, line: lineOf(statement), parameters: parameterNames(statement) });
    }
  }

  walk(root, (node) => {
    if (node.type !== 'decorated_definition') return true;
    const definition = node.childForFieldName('definition');
    if (definition?.type !== 'function_definition') return true;

    const name = definition.childForFieldName('name')?.text ?? '';
    const parameters = parameterNames(definition);
    const isModuleLevel = node.parent?.type === 'module';
    let described = false;

    for (const decorator of childNodes(node)) {
      if (decorator.type !== 'decorator') continue;
      const call = decoratorCall(decorator);
      if (!call) continue;

      const path = call.args ? routePath(call.args) : null;
      const methods = routeMethods(call);
      if (path !== null && methods.length > 0) {
        for (const method of methods) {
          entries.push(routeEntry(method, path, filePath, lineOf(decorator), routeHint(call, modules), parameters));
        }
        described = true;
        continue;
      }

      const hint = commandHint(call, modules);
      if (hint && !described) {
        entries.push({ kind: 'function', name, filePath, line: lineOf(definition), frameworkHint: hint, parameters });
        described = true;
      }
    }

    if (!described && isModuleLevel && name === 'main') {
      entries.push({ kind: 'function', name, filePath, line: lineOf(definition), parameters });
    }
    return true;
  });

  return entries;
}

export const pythonAnalyzer: LanguageAnalyzer = {
  language: 'python',
  extensions: ['py', 'pyw'],
  ecosystems: ['python'],
  manifestKinds: MANIFESTS,
  parseEntryPoints: (content, filePath) => extractFromTree(content, 'python', filePath, (root) => extract(root, filePath)),
  parseManifest: (content, kind, manifestPath) => dependenciesFrom(MANIFESTS, content, kind, manifestPath),
};
