/**
 * Tree-sitter parser infrastructure.
 *
 * Handles:
 * - web-tree-sitter WASM runtime initialization
 * - Grammar lookup in installed grammar packages (and analysis.grammars_dir)
 * - Parser instance caching per grammar
 * - Graceful fallback when a grammar is unavailable
 */

import fs from 'fs';
import { createRequire } from 'module';
import path from 'path';
import { fileURLToPath } from 'url';
import { getAnalysisConfig } from '../config.js';
import { ParseError } from '../errors.js';
import { logError, logWarn } from '../fault-logger.js';
import { GRAMMAR_TO_WASM, type GrammarName } from './types.js';

// Re-export key types from web-tree-sitter for consumers
import type { Tree, Node, Parser, Language } from 'web-tree-sitter';
export type { Tree, Node };

// State, lazily initialized
let ParserClass: typeof import('web-tree-sitter').Parser | null = null;
let LanguageClass: typeof import('web-tree-sitter').Language | null = null;
let initialized = false;
let initPromise: Promise<void> | null = null;

/** Cache of loaded Language objects; null records a grammar that is not installed */
const languageCache = new Map<GrammarName, Language | null>();

/** Per-grammar parser instances */
const parserPool = new Map<GrammarName, Parser>();

function moduleDir(): string | null {
  try {
    return path.dirname(fileURLToPath(import.meta.url));
  } catch {
    return null;
  }
}

/** node_modules directories to search, nearest first. */
function nodeModulesRoots(): string[] {
  const roots = [path.join(process.cwd(), 'node_modules')];
  const dir = moduleDir();
  if (dir) {
    // src/lib/tree-sitter or dist/lib/tree-sitter → package root
    roots.push(path.resolve(dir, '..', '..', '..', 'node_modules'));
  }
  return [...new Set(roots)];
}

/**
 * Initialize the web-tree-sitter runtime.
 * Safe to call multiple times.
 */
export async function initTreeSitter(): Promise<boolean> {
  if (initialized) return true;

  if (initPromise) {
    await initPromise;
    return initialized;
  }

  initPromise = (async () => {
    // Without the runtime file emscripten aborts with a rejection nobody awaits
    const wasmPath = getTreeSitterWasmPath();
    if (!wasmPath) {
      logWarn('tree-sitter', 'web-tree-sitter runtime WASM not found; entry points are disabled');
      initialized = false;
      return;
    }

    try {
      // web-tree-sitter is an ESM module with named exports
      const mod = await import('web-tree-sitter');
      ParserClass = mod.Parser;
      LanguageClass = mod.Language;

      await ParserClass.init({
        locateFile: () => wasmPath,
      });

      initialized = true;
    } catch (err) {
      logError('tree-sitter', 'web-tree-sitter failed to initialize', err, { wasmPath });
      initialized = false;
    }
  })();

  await initPromise;
  return initialized;
}

/** Runtime file names across web-tree-sitter releases, current first. */
const RUNTIME_WASM_NAMES = ['tree-sitter.wasm', 'web-tree-sitter.wasm'];

/** Directory of the installed web-tree-sitter package, as Node resolves it. */
function webTreeSitterDir(): string | null {
  try {
    return path.dirname(createRequire(import.meta.url).resolve('web-tree-sitter'));
  } catch {
    return null;
  }
}

/**
 * Find the runtime WASM file shipped inside the web-tree-sitter package.
 * Returns null when no candidate exists on disk.
 */
export function getTreeSitterWasmPath(): string | null {
  const dirs: string[] = [];
  const resolved = webTreeSitterDir();
  if (resolved) dirs.push(resolved);
  for (const root of nodeModulesRoots()) dirs.push(path.join(root, 'web-tree-sitter'));

  for (const dir of new Set(dirs)) {
    for (const name of RUNTIME_WASM_NAMES) {
      const candidate = path.join(dir, name);
      if (fs.existsSync(candidate)) return candidate;
    }
  }
  return null;
}

/**
 * Locate a grammar WASM file. Checks analysis.grammars_dir first, then the
 * installed grammar packages.
 */
export function findGrammarFile(grammar: GrammarName): string | null {
  const wasmFileName = GRAMMAR_TO_WASM[grammar];
  const candidates: string[] = [];

  const grammarsDir = getAnalysisConfig().grammars_dir;
  if (grammarsDir) candidates.push(path.join(grammarsDir, wasmFileName));

  for (const root of nodeModulesRoots()) {
    candidates.push(
      path.join(root, '@repomix', 'tree-sitter-wasms', 'out', wasmFileName),
      path.join(root, 'tree-sitter-wasms', 'out', wasmFileName)
    );
  }

  return candidates.find((candidate) => fs.existsSync(candidate)) ?? null;
}

/**
 * Load a tree-sitter Language. Results (including misses) are cached in memory.
 */
export async function loadLanguage(grammar: GrammarName): Promise<Language | null> {
  if (languageCache.has(grammar)) return languageCache.get(grammar) ?? null;

  if (!(await initTreeSitter()) || !LanguageClass) return null;

  const grammarPath = findGrammarFile(grammar);
  let language: Language | null = null;
  if (grammarPath) {
    try {
      language = await LanguageClass.load(grammarPath);
    } catch {
      // Incompatible ABI or corrupt file: treat as unavailable
      language = null;
    }
  }

  languageCache.set(grammar, language);
  return language;
}

/**
 * Get (or create) a parser for a grammar.
 *
 * @returns Parser instance with language set, or null if unavailable
 */
async function getParser(grammar: GrammarName): Promise<Parser | null> {
  const language = await loadLanguage(grammar);
  if (!language || !ParserClass) return null;

  let parser = parserPool.get(grammar);
  if (!parser) {
    parser = new ParserClass();
    parser.setLanguage(language);
    parserPool.set(grammar, parser);
  }
  return parser;
}

/**
 * Parse source code.
 *
 * @returns Parse tree, or null if the grammar is unavailable
 */
export async function parseCode(code: string, grammar: GrammarName): Promise<Tree | null> {
  const parser = await getParser(grammar);
  if (!parser) return null;
  return parser.parse(code);
}

/** First ERROR or MISSING node in document order, if any. */
function findSyntaxError(node: Node): Node | null {
  if (node.type === 'ERROR' || node.isMissing) return node;
  for (const child of node.children) {
    if (!child) continue;
    const found = findSyntaxError(child);
    if (found) return found;
  }
  return null;
}

/**
 * Parse and require a clean tree.
 * Throws ParseError at the first syntax error; returns null when the
 * grammar is unavailable.
 */
export async function parseStrict(code: string, grammar: GrammarName, filePath: string): Promise<Tree | null> {
  const tree = await parseCode(code, grammar);
  if (!tree) return null;

  const error = findSyntaxError(tree.rootNode);
  if (error) {
    const line = error.startPosition.row + 1;
    tree.delete();
    throw new ParseError(filePath, `syntax error at line ${line}`, { line });
  }
  return tree;
}

/**
 * Reset the parser state (useful for testing).
 */
export function resetParserState(): void {
  for (const parser of parserPool.values()) {
    parser.delete();
  }
  parserPool.clear();
  languageCache.clear();
  initialized = false;
  initPromise = null;
  ParserClass = null;
  LanguageClass = null;
}
