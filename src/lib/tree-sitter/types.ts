/**
 * Grammar tables for the tree-sitter layer.
 *
 * A grammar is what web-tree-sitter loads; an analyzer language may use
 * more than one (TypeScript uses `typescript` and `tsx`, C++ also parses
 * `.c` files with the `c` grammar).
 */

export const GRAMMARS = [
  'python',
  'javascript',
  'typescript',
  'tsx',
  'java',
  'c',
  'cpp',
  'go',
  'rust',
  'c_sharp',
] as const;
export type GrammarName = (typeof GRAMMARS)[number];

/** WASM file names, as shipped in @repomix/tree-sitter-wasms/out. */
export const GRAMMAR_TO_WASM: Record<GrammarName, string> = {
  python: 'tree-sitter-python.wasm',
  javascript: 'tree-sitter-javascript.wasm',
  typescript: 'tree-sitter-typescript.wasm',
  tsx: 'tree-sitter-tsx.wasm',
  java: 'tree-sitter-java.wasm',
  c: 'tree-sitter-c.wasm',
  cpp: 'tree-sitter-cpp.wasm',
  go: 'tree-sitter-go.wasm',
  rust: 'tree-sitter-rust.wasm',
  c_sharp: 'tree-sitter-c_sharp.wasm',
};

/** Lower-cased extension of a path, without the dot ('' if none). */
export function extensionOf(filePath: string): string {
  const base = filePath.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot + 1).toLowerCase() : '';
}
