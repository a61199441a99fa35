import { describe, it, expect } from 'vitest';
import { ParseError } from '../errors.js';
import { pythonAnalyzer } from './python.js';

function source(...lines: string[]): string {
  return lines.join('\n') + '\n';
}

describe('pythonAnalyzer', () => {
  it('should find FastAPI routes at the decorator line and the main guard', async () => {
    const content = source(
      'from fastapi import FastAPI',
      '',
      'app = FastAPI()',
      '',
      '',
      '@app.get("/health")',
      'def health():',
      '    return {"ok": True}',
      '',
      '',
      '@app.post("/items/{item_id}")',
      'async def create_item(item_id: int, payload: dict = None):',
      '    return payload',
      '',
      '',
      'def _helper():',
      '    pass',
      '',
      '',
      'if __name__ == "__main__":',
      '    _helper()'
    );

    const entries = await pythonAnalyzer.parseEntryPoints(content, 'app/main.py');

    expect(entries).toEqual([
      { kind: 'function', name: '__main__', filePath: 'app/main.py', line: 20, parameters: [] },
      {
        kind: 'route',
        name: 'GET /health',
        filePath: 'app/main.py',
        line: 6,
        frameworkHint: 'FastAPI route',
        route: { method: 'GET', path: '/health' },
        parameters: [],
      },
      {
        kind: 'route',
        name: 'POST /items/{item_id}',
        filePath: 'app/main.py',
        line: 11,
        frameworkHint: 'FastAPI route',
        route: { method: 'POST', path: '/items/{item_id}' },
        parameters: ['item_id', 'payload'],
      },
    ]);
  });

  it('should emit one Flask route per listed method', async () => {
    const content = source(
      'from flask import Blueprint',
      '',
      'bp = Blueprint("auth", __name__)',
      '',
      '',
      '@bp.route("/login", methods=["GET", "POST"])',
      'def login():',
      '    return "ok"',
      '',
      '',
      '@bp.route("/logout")',
      'def logout():',
      '    return "bye"'
    );

    const entries = await pythonAnalyzer.parseEntryPoints(content, 'auth.py');

    expect(entries.map((e) => [e.name, e.line, e.frameworkHint])).toEqual([
      ['GET /login', 6, 'Flask route'],
      ['POST /login', 6, 'Flask route'],
      ['GET /logout', 11, 'Flask route'],
    ]);
  });

  it('should report Click commands once, ignoring option decorators', async () => {
    const content = source(
      'import click',
      '',
      '',
      '@click.command()',
      '@click.option("--name")',
      'def greet(name):',
      '    click.echo(name)'
    );

    const entries = await pythonAnalyzer.parseEntryPoints(content, 'cli.py');

    expect(entries).toEqual([
      { kind: 'function', name: 'greet', filePath: 'cli.py', line: 6, frameworkHint: 'Click command', parameters: ['name'] },
    ]);
  });

  it('should find a module-level main function', async () => {
    const content = source('import sys', '', '', 'def main(argv=None):', '    return 0');

    const entries = await pythonAnalyzer.parseEntryPoints(content, 'tool/__main__.py');

    expect(entries).toEqual([{ kind: 'function', name: 'main', filePath: 'tool/__main__.py', line: 4, parameters: ['argv'] }]);
  });

  it('should ignore main methods inside classes', async () => {
    const content = source('class Runner:', '    def main(self):', '        pass');

    await expect(pythonAnalyzer.parseEntryPoints(content, 'runner.py')).resolves.toEqual([]);
  });

  it('should throw ParseError for a file with a syntax error', async () => {
    await expect(pythonAnalyzer.parseEntryPoints('def broken(:\n    pass\n', 'broken.py')).rejects.toBeInstanceOf(ParseError);
  });
});

describe('pythonAnalyzer.parseManifest', () => {
  it('should read Python manifests and ignore others', () => {
    expect(pythonAnalyzer.parseManifest('fastapi==0.100.0\n', 'requirements', 'requirements.txt')).toEqual([
      { name: 'fastapi', version: '0.100.0', manifest: 'requirements.txt', scope: 'runtime' },
    ]);
    expect(pythonAnalyzer.parseManifest('{}', 'package-json', 'package.json')).toEqual([]);
  });
});
