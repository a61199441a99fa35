import { describe, it, expect } from 'vitest';
import { goAnalyzer } from './go.js';

function source(...lines: string[]): string {
  return lines.join('\n') + '\n';
}

describe('goAnalyzer', () => {
  it('should find main and route registrations by framework', async () => {
    const content = source(
      'package main',
      '',
      'import (',
      '\t"net/http"',
      '',
      '\t"github.com/gin-gonic/gin"',
      ')',
      '',
      'func main() {',
      '\tr := gin.Default()',
      '\tr.GET("/ping", ping)',
      '\thttp.HandleFunc("POST /submit", submit)',
      '}'
    );
    const filePath = 'cmd/server/main.go';

    const entries = await goAnalyzer.parseEntryPoints(content, filePath);

    expect(entries).toEqual([
      { kind: 'function', name: 'main', filePath, line: 9, parameters: [] },
      {
        kind: 'route',
        name: 'GET /ping',
        filePath,
        line: 11,
        frameworkHint: 'Gin route',
        route: { method: 'GET', path: '/ping' },
        parameters: [],
      },
      {
        kind: 'route',
        name: 'POST /submit',
        filePath,
        line: 12,
        frameworkHint: 'net/http handler',
        route: { method: 'POST', path: '/submit' },
        parameters: [],
      },
    ]);
  });

  it('should take the method from a gorilla Methods chain', async () => {
    const content = source(
      'package api',
      '',
      'import "github.com/gorilla/mux"',
      '',
      'func Routes(r *mux.Router) {',
      '\tr.HandleFunc("/users", listUsers).Methods("GET")',
      '\tr.HandleFunc("/health", health)',
      '}'
    );

    const entries = await goAnalyzer.parseEntryPoints(content, 'api/routes.go');

    expect(entries.map((e) => [e.name, e.line, e.frameworkHint])).toEqual([
      ['GET /users', 6, 'gorilla/mux route'],
      ['ANY /health', 7, 'gorilla/mux route'],
    ]);
  });

  it('should not report main outside package main', async () => {
    const content = source('package lib', '', 'func main() {}');

    await expect(goAnalyzer.parseEntryPoints(content, 'lib/lib.go')).resolves.toEqual([]);
  });
});
