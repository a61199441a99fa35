import { describe, it, expect } from 'vitest';
import { javascriptAnalyzer, typescriptAnalyzer } from './script.js';

function source(...lines: string[]): string {
  return lines.join('\n') + '\n';
}

describe('javascriptAnalyzer', () => {
  it('should find exports and Express route registrations', async () => {
    const content = source(
      "const express = require('express');",
      'const app = express();',
      '',
      "app.get('/users', (req, res) => res.json([]));",
      "app.post('/users/:id', handler);",
      '',
      'export function start(port) {}',
      'export const stop = async () => {};',
      'export default class Server {}'
    );

    const entries = await javascriptAnalyzer.parseEntryPoints(content, 'src/server.js');

    expect(entries).toEqual([
      { kind: 'function', name: 'start', filePath: 'src/server.js', line: 7, parameters: ['port'] },
      { kind: 'function', name: 'stop', filePath: 'src/server.js', line: 8, parameters: [] },
      { kind: 'class', name: 'Server', filePath: 'src/server.js', line: 9, parameters: [] },
      {
        kind: 'route',
        name: 'GET /users',
        filePath: 'src/server.js',
        line: 4,
        frameworkHint: 'Express handler',
        route: { method: 'GET', path: '/users' },
        parameters: [],
      },
      {
        kind: 'route',
        name: 'POST /users/:id',
        filePath: 'src/server.js',
        line: 5,
        frameworkHint: 'Express handler',
        route: { method: 'POST', path: '/users/:id' },
        parameters: [],
      },
    ]);
  });

  it('should not treat map lookups as routes', async () => {
    const content = source("const cache = new Map();", "cache.get('/users');", "settings.get('timeout', 30);");

    await expect(javascriptAnalyzer.parseEntryPoints(content, 'src/cache.js')).resolves.toEqual([]);
  });
});

describe('typescriptAnalyzer', () => {
  it('should combine the controller prefix with NestJS method decorators', async () => {
    const content = source(
      "import { Controller, Get, Param } from '@nestjs/common';",
      '',
      "@Controller('users')",
      'export class UsersController {',
      '  @Get()',
      '  findAll(): string[] {',
      '    return [];',
      '  }',
      '',
      "  @Get(':id')",
      "  findOne(@Param('id') id: string): string {",
      '    return id;',
      '  }',
      '}'
    );

    const entries = await typescriptAnalyzer.parseEntryPoints(content, 'src/users.controller.ts');

    expect(entries.find((e) => e.kind === 'class')?.name).toBe('UsersController');
    expect(entries.filter((e) => e.kind === 'route')).toEqual([
      {
        kind: 'route',
        name: 'GET /users',
        filePath: 'src/users.controller.ts',
        line: 5,
        frameworkHint: 'NestJS controller',
        route: { method: 'GET', path: '/users' },
        parameters: [],
      },
      {
        kind: 'route',
        name: 'GET /users/:id',
        filePath: 'src/users.controller.ts',
        line: 10,
        frameworkHint: 'NestJS controller',
        route: { method: 'GET', path: '/users/:id' },
        parameters: ['id'],
      },
    ]);
  });

  it('should report Fastify registrations with their framework', async () => {
    const content = source(
      "import Fastify from 'fastify';",
      '',
      'const server = Fastify();',
      "server.delete('/sessions/:id', async () => ({}));"
    );

    const entries = await typescriptAnalyzer.parseEntryPoints(content, 'src/app.ts');

    expect(entries.map((e) => [e.name, e.frameworkHint])).toEqual([['DELETE /sessions/:id', 'Fastify handler']]);
  });
});

describe('typescriptAnalyzer with TSX', () => {
  it('should parse .tsx files with the TSX grammar', async () => {
    const content = source('export default function App() {', '  return <div className="app" />;', '}');

    const entries = await typescriptAnalyzer.parseEntryPoints(content, 'src/App.tsx');

    expect(entries).toEqual([{ kind: 'function', name: 'App', filePath: 'src/App.tsx', line: 1, parameters: [] }]);
  });
});
