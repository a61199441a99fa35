import { describe, it, expect } from 'vitest';
import { csharpAnalyzer } from './csharp.js';

function source(...lines: string[]): string {
  return lines.join('\n') + '\n';
}

describe('csharpAnalyzer', () => {
  it('should resolve controller route templates', async () => {
    const content = source(
      'using Microsoft.AspNetCore.Mvc;',
      '',
      'namespace Demo.Controllers',
      '{',
      '    [ApiController]',
      '    [Route("api/[controller]")]',
      '    public class UsersController : ControllerBase',
      '    {',
      '        [HttpGet("{id}")]',
      '        public IActionResult Get(int id) => Ok(id);',
      '',
      '        [HttpPost]',
      '        public IActionResult Create(UserDto dto) => Ok();',
      '',
      '        public static void Main(string[] args) { }',
      '    }',
      '}'
    );
    const filePath = 'Controllers/UsersController.cs';

    const entries = await csharpAnalyzer.parseEntryPoints(content, filePath);

    expect(entries).toEqual([
      {
        kind: 'route',
        name: 'GET /api/Users/{id}',
        filePath,
        line: 9,
        frameworkHint: 'ASP.NET Core controller',
        route: { method: 'GET', path: '/api/Users/{id}' },
        parameters: ['id'],
      },
      {
        kind: 'route',
        name: 'POST /api/Users',
        filePath,
        line: 12,
        frameworkHint: 'ASP.NET Core controller',
        route: { method: 'POST', path: '/api/Users' },
        parameters: ['dto'],
      },
      { kind: 'method', name: 'UsersController.Main', filePath, line: 15, parameters: ['args'] },
    ]);
  });

  it('should find top-level statements and minimal API routes', async () => {
    const content = source(
      'var builder = WebApplication.CreateBuilder(args);',
      'var app = builder.Build();',
      'app.MapGet("/health", () => "ok");',
      'app.Run();'
    );

    const entries = await csharpAnalyzer.parseEntryPoints(content, 'Program.cs');

    expect(entries).toEqual([
      { kind: 'function', name: '<top-level statements>', filePath: 'Program.cs', line: 1, parameters: [] },
      {
        kind: 'route',
        name: 'GET /health',
        filePath: 'Program.cs',
        line: 3,
        frameworkHint: 'ASP.NET Core minimal API',
        route: { method: 'GET', path: '/health' },
        parameters: [],
      },
    ]);
  });
});
