import { z } from 'zod';
import { loadConfig } from '../src/config.js';

describe('Configuration', () => {
  test('defaults', () => {
    expect(loadConfig([], {})).toEqual({
      server: { name: 'repo-extract', version: '1.0.0', debug: false },
      github: { apiUrl: 'https://api.github.com', rateLimitBufferSeconds: 1, requestTimeoutMs: 60000 },
      storage: { outputRoot: 'output', auditLogPath: 'audit-log.jsonl', logTailLimit: 400 },
      web: { enabled: true, port: 8000 },
      mcp: { enabled: false },
    });
  });

  test('CLI arguments win over environment variables', () => {
    const config = loadConfig(['--port', '9000', '--debug', '--output-root', '/tmp/out'], {
      PORT: '7000',
      OUTPUT_ROOT: '/var/out',
      RATE_LIMIT_BUFFER_SECONDS: '5',
      MCP_ENABLED: 'true',
    });

    expect(config.web.port).toBe(9000);
    expect(config.server.debug).toBe(true);
    expect(config.storage.outputRoot).toBe('/tmp/out');
    expect(config.github.rateLimitBufferSeconds).toBe(5);
    expect(config.mcp.enabled).toBe(true);
  });

  test('rejects an invalid API URL', () => {
    expect(() => loadConfig([], { GITHUB_API_URL: 'not a url' })).toThrow(z.ZodError);
  });
});
