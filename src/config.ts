import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  github: z.object({
    apiUrl: z.string().url('Invalid GitHub API URL format'),
    rateLimitBufferSeconds: z.number().int().min(0).max(300),
    requestTimeoutMs: z.number().int().min(1000).max(600000),
  }),
  storage: z.object({
    outputRoot: z.string().min(1, 'Output root must not be empty'),
    auditLogPath: z.string().min(1, 'Audit log path must not be empty'),
    logTailLimit: z.number().int().min(10).max(10000),
  }),
  web: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1).max(65535),
  }),
  mcp: z.object({
    enabled: z.boolean(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Environment = Record<string, string | undefined>;

/**
 * Parse command line arguments
 * Usage: node dist/index.js --port 8000 --output-root ./output --debug
 */
function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments, then environment variables, then
 * defaults. Throws a ZodError when a value is out of range.
 */
export function loadConfig(argv: string[] = process.argv.slice(2), env: Environment = process.env): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return parseInt(cliValue, 10);
    const envValue = env[envKey];
    return envValue ? parseInt(envValue, 10) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'repo-extract'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    github: {
      apiUrl: getString('github-api-url', 'GITHUB_API_URL', 'https://api.github.com'),
      rateLimitBufferSeconds: getNumber('rate-limit-buffer', 'RATE_LIMIT_BUFFER_SECONDS', 1),
      requestTimeoutMs: getNumber('request-timeout', 'REQUEST_TIMEOUT_MS', 60000),
    },
    storage: {
      outputRoot: getString('output-root', 'OUTPUT_ROOT', 'output'),
      auditLogPath: getString('audit-log', 'AUDIT_LOG', 'audit-log.jsonl'),
      logTailLimit: getNumber('log-tail-limit', 'LOG_TAIL_LIMIT', 400),
    },
    web: {
      enabled: getBoolean('web', 'WEB_ENABLED', true),
      port: getNumber('port', 'PORT', 8000),
    },
    mcp: {
      enabled: getBoolean('mcp', 'MCP_ENABLED', false),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration, exiting the process when it is invalid
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - GitHub API URL must be valid (e.g., https://api.github.com)');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration and available CLI options
 */
export function printConfigInfo(config: Config): void {
  console.error('╔════════════════════════════════════════════════════════════════════╗');
  console.error('║                   Repo Extract - Configuration                     ║');
  console.error('╚════════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 GitHub API: ${config.github.apiUrl}`);
  console.error(
    `⏳ Rate limit: sleep until reset + ${config.github.rateLimitBufferSeconds}s | Timeout: ${config.github.requestTimeoutMs}ms`
  );
  console.error(`📁 Output: ${config.storage.outputRoot} | Audit: ${config.storage.auditLogPath}`);

  if (config.web.enabled) {
    console.error(`\n🌐 HTTP API: http://localhost:${config.web.port}`);
  }

  if (config.mcp.enabled) {
    console.error(`\n📡 MCP: STDIO mode`);
  }

  console.error('\n' + '─'.repeat(68));
}
