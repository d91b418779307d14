import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export const RATE_LIMITED_OPERATIONS = [
  'createSession',
  'listSessions',
  'updateSession',
  'toggleFavorite',
  'deleteSession',
  'createMessage',
  'getMessages',
  'updateMessage',
  'deleteMessage',
  'resumeMessage',
] as const;
export type RateLimitedOperation = (typeof RATE_LIMITED_OPERATIONS)[number];

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
    logLevel: LogLevel;
  };
  api: {
    port: number;
    prefix: string;
    corsOrigins: string[];
  };
  auth: {
    apiKey: string;
  };
  database: {
    path: string;
  };
  rateLimit: {
    enabled: boolean;
    limits: Record<RateLimitedOperation, string>;
  };
}

export const DEFAULT_RATE_LIMITS: Record<RateLimitedOperation, string> = {
  createSession: '10/minute',
  listSessions: '30/minute',
  updateSession: '20/minute',
  toggleFavorite: '20/minute',
  deleteSession: '10/minute',
  createMessage: '50/minute',
  getMessages: '100/minute',
  updateMessage: '50/minute',
  deleteMessage: '20/minute',
  resumeMessage: '5/minute',
};

const RATE_LIMIT_ENV_KEYS: Record<RateLimitedOperation, string> = {
  createSession: 'RATE_LIMIT_CREATE_SESSION',
  listSessions: 'RATE_LIMIT_LIST_SESSIONS',
  updateSession: 'RATE_LIMIT_UPDATE_SESSION',
  toggleFavorite: 'RATE_LIMIT_TOGGLE_FAVORITE',
  deleteSession: 'RATE_LIMIT_DELETE_SESSION',
  createMessage: 'RATE_LIMIT_CREATE_MESSAGE',
  getMessages: 'RATE_LIMIT_GET_MESSAGES',
  updateMessage: 'RATE_LIMIT_UPDATE_MESSAGE',
  deleteMessage: 'RATE_LIMIT_DELETE_MESSAGE',
  resumeMessage: 'RATE_LIMIT_RESUME_MESSAGE',
};

export const RATE_LIMIT_PATTERN = /^(\d+)\s*\/\s*(second|minute|hour|day)$/;

const rateLimitString = z
  .string()
  .regex(RATE_LIMIT_PATTERN, 'Rate limit must look like "10/minute"')
  .refine((value) => parseInt(value, 10) > 0, 'Rate limit must allow at least 1 request');

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
    logLevel: z.enum(LOG_LEVELS),
  }),
  api: z.object({
    port: z.number().int().min(1).max(65535),
    prefix: z.string().regex(/^\/[A-Za-z0-9/_-]*$/, 'API prefix must start with "/"'),
    corsOrigins: z.array(z.string().min(1)),
  }),
  auth: z.object({
    apiKey: z
      .string()
      .min(8, 'API key must be at least 8 characters long')
      .refine((value) => value === value.trim(), 'API key must not start or end with whitespace'),
  }),
  database: z.object({
    path: z.string().min(1, 'Database path must not be empty'),
  }),
  rateLimit: z.object({
    enabled: z.boolean(),
    limits: z.object({
      createSession: rateLimitString,
      listSessions: rateLimitString,
      updateSession: rateLimitString,
      toggleFavorite: rateLimitString,
      deleteSession: rateLimitString,
      createMessage: rateLimitString,
      getMessages: rateLimitString,
      updateMessage: rateLimitString,
      deleteMessage: rateLimitString,
      resumeMessage: rateLimitString,
    }),
  }),
});

export class ConfigValidationError extends Error {
  constructor(public readonly issues: Array<{ path: string; message: string }>) {
    super(
      `Invalid configuration: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`
    );
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --port 8000 --database-path data/chat.db --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
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
 * Accepts a JSON array or a comma separated list.
 */
export function parseCorsOrigins(value: string): string[] {
  const trimmed = value.trim();
  if (trimmed.startsWith('[')) {
    try {
      const parsed = z.array(z.string()).safeParse(JSON.parse(trimmed));
      if (parsed.success) return parsed.data;
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
    }
    return [trimmed];
  }
  return trimmed
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Get configuration from CLI arguments, environment variables and defaults,
 * in that order of precedence. Throws ConfigValidationError when invalid.
 */
export function getConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string | null, envKey: string, defaultValue: string): string => {
    if (cliKey && typeof cliArgs[cliKey] === 'string') return String(cliArgs[cliKey]);
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string | null, envKey: string, defaultValue: boolean): boolean => {
    if (cliKey && cliArgs[cliKey] !== undefined) {
      return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    }
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string | null, envKey: string, defaultValue: number): number => {
    if (cliKey && typeof cliArgs[cliKey] === 'string') return Number(cliArgs[cliKey]);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const debug = getBoolean('debug', 'DEBUG', false);
  const logLevel = getString('log-level', 'LOG_LEVEL', debug ? 'debug' : 'info');

  const corsValue = env.BACKEND_CORS_ORIGINS;
  const corsOrigins = corsValue
    ? parseCorsOrigins(corsValue)
    : ['http://localhost:3000', 'http://localhost:8080', 'http://localhost:8000'];

  const limits = { ...DEFAULT_RATE_LIMITS };
  for (const operation of RATE_LIMITED_OPERATIONS) {
    limits[operation] = getString(null, RATE_LIMIT_ENV_KEYS[operation], DEFAULT_RATE_LIMITS[operation]);
  }

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'chat-store'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug,
      logLevel,
    },
    api: {
      port: getNumber('port', 'PORT', 8000),
      prefix: getString('api-prefix', 'API_PREFIX', '/api/v1'),
      corsOrigins,
    },
    auth: {
      apiKey: getString('api-key', 'API_KEY', ''),
    },
    database: {
      path: getString('database-path', 'DATABASE_PATH', 'data/chat-store.db'),
    },
    rateLimit: {
      enabled: getBoolean('rate-limit', 'RATE_LIMITER_ENABLED', true),
      limits,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.errors.map((err) => ({
        path: err.path.join('.') || 'root',
        message: err.message,
      }))
    );
  }

  const config: Config = result.data;
  return config;
}

/**
 * Print configuration validation errors with hints
 */
export function printConfigErrors(error: ConfigValidationError): void {
  console.error('\n❌ Configuration Validation Failed!\n');
  console.error('Errors:');
  error.issues.forEach((issue) => {
    console.error(`  • ${issue.path}: ${issue.message}`);
  });
  console.error('\n💡 Tips:');
  console.error('  - Check your .env file');
  console.error('  - Verify CLI arguments');
  console.error('  - API_KEY is required and must be at least 8 characters');
  console.error('  - Rate limits look like "10/minute" (second, minute, hour or day)');
  console.error();
}

/**
 * Print configuration summary. The API key is never printed.
 */
export function printConfigInfo(config: Config): void {
  console.log('╔════════════════════════════════════════════════════════════════════╗');
  console.log('║                  Chat Store Service - Configuration                ║');
  console.log('╚════════════════════════════════════════════════════════════════════╝');

  console.log(
    `\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`
  );
  console.log(`📝 Log level: ${config.server.logLevel}`);
  console.log(`💾 Database: ${config.database.path}`);
  console.log(`🌐 API: http://localhost:${config.api.port}${config.api.prefix}`);
  console.log(`🔓 CORS origins: ${config.api.corsOrigins.join(', ') || '(none)'}`);

  if (config.rateLimit.enabled) {
    console.log('\n⏱️  Rate limits:');
    for (const operation of RATE_LIMITED_OPERATIONS) {
      console.log(`   ${operation.padEnd(16)} ${config.rateLimit.limits[operation]}`);
    }
  } else {
    console.log('\n⏱️  Rate limiting disabled');
  }

  console.log('\n' + '─'.repeat(70));
}
