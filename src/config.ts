import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

// Zod validation schema
const ConfigSchema = z.object({
  client: z.object({
    name: z.string().min(1, 'Client name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  api: z.object({
    baseUrl: z.string().url('Invalid scan API URL format'),
    deviceId: z.string().min(1).optional(),
    resetDeviceId: z.boolean(),
    connectTimeoutMs: z.number().int().min(1000).max(120000),
    idleTimeoutMs: z.number().int().min(1000).max(600000),
    defaultRetryAfterSeconds: z.number().int().min(1).max(3600),
  }),
  streams: z.object({
    maxConcurrent: z.number().int().min(1).max(20),
    maxAttempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().min(100).max(60000),
    maxDelayMs: z.number().int().min(100).max(300000),
  }),
  queue: z.object({
    dbPath: z.string().min(1, 'Queue database path must not be empty'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

// Flags that never take a value
const BOOLEAN_FLAGS = new Set(['debug', 'reset-device-id']);

export interface ParsedArgs {
  flags: Record<string, string | boolean>;
  positionals: string[];
}

/**
 * Parse command line arguments
 * Usage: scan-client --api-url https://scan.example.com --max-streams 3 --debug shelf1.jpg shelf2.jpg
 */
export function parseArgs(argv: string[] = process.argv): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positionals: string[] = [];

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const eq = key.indexOf('=');
      if (eq !== -1) {
        flags[key.slice(0, eq)] = key.slice(eq + 1);
        continue;
      }

      // Check if next arg is a value or another flag
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('--') && !BOOLEAN_FLAGS.has(key)) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = true;
      }
    } else {
      positionals.push(arg);
    }
  }

  return { flags, positionals };
}

/**
 * Build configuration from CLI arguments, environment variables and defaults.
 * Throws ZodError when the result is invalid.
 */
export function loadConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const { flags } = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = flags[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = flags[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || undefined;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = flags[cliKey];
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = flags[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    client: {
      name: 'spine-scan-client',
      version: '1.0.0',
      debug: getBoolean('debug', 'DEBUG', false),
    },
    api: {
      baseUrl: getString('api-url', 'SCAN_API_URL', 'http://localhost:8787'),
      deviceId: getOptionalString('device-id', 'DEVICE_ID'),
      resetDeviceId: getBoolean('reset-device-id', 'RESET_DEVICE_ID', false),
      connectTimeoutMs: getNumber('connect-timeout', 'CONNECT_TIMEOUT_MS', 30000),
      idleTimeoutMs: getNumber('idle-timeout', 'STREAM_IDLE_TIMEOUT_MS', 90000),
      defaultRetryAfterSeconds: getNumber('retry-after', 'DEFAULT_RETRY_AFTER_SECONDS', 60),
    },
    streams: {
      maxConcurrent: getNumber('max-streams', 'MAX_CONCURRENT_STREAMS', 5),
      maxAttempts: getNumber('max-attempts', 'STREAM_MAX_ATTEMPTS', 3),
      initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 2000),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 8000),
    },
    queue: {
      dbPath: getString('queue-db', 'QUEUE_DB_PATH', 'data/scan-queue.db'),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get validated configuration, exiting the process when it is invalid
 */
export function getConfig(argv: string[] = process.argv): Config {
  try {
    return loadConfig(argv);
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
      console.error('  - SCAN_API_URL must be a full URL (e.g., https://scan.example.com)');
      console.error('  - MAX_CONCURRENT_STREAMS must be between 1 and 20');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('╔════════════════════════════════════════════════════════════════════╗');
  console.error('║                 Spine Scan Client - Configuration                  ║');
  console.error('╚════════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Client: ${config.client.name} v${config.client.version} ${config.client.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 API: ${config.api.baseUrl}`);
  console.error(
    `⏱️  Timeouts: connect ${config.api.connectTimeoutMs}ms | idle ${config.api.idleTimeoutMs}ms | default Retry-After ${config.api.defaultRetryAfterSeconds}s`
  );
  console.error(
    `⚙️  Streams: ${config.streams.maxConcurrent} concurrent | Retry: ${config.streams.maxAttempts}x (${config.streams.initialDelayMs}-${config.streams.maxDelayMs}ms)`
  );
  console.error(`💾 Queue: ${config.queue.dbPath}`);

  console.error('\n' + '─'.repeat(68));
}
