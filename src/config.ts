import * as dotenv from 'dotenv';
import os from 'os';
import path from 'path';
import { z } from 'zod';

export const APP_NAME = 'text-transformer-toolbox';

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
    host: string;
    port: number;
  };
  ollama: {
    apiUrl: string;
    defaultModel: string;
    timeoutMs: number;
    temperature: number;
  };
  catalog: {
    promptsFile: string;
    maxSelected: number;
  };
  preferences: {
    directory: string;
  };
  uploads: {
    maxBytes: number;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
    host: z.string().min(1, 'Host must not be empty'),
    port: z.number().int().min(0).max(65535),
  }),
  ollama: z.object({
    apiUrl: z.string().url('Invalid Ollama URL format'),
    defaultModel: z.string().min(1, 'Default model must not be empty'),
    timeoutMs: z.number().int().min(1000).max(3_600_000),
    temperature: z.number().min(0).max(2),
  }),
  catalog: z.object({
    promptsFile: z.string().min(1),
    maxSelected: z.number().int().min(1).max(50),
  }),
  preferences: z.object({
    directory: z.string().min(1),
  }),
  uploads: z.object({
    maxBytes: z.number().int().min(1024),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/index.js --port 8501 --ollama-url http://localhost:11434 --model llama3 --debug
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
 * Per-user configuration directory for this application
 */
export function userConfigDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  const home = os.homedir();

  if (platform === 'win32') {
    return path.join(env.APPDATA || path.join(home, 'AppData', 'Roaming'), APP_NAME);
  }
  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Application Support', APP_NAME);
  }
  return path.join(env.XDG_CONFIG_HOME || path.join(home, '.config'), APP_NAME);
}

/**
 * Build the configuration from CLI arguments, environment variables and defaults.
 * Throws a ZodError when the result is invalid.
 */
export function loadConfig(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Config {
  const cliArgs = parseArgs(argv);

  // Helper to get value from CLI args or env, with type conversion
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : (envValue === 'false' ? false : defaultValue);
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', APP_NAME),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
      host: getString('host', 'HOST', '127.0.0.1'),
      port: getNumber('port', 'PORT', 8501),
    },
    ollama: {
      apiUrl: getString('ollama-url', 'OLLAMA_API_URL', 'http://localhost:11434').replace(/\/+$/, ''),
      defaultModel: getString('model', 'DEFAULT_MODEL', 'llama3'),
      timeoutMs: getNumber('timeout-ms', 'OLLAMA_TIMEOUT_MS', 120_000),
      temperature: getNumber('temperature', 'OLLAMA_TEMPERATURE', 0.7),
    },
    catalog: {
      promptsFile: path.resolve(
        getString('prompts-file', 'PROMPTS_FILE', path.resolve(__dirname, '..', 'data', 'prompts.json'))
      ),
      maxSelected: getNumber('max-transformations', 'MAX_TRANSFORMATIONS', 10),
    },
    preferences: {
      directory: getString('preferences-dir', 'PREFERENCES_DIR', userConfigDir(env)),
    },
    uploads: {
      maxBytes: getNumber('max-upload-mb', 'MAX_UPLOAD_MB', 25) * 1024 * 1024,
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration from .env, environment variables or CLI arguments.
 * Prints validation errors and exits when the configuration is invalid.
 */
export function getConfig(): Config {
  // Load environment variables from .env file
  dotenv.config();

  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach(err => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Ollama URL must be valid (e.g., http://localhost:11434)');
      console.error('  - Timeout is given in milliseconds (at least 1000)');
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
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║            Text Transformer Toolbox - Configuration             ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 Ollama: ${config.ollama.apiUrl}`);
  console.error(`🤖 Default model: ${config.ollama.defaultModel}`);
  console.error(`⏱️  Request timeout: ${config.ollama.timeoutMs}ms | Temperature: ${config.ollama.temperature}`);
  console.error(`📚 Prompts: ${config.catalog.promptsFile} (max ${config.catalog.maxSelected} per run)`);
  console.error(`⚙️  Preferences: ${config.preferences.directory}`);

  console.error(`\n🌐 Web UI: http://${config.server.host}:${config.server.port}`);

  console.error('\n' + '─'.repeat(68));
}
