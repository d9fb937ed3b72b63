import os from 'os';
import path from 'path';
import { ZodError } from 'zod';
import { APP_NAME, loadConfig, parseArgs, userConfigDir } from '../src/config.js';

describe('Configuration', () => {
  const argv = ['node', 'index.js'];

  test('should parse flags with and without values', () => {
    expect(parseArgs(['node', 'index.js', '--debug', '--port', '9000', 'stray'])).toEqual({
      debug: true,
      port: '9000',
    });
  });

  test('should apply defaults', () => {
    const config = loadConfig(argv, {});

    expect(config.server).toEqual({
      name: APP_NAME,
      version: '1.0.0',
      debug: false,
      host: '127.0.0.1',
      port: 8501,
    });
    expect(config.ollama).toEqual({
      apiUrl: 'http://localhost:11434',
      defaultModel: 'llama3',
      timeoutMs: 120000,
      temperature: 0.7,
    });
    expect(config.catalog).toEqual({
      promptsFile: path.resolve(__dirname, '..', 'data', 'prompts.json'),
      maxSelected: 10,
    });
    expect(config.preferences.directory).toBe(userConfigDir({}));
    expect(config.uploads.maxBytes).toBe(25 * 1024 * 1024);
  });

  test('should read environment variables', () => {
    const config = loadConfig(argv, {
      OLLAMA_API_URL: 'http://ollama:11434/',
      DEFAULT_MODEL: 'phi3',
      OLLAMA_TEMPERATURE: '0',
      PREFERENCES_DIR: '/tmp/prefs',
      MAX_UPLOAD_MB: '2',
      DEBUG: 'true',
    });

    expect(config.ollama.apiUrl).toBe('http://ollama:11434');
    expect(config.ollama.defaultModel).toBe('phi3');
    expect(config.ollama.temperature).toBe(0);
    expect(config.preferences.directory).toBe('/tmp/prefs');
    expect(config.uploads.maxBytes).toBe(2 * 1024 * 1024);
    expect(config.server.debug).toBe(true);
  });

  test('should let CLI arguments win over the environment', () => {
    const config = loadConfig(
      [...argv, '--port', '9000', '--model', 'mistral', '--max-transformations', '5'],
      { PORT: '8000', DEFAULT_MODEL: 'phi3' }
    );

    expect(config.server.port).toBe(9000);
    expect(config.ollama.defaultModel).toBe('mistral');
    expect(config.catalog.maxSelected).toBe(5);
  });

  test('should reject invalid values', () => {
    expect(() => loadConfig([...argv, '--ollama-url', 'not a url'], {})).toThrow(ZodError);
    expect(() => loadConfig([...argv, '--port', 'abc'], {})).toThrow(ZodError);
    expect(() => loadConfig(argv, { OLLAMA_TIMEOUT_MS: '10' })).toThrow(ZodError);
  });

  test('should place preferences in the per-user config folder', () => {
    expect(userConfigDir({ APPDATA: '/appdata' }, 'win32')).toBe(path.join('/appdata', APP_NAME));
    expect(userConfigDir({}, 'darwin')).toBe(
      path.join(os.homedir(), 'Library', 'Application Support', APP_NAME)
    );
    expect(userConfigDir({ XDG_CONFIG_HOME: '/xdg' }, 'linux')).toBe(path.join('/xdg', APP_NAME));
    expect(userConfigDir({}, 'linux')).toBe(path.join(os.homedir(), '.config', APP_NAME));
  });
});
