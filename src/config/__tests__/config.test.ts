import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';

// Mock modules before importing the functions
vi.mock('fs');
vi.mock('env-paths', () => ({
  default: vi.fn(() => ({
    config: '/mock/config/path',
    data: '/mock/data/path',
    cache: '/mock/cache/path',
    log: '/mock/log/path',
    temp: '/mock/temp/path',
  })),
}));
vi.mock('../../lib/logger', () => ({
  logger: {
    debug: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
  },
}));

// Import after mocks are set up
import {
  getConfigPath,
  readConfig,
  getTokenFromEnv,
  getStoredToken,
  requireToken,
  loadConfig,
} from '../config';
import { ConfigurationError } from '../../lib/errors';

function noConfigFile() {
  vi.mocked(fs.readFileSync).mockImplementation(() => {
    throw new Error('ENOENT: no such file or directory');
  });
}

describe('getConfigPath', () => {
  it('should return config file path', () => {
    expect(getConfigPath()).toBe('/mock/config/path/config.json');
  });
});

describe('readConfig', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should read the stored token', () => {
    vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({ token: 'test-token', other: true }));

    expect(readConfig()).toEqual({ token: 'test-token' });
  });

  it('should return empty object if config file does not exist', () => {
    noConfigFile();

    expect(readConfig()).toEqual({});
  });

  it('should handle malformed JSON gracefully', () => {
    vi.mocked(fs.readFileSync).mockReturnValue('{ invalid json }');

    expect(readConfig()).toEqual({});
  });

  it('should ignore a token that is not a string', () => {
    vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({ token: 42 }));

    expect(readConfig()).toEqual({});
  });

  it('should ignore a file that holds something other than an object', () => {
    vi.mocked(fs.readFileSync).mockReturnValue('null');

    expect(readConfig()).toEqual({});
  });
});

describe('getTokenFromEnv', () => {
  it('should return GITHUB_TOKEN from environment', () => {
    expect(getTokenFromEnv({ GITHUB_TOKEN: 'test-token-1' })).toBe('test-token-1');
  });

  it('should return GH_TOKEN from environment', () => {
    expect(getTokenFromEnv({ GH_TOKEN: 'test-token-2' })).toBe('test-token-2');
  });

  it('should prefer GITHUB_TOKEN over GH_TOKEN', () => {
    expect(getTokenFromEnv({ GITHUB_TOKEN: 'test-github', GH_TOKEN: 'test-gh' })).toBe('test-github');
  });

  it('should return undefined if no env token is set', () => {
    expect(getTokenFromEnv({})).toBeUndefined();
  });
});

describe('getStoredToken', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should return stored token from config', () => {
    vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({ token: 'test-stored' }));

    expect(getStoredToken()).toBe('test-stored');
  });

  it('should return undefined if no token is stored', () => {
    vi.mocked(fs.readFileSync).mockReturnValue('{}');

    expect(getStoredToken()).toBeUndefined();
  });
});

describe('requireToken', () => {
  it('should return a usable token unchanged', () => {
    expect(requireToken('test-token')).toBe('test-token');
  });

  it('should reject a missing token', () => {
    expect(() => requireToken(undefined)).toThrow(ConfigurationError);
    expect(() => requireToken(undefined)).toThrow('GITHUB_TOKEN environment variable is not set');
    expect(() => requireToken('')).toThrow('GITHUB_TOKEN environment variable is not set');
  });

  it('should reject a blank token', () => {
    expect(() => requireToken('   ')).toThrow('GITHUB_TOKEN environment variable is empty');
  });
});

describe('loadConfig', () => {
  beforeEach(() => {
    noConfigFile();
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      github: {
        token: undefined,
        apiBaseUrl: 'https://api.github.com',
        userAgent: 'repo-tool-server/0.1.0',
      },
      server: { host: '127.0.0.1', port: 8000 },
      time: { defaultTimeZone: 'America/Chicago' },
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      GITHUB_TOKEN: 'test-token',
      GITHUB_API_URL: 'https://ghe.example.com/api/v3/',
      HOST: '0.0.0.0',
      PORT: '8001',
      DEFAULT_TIME_ZONE: 'Europe/Paris',
    });

    expect(config.github.token).toBe('test-token');
    expect(config.github.apiBaseUrl).toBe('https://ghe.example.com/api/v3');
    expect(config.server).toEqual({ host: '0.0.0.0', port: 8001 });
    expect(config.time.defaultTimeZone).toBe('Europe/Paris');
  });

  it('should fall back to the stored token', () => {
    vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({ token: 'test-stored' }));

    expect(loadConfig({}).github.token).toBe('test-stored');
  });

  it('should prefer the environment token over the stored one', () => {
    vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({ token: 'test-stored' }));

    expect(loadConfig({ GH_TOKEN: 'test-env' }).github.token).toBe('test-env');
  });

  it('should freeze the configuration', () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.github)).toBe(true);
    expect(Object.isFrozen(config.server)).toBe(true);
  });

  it.each([
    [{ PORT: 'eighty' }, 'Invalid environment: PORT: Expected number, received nan'],
    [{ PORT: '70000' }, 'Invalid environment: PORT: Number must be less than or equal to 65535'],
    [{ GITHUB_API_URL: 'not a url' }, 'Invalid environment: GITHUB_API_URL: Invalid url'],
  ])('should reject %j', (env, message) => {
    expect(() => loadConfig(env)).toThrow(message);
  });
});
