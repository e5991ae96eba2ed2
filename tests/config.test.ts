import { getConfig } from '../src/config.js';
import { ConfigurationError } from '../src/core/errors.js';

const baseEnv = {
  OPENAI_API_KEY: 'test-key',
  DATABASE_URI: ':memory:',
  DATABASE_NAME: 'test.db',
  CONFIG_COLLECTION: 'agent_configs',
  CONVERSATION_COLLECTION: 'conversations',
};

function captureIssues(env: Record<string, string | undefined>): string[] {
  try {
    getConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected getConfig to fail');
}

describe('getConfig', () => {
  test('should apply defaults when only required variables are set', () => {
    const config = getConfig(baseEnv);

    expect(config.server).toEqual({
      name: 'chat-agent-gateway',
      version: '0.1.0',
      host: '0.0.0.0',
      port: 8000,
      basePath: '',
      debug: false,
    });
    expect(config.openai).toEqual({
      apiKey: 'test-key',
      baseUrl: 'https://api.openai.com/v1',
      turnTimeoutMs: 60000,
    });
    expect(config.database).toEqual({
      uri: ':memory:',
      name: 'test.db',
      configCollection: 'agent_configs',
      conversationCollection: 'conversations',
    });
  });

  test('should read optional overrides', () => {
    const config = getConfig({
      ...baseEnv,
      PORT: '9001',
      HOST: '127.0.0.1',
      API_BASE_PATH: '/api/v1',
      DEBUG: 'true',
      TURN_TIMEOUT_MS: '5000',
      OPENAI_BASE_URL: 'http://localhost:4000/v1',
    });

    expect(config.server.port).toBe(9001);
    expect(config.server.host).toBe('127.0.0.1');
    expect(config.server.basePath).toBe('/api/v1');
    expect(config.server.debug).toBe(true);
    expect(config.openai.turnTimeoutMs).toBe(5000);
    expect(config.openai.baseUrl).toBe('http://localhost:4000/v1');
  });

  test('should list every missing required variable', () => {
    const issues = captureIssues({});

    expect(issues).toHaveLength(5);
    expect(issues).toEqual(
      expect.arrayContaining([
        'openai.apiKey: Missing required environment variable: OPENAI_API_KEY',
        'database.uri: Missing required environment variable: DATABASE_URI',
        'database.name: Missing required environment variable: DATABASE_NAME',
        'database.configCollection: Missing required environment variable: CONFIG_COLLECTION',
        'database.conversationCollection: Missing required environment variable: CONVERSATION_COLLECTION',
      ])
    );
  });

  test('should treat blank values as missing', () => {
    const issues = captureIssues({ ...baseEnv, OPENAI_API_KEY: '   ' });

    expect(issues).toEqual(['openai.apiKey: Missing required environment variable: OPENAI_API_KEY']);
  });

  test('should reject collection names that are not identifiers', () => {
    const issues = captureIssues({ ...baseEnv, CONFIG_COLLECTION: 'agent-configs' });

    expect(issues).toEqual([
      'database.configCollection: CONFIG_COLLECTION must contain only letters, digits and underscores',
    ]);
  });

  test('should reject a database name that is a path', () => {
    const issues = captureIssues({ ...baseEnv, DATABASE_NAME: '../outside.db' });

    expect(issues).toEqual(['database.name: DATABASE_NAME must be a plain file name']);
  });

  test('should reject identical collection names', () => {
    const issues = captureIssues({ ...baseEnv, CONVERSATION_COLLECTION: 'agent_configs' });

    expect(issues).toEqual([
      'database.conversationCollection: CONFIG_COLLECTION and CONVERSATION_COLLECTION must differ',
    ]);
  });

  test('should reject a non-numeric port', () => {
    const issues = captureIssues({ ...baseEnv, PORT: 'eighty' });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^server\.port: /);
  });

  test('should reject a base path with a trailing slash', () => {
    const issues = captureIssues({ ...baseEnv, API_BASE_PATH: '/api/' });

    expect(issues).toEqual([
      'server.basePath: API_BASE_PATH must be empty or start with "/" and not end with "/"',
    ]);
  });
});
