import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    host: string;
    port: number;
    basePath: string;
    debug: boolean;
  };
  openai: {
    apiKey: string;
    baseUrl: string;
    turnTimeoutMs: number;
  };
  database: {
    uri: string;
    name: string;
    configCollection: string;
    conversationCollection: string;
  };
}

type Environment = Record<string, string | undefined>;

const required = (name: string) =>
  z.string({ required_error: `Missing required environment variable: ${name}` })
    .trim()
    .min(1, `Missing required environment variable: ${name}`);

const collectionName = (name: string) =>
  required(name).regex(
    /^[A-Za-z_][A-Za-z0-9_]*$/,
    `${name} must contain only letters, digits and underscores`
  );

// Zod validation schema
const ConfigSchema = z
  .object({
    server: z.object({
      name: z.string().min(1, 'Server name must not be empty'),
      version: z.string().min(1, 'Version must not be empty'),
      host: z.string().min(1),
      port: z.number().int().min(0).max(65535),
      basePath: z
        .string()
        .regex(/^(\/[^/\s]+)*$/, 'API_BASE_PATH must be empty or start with "/" and not end with "/"'),
      debug: z.boolean(),
    }),
    openai: z.object({
      apiKey: required('OPENAI_API_KEY'),
      baseUrl: z.string().url('Invalid OPENAI_BASE_URL format'),
      turnTimeoutMs: z.number().int().min(1000).max(600000),
    }),
    database: z.object({
      uri: required('DATABASE_URI'),
      name: required('DATABASE_NAME').regex(
        /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/,
        'DATABASE_NAME must be a plain file name'
      ),
      configCollection: collectionName('CONFIG_COLLECTION'),
      conversationCollection: collectionName('CONVERSATION_COLLECTION'),
    }),
  })
  .refine(
    (config) => config.database.configCollection !== config.database.conversationCollection,
    {
      message: 'CONFIG_COLLECTION and CONVERSATION_COLLECTION must differ',
      path: ['database', 'conversationCollection'],
    }
  );

/**
 * Build the process configuration from environment variables.
 * Throws a ConfigurationError naming every invalid or missing variable.
 */
export function getConfig(env: Environment = process.env): Config {
  const getString = (key: string, defaultValue: string): string => env[key] ?? defaultValue;

  const getBoolean = (key: string, defaultValue: boolean): boolean => {
    const value = env[key];
    return value === 'true' ? true : value === 'false' ? false : defaultValue;
  };

  // NaN is left for the schema to reject
  const getNumber = (key: string, defaultValue: number): number => {
    const value = env[key];
    return value ? Number(value) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('SERVER_NAME', 'chat-agent-gateway'),
      version: getString('SERVER_VERSION', '0.1.0'),
      host: getString('HOST', '0.0.0.0'),
      port: getNumber('PORT', 8000),
      basePath: getString('API_BASE_PATH', ''),
      debug: getBoolean('DEBUG', false),
    },
    openai: {
      apiKey: env.OPENAI_API_KEY,
      baseUrl: getString('OPENAI_BASE_URL', 'https://api.openai.com/v1'),
      turnTimeoutMs: getNumber('TURN_TIMEOUT_MS', 60000),
    },
    database: {
      uri: env.DATABASE_URI,
      name: env.DATABASE_NAME,
      configCollection: env.CONFIG_COLLECTION,
      conversationCollection: env.CONVERSATION_COLLECTION,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return result.data;
}

/**
 * Print configuration at startup
 */
export function printConfigInfo(config: Config): void {
  const base = config.server.basePath || '/';
  console.error('='.repeat(68));
  console.error(
    `Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`
  );
  console.error(`Listening: http://${config.server.host}:${config.server.port}${base}`);
  console.error(`Provider: ${config.openai.baseUrl} (turn timeout ${config.openai.turnTimeoutMs}ms)`);
  console.error(
    `Store: ${config.database.uri} / ${config.database.name} ` +
      `[${config.database.configCollection}, ${config.database.conversationCollection}]`
  );
  console.error('='.repeat(68));
}
