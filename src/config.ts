/**
 * Server configuration
 *
 * Read from CARE_* environment variables, optionally overridden by a JSON
 * file named in CARE_CONFIG_PATH (camelCase keys, file wins). Validated
 * with zod; any problem is raised as ConfigurationError.
 */

import fs from 'fs/promises';
import { z } from 'zod';
import { CARE_API_PATHS, DEFAULT_BASE_URL, SERVER_NAME, TIMEOUTS } from './constants.js';
import { ConfigurationError, toError } from './errors.js';
import { isRecord } from './ref-resolver.js';
import { parseWithSchema } from './validation-utils.js';

const configSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  schemaUrl: z.string().url().optional(),
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  accessToken: z.string().min(1).optional(),
  whitelistFile: z.string().min(1).optional(),
  enhancementsFile: z.string().min(1).optional(),
  requestTimeoutMs: z.coerce.number().int().positive().default(TIMEOUTS.TOOL_CALL_MS),
  schemaTimeoutMs: z.coerce.number().int().positive().default(TIMEOUTS.SCHEMA_FETCH_MS),
  serverName: z.string().min(1).default(SERVER_NAME),
});

export type ConfigInput = z.input<typeof configSchema>;

export interface CareConfig {
  /** Without trailing slash */
  baseUrl: string;
  schemaUrl: string;
  loginUrl: string;
  refreshUrl: string;
  username?: string;
  password?: string;
  accessToken?: string;
  whitelistFile?: string;
  enhancementsFile?: string;
  requestTimeoutMs: number;
  schemaTimeoutMs: number;
  serverName: string;
}

const ENV_KEYS: Record<string, keyof ConfigInput> = {
  CARE_BASE_URL: 'baseUrl',
  CARE_SCHEMA_URL: 'schemaUrl',
  CARE_USERNAME: 'username',
  CARE_PASSWORD: 'password',
  CARE_ACCESS_TOKEN: 'accessToken',
  CARE_WHITELIST_FILE: 'whitelistFile',
  CARE_ENHANCEMENTS_FILE: 'enhancementsFile',
  CARE_REQUEST_TIMEOUT_MS: 'requestTimeoutMs',
  CARE_SCHEMA_TIMEOUT_MS: 'schemaTimeoutMs',
  MCP_SERVER_NAME: 'serverName',
};

/**
 * Collect config fields from the environment; empty values count as unset
 */
export function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [envName, key] of Object.entries(ENV_KEYS)) {
    const value = env[envName]?.trim();
    if (value) {
      values[key] = value;
    }
  }
  return values;
}

async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${toError(error).message}`, { filePath });
  }

  if (!isRecord(data)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`, { filePath });
  }
  return data;
}

/**
 * Validate raw settings and derive the endpoint URLs
 */
export function buildConfig(input: Record<string, unknown>, source = 'configuration'): CareConfig {
  const parsed = parseWithSchema(configSchema, input, source);
  const baseUrl = parsed.baseUrl.replace(/\/+$/, '');

  return {
    ...parsed,
    baseUrl,
    schemaUrl: parsed.schemaUrl ?? `${baseUrl}${CARE_API_PATHS.SCHEMA}`,
    loginUrl: `${baseUrl}${CARE_API_PATHS.LOGIN}`,
    refreshUrl: `${baseUrl}${CARE_API_PATHS.TOKEN_REFRESH}`,
  };
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<CareConfig> {
  const fromEnv = readEnv(env);
  const configPath = env.CARE_CONFIG_PATH?.trim();

  if (!configPath) {
    return buildConfig(fromEnv, 'environment configuration');
  }

  const fromFile = await readConfigFile(configPath);
  return buildConfig({ ...fromEnv, ...fromFile }, `configuration (${configPath})`);
}

/**
 * True with a static token or with both username and password
 */
export function hasCredentials(config: CareConfig): boolean {
  return Boolean(config.accessToken || (config.username && config.password));
}
