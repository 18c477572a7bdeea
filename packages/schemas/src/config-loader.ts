import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@findr/shared/src/utils/errors.js';
import { ToolsFileSchema } from './tool-config.schema.js';

export interface ToolsConfig {
  readonly webSearch: Record<string, unknown>;
  readonly callSearch: Record<string, unknown>;
}

export const DEFAULT_TOOLS_CONFIG_PATH = './config/tools.json';

type Env = Readonly<Record<string, string | undefined>>;

export interface LoadToolsConfigOptions {
  /** Treat a missing file as empty instead of failing. */
  readonly optional?: boolean;
}

async function readJsonFile(filePath: string, optional: boolean): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      if (optional) {
        return undefined;
      }
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

function definedEntries(entries: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(entries).filter(([, value]) => value !== undefined));
}

function parseRetries(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`GONG_MAX_RATE_LIMIT_RETRIES must be an integer, got "${raw}"`);
  }
  return value;
}

export function applyEnvOverrides(file: ToolsConfig, env: Env): ToolsConfig {
  const apiKey = env['GOOGLE_SEARCH_API_KEY'];
  const existingConnection = file.webSearch['google_search_api_connection'];
  const connection =
    typeof existingConnection === 'object' && existingConnection !== null
      ? existingConnection
      : {};

  return {
    webSearch: {
      ...file.webSearch,
      ...definedEntries({ cx: env['GOOGLE_SEARCH_CX'] }),
      ...(apiKey ? { google_search_api_connection: { ...connection, apiKey } } : {}),
    },
    callSearch: {
      ...file.callSearch,
      ...definedEntries({
        gong_access_key: env['GONG_ACCESS_KEY'],
        gong_access_key_secret: env['GONG_ACCESS_KEY_SECRET'],
        gong_bearer_token: env['GONG_BEARER_TOKEN'],
        gong_base_url: env['GONG_BASE_URL'],
        max_rate_limit_retries: parseRetries(env['GONG_MAX_RATE_LIMIT_RETRIES']),
      }),
    },
  };
}

/**
 * Loads the raw tool sections from an optional `tools.json` and layers
 * environment variables on top. Sections are validated by each tool on
 * invocation, so a host can run with only one tool configured.
 */
export async function loadToolsConfig(
  filePath?: string,
  env: Env = process.env,
  options: LoadToolsConfigOptions = {},
): Promise<ToolsConfig> {
  let file: ToolsConfig = { webSearch: {}, callSearch: {} };

  const raw = filePath ? await readJsonFile(filePath, options.optional ?? false) : undefined;
  if (filePath && raw !== undefined) {
    const result = ToolsFileSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new ConfigurationError(`Invalid tools configuration in ${filePath}: ${details.join('; ')}`);
    }
    file = {
      webSearch: result.data.webSearch ?? {},
      callSearch: result.data.callSearch ?? {},
    };
  }

  return applyEnvOverrides(file, env);
}
