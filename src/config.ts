import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const ExportSchema = z.object({
  format: z.enum(['markdown', 'text']).default('markdown'),
  save_attachments: z.boolean().default(false),
  output_dir: z.string().default('.'),
});

const MicrosoftSchema = z.object({
  /**
   * Azure AD Application (client) ID
   * Get from Azure Portal > App registrations > Your app > Overview
   */
  client_id: z.string().default(''),

  /**
   * Azure AD Directory (tenant) ID
   * - 'common': Multi-tenant + personal accounts (default)
   * - 'consumers': Personal Microsoft accounts only
   */
  tenant_id: z.string().default('common'),

  /** Redirect URI registered for the manual sign-in fallback */
  redirect_uri: z.string().url().default('http://localhost'),

  scopes: z.array(z.string()).min(1).default(['Tasks.Read']),

  /** Path to the serialized MSAL token cache */
  token_cache_path: z.string().default('./graph_api_token_cache.json'),

  /** Try the loopback browser flow before falling back to pasting the redirect URL */
  interactive: z.boolean().default(true),

  /** Give up on the browser sign-in after this long and fall back to pasting */
  interactive_timeout_seconds: z.number().int().positive().default(300),
});

const GraphSchema = z.object({
  base_url: z.string().url().default('https://graph.microsoft.com/beta/me/todo/lists/'),
  /**
   * Non-success responses are treated as empty results unless this is set.
   * With it set they abort the export.
   */
  fail_on_error: z.boolean().default(false),
});

const ConfigSchema = z.object({
  export: ExportSchema.default({}),
  microsoft: MicrosoftSchema.default({}),
  graph: GraphSchema.default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ExportConfig = z.infer<typeof ExportSchema>;
export type MicrosoftConfig = z.infer<typeof MicrosoftSchema>;
export type GraphConfig = z.infer<typeof GraphSchema>;
export type ExportFormat = ExportConfig['format'];

type RawSection = Record<string, unknown>;
type RawConfig = Record<string, RawSection | undefined>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadYamlConfig(cwd: string): Record<string, unknown> {
  const configPaths = ['config.yaml', 'config.yml'];

  for (const configPath of configPaths) {
    const fullPath = join(cwd, configPath);
    if (existsSync(fullPath)) {
      const content = readFileSync(fullPath, 'utf-8');
      const parsed: unknown = parseYaml(content);
      return isRecord(parsed) ? parsed : {};
    }
  }

  return {};
}

function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function getEnvConfig(env: NodeJS.ProcessEnv): RawConfig {
  const result: RawConfig = {};
  const set = (section: string, key: string, value: unknown) => {
    result[section] = { ...result[section], [key]: value };
  };

  if (env.EXPORT_FORMAT) set('export', 'format', env.EXPORT_FORMAT);
  if (env.EXPORT_SAVE_ATTACHMENTS) {
    set('export', 'save_attachments', parseBoolean(env.EXPORT_SAVE_ATTACHMENTS));
  }
  if (env.EXPORT_OUTPUT_DIR) set('export', 'output_dir', env.EXPORT_OUTPUT_DIR);

  if (env.MS_CLIENT_ID) set('microsoft', 'client_id', env.MS_CLIENT_ID);
  if (env.MS_TENANT_ID) set('microsoft', 'tenant_id', env.MS_TENANT_ID);
  if (env.MS_REDIRECT_URI) set('microsoft', 'redirect_uri', env.MS_REDIRECT_URI);
  if (env.MS_TOKEN_CACHE_PATH) set('microsoft', 'token_cache_path', env.MS_TOKEN_CACHE_PATH);

  if (env.GRAPH_BASE_URL) set('graph', 'base_url', env.GRAPH_BASE_URL);
  if (env.GRAPH_FAIL_ON_ERROR) set('graph', 'fail_on_error', parseBoolean(env.GRAPH_FAIL_ON_ERROR));

  if (env.LOG_LEVEL) set('logging', 'level', env.LOG_LEVEL);

  return result;
}

function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const yamlConfig = loadYamlConfig(options.cwd ?? process.cwd());
  const envConfig = getEnvConfig(options.env ?? process.env);

  // Merge: yaml < env (env takes precedence)
  const merged = deepMerge(yamlConfig, envConfig);

  // Validate and apply defaults
  return ConfigSchema.parse(merged);
}
