import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import path from 'path';

// Load environment variables once (idempotent)
// Look for .env file in the project root, even when running from a workspace directory
const envPath = path.join(process.cwd(), '.env');
const rootEnvPath = path.join(process.cwd(), '../../.env');
dotenvConfig({ path: [envPath, rootEnvPath] });

const optionalNumber = z
  .string()
  .optional()
  .transform((val) => (val === '' || val === undefined ? undefined : Number(val)));

const llmSchema = z.object({
  NODE_ENV: z.string().optional().default('development'),

  // Multi-Provider LLM Configuration
  LLM_PROVIDER: z.enum(['vertex', 'ollama', 'auto', '']).optional().default('ollama'),
  OLLAMA_URL: z.string().url().optional().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().optional().default('llama3.2'),
  VERTEX_AI_MODEL: z.string().optional().default('gemini-1.5-flash'),
  GOOGLE_CLOUD_PROJECT: z.string().optional().default(''),
  GOOGLE_CLOUD_LOCATION: z.string().optional().default('us-central1'),
  GOOGLE_CLOUD_CREDENTIALS: z.string().optional().default(''),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional().default(''),
  LLM_CALL_TIMEOUT_MS: z.coerce.number().optional().default(120000),
  LLM_MAX_OUTPUT_TOKENS: optionalNumber,

  // Component-specific LLM configurations (format: "provider:model:temperature:maxTokens")
  LLM_CONFIG_SPEC_GENERATOR: z.string().optional(),
  LLM_CONFIG_CODE_SYNTHESIZER: z.string().optional(),
  LLM_CONFIG_FIX_SYNTHESIZER: z.string().optional(),
  LLM_CONFIG_FUNCTION_SELECTOR: z.string().optional(),
  LLM_CONFIG_ARGUMENT_EXTRACTOR: z.string().optional(),
  LLM_CONFIG_INTENT_ROUTER: z.string().optional(),
  LLM_CONFIG_LIBRARY_SEARCH: z.string().optional(),
});

const forgeSchema = z.object({
  TOOLS_DIR: z.string().optional().default('./tools'),
  DEBUG_MAX_ATTEMPTS: z.coerce.number().int().positive().optional().default(5),
  TOOL_CALL_TIMEOUT_MS: z.coerce.number().positive().optional().default(5000),
  TOOL_LIST_CACHE_TTL_SECONDS: z.coerce.number().nonnegative().optional().default(300),
  TOOL_AUTHOR: z.string().optional().default('toolsmith'),

  // Tool library
  TOOL_LIBRARY: z.enum(['none', 'local', 'github']).optional().default('none'),
  TOOL_LIBRARY_DIR: z.string().optional().default('./tool-library'),
  GITHUB_TOKEN: z.string().optional().default(''),
  GITHUB_LIBRARY_OWNER: z.string().optional().default(''),
  GITHUB_LIBRARY_REPO: z.string().optional().default(''),
  GITHUB_API_URL: z.string().url().optional().default('https://api.github.com'),
  GITHUB_CACHE_TTL_SECONDS: z.coerce.number().nonnegative().optional().default(3600),
});

const serverSchema = z.object({
  TOOL_SERVER_HOST: z.string().optional().default('0.0.0.0'),
  TOOL_SERVER_PORT: z.coerce.number().optional().default(8003),
});

export type LLMEnvConfig = z.infer<typeof llmSchema>;
export type ForgeConfig = z.infer<typeof forgeSchema> & LLMEnvConfig;
export type ServerConfig = z.infer<typeof serverSchema> & ForgeConfig;

type EnvSource = Record<string, string | undefined>;

export function loadConfig(env: EnvSource = process.env): ForgeConfig {
  return { ...llmSchema.parse(env), ...forgeSchema.parse(env) };
}

export function loadServerConfig(env: EnvSource = process.env): ServerConfig {
  return { ...loadConfig(env), ...serverSchema.parse(env) };
}

/**
 * Component-specific override string, e.g. LLM_CONFIG_CODE_SYNTHESIZER.
 */
export function getComponentConfigString(
  config: LLMEnvConfig,
  component: string
): string | undefined {
  const key = `LLM_CONFIG_${component.toUpperCase()}`;
  for (const [name, value] of Object.entries(config)) {
    if (name === key && typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}
