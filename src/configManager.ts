import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import type { Schema } from 'ajv';
import { ConfigError, errMessage } from './errors.js';
import { applyDebugSettings, createLogger, NAMESPACES } from './logging.js';
import type { DebugSettings } from './logging.js';
import { createValidator, isRecord } from './utils/schemaValidation.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Repository root; prompts, templates and data live beside `src/` and `dist/`. */
export const PROJECT_ROOT = path.resolve(__dirname, '..');

const LLM_TEMPLATES_DIR = path.join(PROJECT_ROOT, 'prompts', 'llm_templates');

const log = createLogger(NAMESPACES.config);

export interface SamplerSettings {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
}

export interface LLMProfile {
  type: 'openai' | 'custom'; // 'openai' uses the OpenAI SDK, 'custom' uses axios with templates
  baseURL: string;
  model: string;
  apiKey?: string;
  apiKeyEnv?: string; // Name of the environment variable holding the key
  template?: string; // llm_templates/<name>.njk for 'custom' profiles
  timeoutMs?: number;
  maxRetries?: number;
  retryBackoffMs?: number;
}

export interface AgentConfig {
  llmProfile?: string;
  sampler?: SamplerSettings;
}

export interface StyleSettings {
  tone: string;
  humor: string;
  length: 'short' | 'medium' | 'long';
}

export interface GenerationConfig {
  readonly patternStrictness: number;
  readonly tagWeight: number;
  readonly maxTags: number;
  readonly useExamples: boolean;
  readonly contextWindow: number;
  readonly maxPromptTokens?: number;
  readonly cleanOutput: boolean;
  readonly style: Readonly<StyleSettings>;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly topP: number;
}

export interface PathSettings {
  patterns: string;
  examples: string;
  script?: string; // Optional script corpus the context window draws speaker lines from
  parodyScript?: string;
}

export interface Config {
  defaultProfile: string;
  profiles: Record<string, LLMProfile>;
  agents: Record<string, AgentConfig>;
  generation: GenerationConfig;
  paths: PathSettings;
  debug?: DebugSettings;
}

export const DEFAULT_GENERATION: GenerationConfig = Object.freeze({
  patternStrictness: 0.6,
  tagWeight: 1,
  maxTags: 3,
  useExamples: true,
  contextWindow: 5,
  cleanOutput: true,
  style: Object.freeze({
    tone: 'Satirical, absurdist, with dry humor',
    humor: 'Irreverent and exaggerated',
    length: 'medium' as const
  }),
  temperature: 1.0,
  maxTokens: 4000,
  topP: 0.9
});

/** Template a 'custom' profile renders its prompt with. */
export function customTemplateName(profile: LLMProfile): string {
  return profile.template || 'chatml';
}

function checkCustomTemplates(profiles: Record<string, LLMProfile>): void {
  for (const [name, profile] of Object.entries(profiles)) {
    if (profile.type !== 'custom') continue;
    const template = customTemplateName(profile);
    if (!fs.existsSync(path.join(LLM_TEMPLATES_DIR, `${template}.njk`))) {
      throw new ConfigError(`Profile ${name} uses unknown template ${template}`, { profile: name, template });
    }
  }
}

export function defaultConfig(): Config {
  return {
    defaultProfile: 'openai',
    profiles: {
      openai: {
        type: 'openai',
        baseURL: 'https://api.openai.com/v1',
        model: 'gpt-4o-mini',
        apiKeyEnv: 'OPENAI_API_KEY',
        timeoutMs: 120000
      }
    },
    agents: {
      scenario: {},
      refine: { sampler: { maxTokens: 2000 } }
    },
    generation: DEFAULT_GENERATION,
    paths: {
      patterns: 'data/parody-patterns.json',
      examples: 'data/style-examples.json'
    },
    debug: {
      enabledNamespaces: ''
    }
  };
}

const samplerSchema = {
  type: 'object',
  properties: {
    temperature: { type: 'number', minimum: 0, maximum: 2 },
    maxTokens: { type: 'integer', minimum: 1 },
    topP: { type: 'number', minimum: 0, maximum: 1 }
  },
  additionalProperties: false
};

const generationSchema = {
  type: 'object',
  required: [
    'patternStrictness', 'tagWeight', 'maxTags', 'useExamples', 'contextWindow',
    'cleanOutput', 'style', 'temperature', 'maxTokens', 'topP'
  ],
  properties: {
    patternStrictness: { type: 'number', minimum: 0, maximum: 1 },
    tagWeight: { type: 'number', minimum: 0.1, maximum: 3 },
    maxTags: { type: 'integer', minimum: 1, maximum: 5 },
    useExamples: { type: 'boolean' },
    contextWindow: { type: 'integer', minimum: 1 },
    maxPromptTokens: { type: 'integer', minimum: 1 },
    cleanOutput: { type: 'boolean' },
    style: {
      type: 'object',
      required: ['tone', 'humor', 'length'],
      properties: {
        tone: { type: 'string' },
        humor: { type: 'string' },
        length: { enum: ['short', 'medium', 'long'] }
      }
    },
    temperature: { type: 'number', minimum: 0, maximum: 2 },
    maxTokens: { type: 'integer', minimum: 1 },
    topP: { type: 'number', minimum: 0, maximum: 1 }
  }
};

const configSchema: Schema = {
  type: 'object',
  required: ['defaultProfile', 'profiles', 'agents', 'generation', 'paths'],
  properties: {
    defaultProfile: { type: 'string', minLength: 1 },
    profiles: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['type', 'baseURL', 'model'],
        properties: {
          type: { enum: ['openai', 'custom'] },
          baseURL: { type: 'string', minLength: 1 },
          model: { type: 'string', minLength: 1 },
          apiKey: { type: 'string' },
          apiKeyEnv: { type: 'string' },
          template: { type: 'string', pattern: '^[A-Za-z0-9_-]+$' },
          timeoutMs: { type: 'integer', minimum: 1 },
          maxRetries: { type: 'integer', minimum: 0 },
          retryBackoffMs: { type: 'integer', minimum: 0 }
        }
      }
    },
    agents: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: {
          llmProfile: { type: 'string' },
          sampler: samplerSchema
        }
      }
    },
    generation: generationSchema,
    paths: {
      type: 'object',
      required: ['patterns', 'examples'],
      properties: {
        patterns: { type: 'string' },
        examples: { type: 'string' },
        script: { type: 'string', minLength: 1 },
        parodyScript: { type: 'string', minLength: 1 }
      }
    },
    debug: {
      type: 'object',
      properties: { enabledNamespaces: { type: 'string' } }
    }
  }
};

const validateConfig = createValidator<Config>(configSchema);
const validateGeneration = createValidator<GenerationConfig>(generationSchema);

/** Overlays `override` onto `base`; nested objects merge, everything else replaces. */
function mergeDeep(base: object, override: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? mergeDeep(current, value) : value;
  }
  return merged;
}

function freezeGeneration(generation: GenerationConfig): GenerationConfig {
  return Object.freeze({ ...generation, style: Object.freeze({ ...generation.style }) });
}

/**
 * Validates a generation config built from `base` plus `updates`.
 * Throws ConfigError naming every out-of-range field.
 */
export function resolveGenerationConfig(
  updates: Partial<GenerationConfig> = {},
  base: GenerationConfig = DEFAULT_GENERATION
): GenerationConfig {
  const candidate = { ...base, ...updates, style: { ...base.style, ...(updates.style || {}) } };
  const result = validateGeneration(candidate);
  if (!result.valid || !result.value) {
    throw new ConfigError(`Invalid generation config: ${result.errors.join('; ')}`, { errors: result.errorDetails });
  }
  return freezeGeneration(result.value);
}

export class ConfigManager {
  private config: Config;
  private readonly configPath: string;

  constructor(configPath: string = path.join(PROJECT_ROOT, 'localConfig', 'config.json')) {
    this.configPath = configPath;
    this.config = this.loadConfig(configPath);
    applyDebugSettings(this.config.debug);
  }

  private loadConfig(configPath: string): Config {
    if (!fs.existsSync(configPath)) {
      log('No config at %s, using defaults', configPath);
      return defaultConfig();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Failed to read config ${configPath}: ${errMessage(error)}`, undefined, { cause: error });
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config ${configPath} must contain a JSON object`);
    }

    const merged = mergeDeep(defaultConfig(), parsed);
    const result = validateConfig(merged);
    if (!result.valid || !result.value) {
      throw new ConfigError(`Invalid config ${configPath}: ${result.errors.join('; ')}`, { errors: result.errorDetails });
    }

    const config = result.value;
    if (!config.profiles[config.defaultProfile]) {
      throw new ConfigError(`Default profile ${config.defaultProfile} not found`);
    }
    checkCustomTemplates(config.profiles);
    log('Loaded config from %s (default profile %s)', configPath, config.defaultProfile);
    return { ...config, generation: freezeGeneration(config.generation) };
  }

  getConfig(): Config {
    return { ...this.config };
  }

  getProfile(name?: string): LLMProfile {
    const profileName = name || this.config.defaultProfile;
    const profile = this.config.profiles[profileName];
    if (!profile) {
      throw new ConfigError(`Profile ${profileName} not found`);
    }
    return profile;
  }

  getDefaultProfile(): LLMProfile {
    return this.getProfile();
  }

  getAgentConfig(agentName: string): AgentConfig {
    return this.config.agents[agentName] ?? {};
  }

  getGeneration(): GenerationConfig {
    return this.config.generation;
  }

  /** Replaces the generation config between requests; the previous value is left untouched. */
  updateGeneration(updates: Partial<GenerationConfig>): GenerationConfig {
    const generation = resolveGenerationConfig(updates, this.config.generation);
    this.config = { ...this.config, generation };
    log('Generation config updated: %o', updates);
    return generation;
  }

  /** Resolves a configured path against the project root. */
  resolvePath(configured: string): string {
    return path.isAbsolute(configured) ? configured : path.join(PROJECT_ROOT, configured);
  }

  reload(): void {
    this.config = this.loadConfig(this.configPath);
    applyDebugSettings(this.config.debug);
  }

  updateDebugSettings(updates: Partial<DebugSettings>): Config {
    const nextDebug: DebugSettings = {
      ...this.config.debug,
      ...updates
    };
    this.config = {
      ...this.config,
      debug: nextDebug
    };
    applyDebugSettings(nextDebug);
    return this.getConfig();
  }
}
