import * as nunjucks from 'nunjucks';
import { ConfigManager, GenerationConfig, LLMProfile } from '../configManager.js';
import { generate } from '../llm/client.js';
import { PromptBuilder } from '../llm/promptBuilder.js';
import { createTemplateEnvironment } from '../llm/templateEnv.js';
import type { PromptPayload, SamplingParams } from '../llm/types.js';
import { createLogger, NAMESPACES } from '../logging.js';

export interface AgentDependencies {
  env?: nunjucks.Environment;
  builder?: PromptBuilder;
}

export abstract class BaseAgent {
  protected readonly configManager: ConfigManager;
  protected readonly env: nunjucks.Environment;
  protected readonly builder: PromptBuilder;
  protected readonly agentName: string;
  private readonly baseAgentLog = createLogger(NAMESPACES.agents.base);

  constructor(agentName: string, configManager: ConfigManager, deps: AgentDependencies = {}) {
    this.agentName = agentName;
    this.configManager = configManager;
    this.env = deps.env ?? createTemplateEnvironment();
    this.builder = deps.builder ?? new PromptBuilder(this.env);
  }

  /** Agent-specific profile when configured, otherwise the default one. */
  protected getProfile(): LLMProfile {
    const agentConfig = this.configManager.getAgentConfig(this.agentName);
    let profileName = agentConfig.llmProfile;
    if (!profileName || profileName === 'default') {
      profileName = this.configManager.getConfig().defaultProfile;
    }
    return this.configManager.getProfile(profileName);
  }

  protected getGeneration(): GenerationConfig {
    return this.configManager.getGeneration();
  }

  /** Generation parameters with this agent's sampler overrides applied. */
  protected getSampling(): SamplingParams {
    const generation = this.getGeneration();
    const sampler = this.configManager.getAgentConfig(this.agentName).sampler ?? {};
    return {
      temperature: sampler.temperature ?? generation.temperature,
      maxTokens: sampler.maxTokens ?? generation.maxTokens,
      topP: sampler.topP ?? generation.topP
    };
  }

  protected async callLLM(payload: PromptPayload): Promise<string> {
    const profile = this.getProfile();
    const sampling = this.getSampling();
    this.baseAgentLog('[LLM] agent=%s model=%s sampling=%o', this.agentName, profile.model, sampling);
    return generate(payload, sampling, profile, { env: this.env });
  }
}
