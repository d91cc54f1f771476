export * from './errors.js';
export { NAMESPACES, createLogger, applyDebugSettings } from './logging.js';
export type { DebugSettings } from './logging.js';
export {
  ConfigManager,
  DEFAULT_GENERATION,
  PROJECT_ROOT,
  customTemplateName,
  defaultConfig,
  resolveGenerationConfig
} from './configManager.js';
export type {
  AgentConfig,
  Config,
  GenerationConfig,
  LLMProfile,
  PathSettings,
  SamplerSettings,
  StyleSettings
} from './configManager.js';

export { compileTrigger, isRegexKey, scoreTrigger } from './patterns/triggers.js';
export type { Trigger } from './patterns/triggers.js';
export { CHARACTER_BUCKET, PatternStore, loadPatternFile, rankEntries } from './patterns/patternStore.js';
export type { PatternEntry, RankedTag, TagSource } from './patterns/patternStore.js';
export { loadStyleExamples, parseStyleExamples } from './patterns/styleExamples.js';

export { ContextHistory, parseHistoryLine } from './context/contextHistory.js';
export { loadScriptCorpus, readScriptLines } from './context/scriptCorpus.js';
export type { ScriptSources } from './context/scriptCorpus.js';
export { TagResolver } from './context/tagResolver.js';
export type { ResolverConfig } from './context/tagResolver.js';

export { NO_CONTEXT, PromptBuilder, pickExample } from './llm/promptBuilder.js';
export type { BuilderConfig } from './llm/promptBuilder.js';
export { MAX_BACKOFF_MS, calculateBackoff, generate, resolveApiKey } from './llm/client.js';
export type { GenerateOptions } from './llm/client.js';
export { customLLMRequest, extractCompletionText, renderCustomPrompt } from './llm/customClient.js';
export { END_MARKER, cleanScene } from './llm/responseCleaner.js';
export { PROMPTS_DIR, createTemplateEnvironment } from './llm/templateEnv.js';
export type { PromptExtras, PromptPayload, SamplingParams, StyleExample } from './llm/types.js';

export { MemoryArchiveSink } from './archive/sceneArchive.js';
export type { ArchiveSink, ArchivedScene } from './archive/sceneArchive.js';

export { BaseAgent } from './agents/BaseAgent.js';
export type { AgentDependencies } from './agents/BaseAgent.js';
export { ScenarioAgent, describeInput, parseCharacterList } from './agents/ScenarioAgent.js';
export type { ScenarioDraft, ScenarioInput } from './agents/ScenarioAgent.js';
export { RefineAgent } from './agents/RefineAgent.js';
export { Orchestrator } from './agents/Orchestrator.js';
export type { OrchestratorOptions, ScenarioFailure, ScenarioResult, SessionState } from './agents/Orchestrator.js';
