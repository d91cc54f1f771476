import { ConfigManager } from '../configManager.js';
import { ContextHistory } from '../context/contextHistory.js';
import { TagResolver } from '../context/tagResolver.js';
import type { PromptPayload, StyleExample } from '../llm/types.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { PatternStore } from '../patterns/patternStore.js';
import { AgentDependencies, BaseAgent } from './BaseAgent.js';

const log = createLogger(NAMESPACES.agents.scenario);

export interface ScenarioInput {
  setting: string;
  /** Names, or a free-text list such as "Yukari, Junpei and Aigis" */
  characters: readonly string[] | string;
  /** Brief context to ground the scene */
  context?: string;
}

export interface ScenarioDraft {
  payload: PromptPayload;
  characters: string[];
  tags: string[];
  text: string;
}

/**
 * Splits a free-text character list ("A, B and C", "A & B", "A/B") into
 * upper-cased, de-duplicated names.
 */
export function parseCharacterList(raw: readonly string[] | string): string[] {
  const parts = typeof raw === 'string' ? raw.split(/,|&|\/|\band\b/i) : raw;
  const seen = new Set<string>();
  for (const part of parts) {
    const name = part.trim().toUpperCase();
    if (name) seen.add(name);
  }
  return [...seen];
}

/** One-line description of the scenario, reused as the user message when refining. */
export function describeInput(input: ScenarioInput): string {
  const characters = parseCharacterList(input.characters).join(', ');
  const context = input.context?.trim();
  return context ? `${characters} in ${input.setting.trim()}: ${context}` : `${characters} in ${input.setting.trim()}`;
}

export class ScenarioAgent extends BaseAgent {
  private readonly store: PatternStore;
  private readonly resolver: TagResolver;
  private readonly examples: readonly StyleExample[];

  constructor(
    configManager: ConfigManager,
    store: PatternStore,
    examples: readonly StyleExample[] = [],
    deps: AgentDependencies = {}
  ) {
    super('scenario', configManager, deps);
    this.store = store;
    this.resolver = new TagResolver(store);
    this.examples = examples;
  }

  /**
   * Builds the prompt for a scenario without calling the model.
   * The history is only read; the caller records the scene once it succeeds.
   */
  prepare(input: ScenarioInput, history: ContextHistory): Omit<ScenarioDraft, 'text'> {
    const generation = this.getGeneration();
    const characters = parseCharacterList(input.characters);
    const premise = input.context?.trim() ?? '';

    const window = history.select(characters, generation.contextWindow);
    const contextText = [premise, ...window].filter(Boolean).join('\n');

    const tags = this.resolver.resolve(characters, contextText, generation);
    const characterTags = this.resolver.resolveByCharacter(characters, contextText, generation);

    const payload = this.builder.build(input.setting, characters, window, tags, generation, {
      characterTags,
      vibes: this.store.vibes(3),
      premise,
      examples: this.examples
    });

    return { payload, characters, tags };
  }

  async run(input: ScenarioInput, history: ContextHistory): Promise<ScenarioDraft> {
    const draft = this.prepare(input, history);
    log('Generating scene for %o with tags %o', draft.characters, draft.tags);
    const text = await this.callLLM(draft.payload);
    return { ...draft, text };
  }
}
