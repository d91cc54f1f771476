import * as nunjucks from 'nunjucks';
import { ConfigManager } from '../configManager.js';
import { ArchiveSink } from '../archive/sceneArchive.js';
import { ContextHistory } from '../context/contextHistory.js';
import { loadScriptCorpus } from '../context/scriptCorpus.js';
import {
  BuildError,
  GenerationError,
  MalformedResponseError,
  SessionStateError,
  errMessage
} from '../errors.js';
import { PromptBuilder } from '../llm/promptBuilder.js';
import { cleanScene } from '../llm/responseCleaner.js';
import { createTemplateEnvironment } from '../llm/templateEnv.js';
import type { StyleExample } from '../llm/types.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { loadPatternFile, PatternStore } from '../patterns/patternStore.js';
import { loadStyleExamples } from '../patterns/styleExamples.js';
import { RefineAgent } from './RefineAgent.js';
import { describeInput, ScenarioAgent, ScenarioInput } from './ScenarioAgent.js';

const orchestratorLog = createLogger(NAMESPACES.agents.orchestrator);

export type SessionState = 'awaiting_input' | 'generating' | 'displaying' | 'terminal';

export type ScenarioFailure = BuildError | GenerationError;

export type ScenarioResult =
  | { ok: true; text: string; raw: string; tags: string[]; archiveError?: Error }
  | { ok: false; error: ScenarioFailure };

export interface OrchestratorOptions {
  history?: ContextHistory;
  archive?: ArchiveSink;
  examples?: readonly StyleExample[];
  env?: nunjucks.Environment;
}

interface DisplayedScene {
  originalInput: string;
  text: string;
  tags: string[];
}

function isScenarioFailure(error: unknown): error is ScenarioFailure {
  return error instanceof BuildError || error instanceof GenerationError;
}

/**
 * One scenario session: submit a scenario, then refine it, start a new one
 * or exit. Requests are awaited one at a time; calls made in the wrong state
 * throw SessionStateError.
 */
export class Orchestrator {
  private readonly configManager: ConfigManager;
  private readonly history: ContextHistory;
  private readonly archive?: ArchiveSink;
  private readonly scenarioAgent: ScenarioAgent;
  private readonly refineAgent: RefineAgent;
  private state: SessionState = 'awaiting_input';
  private current?: DisplayedScene;

  constructor(configManager: ConfigManager, store: PatternStore, options: OrchestratorOptions = {}) {
    this.configManager = configManager;
    this.history = options.history ?? new ContextHistory();
    this.archive = options.archive;

    const env = options.env ?? createTemplateEnvironment();
    const builder = new PromptBuilder(env);
    this.scenarioAgent = new ScenarioAgent(configManager, store, options.examples ?? [], { env, builder });
    this.refineAgent = new RefineAgent(configManager, { env, builder });
  }

  /**
   * Loads the pattern document, style examples and, when configured, the
   * script corpus that seeds the context history.
   */
  static fromConfig(configManager: ConfigManager, options: Omit<OrchestratorOptions, 'examples'> = {}): Orchestrator {
    const { paths } = configManager.getConfig();
    const store = loadPatternFile(configManager.resolvePath(paths.patterns));
    // always loaded: useExamples may be switched on later
    const examples = loadStyleExamples(configManager.resolvePath(paths.examples));
    const history = options.history ?? loadScriptCorpus({
      script: paths.script ? configManager.resolvePath(paths.script) : undefined,
      parodyScript: paths.parodyScript ? configManager.resolvePath(paths.parodyScript) : undefined
    });
    return new Orchestrator(configManager, store, { ...options, examples, history });
  }

  getState(): SessionState {
    return this.state;
  }

  /** The scene currently on display, if any. */
  getCurrentScene(): string | undefined {
    return this.current?.text;
  }

  getHistory(): ContextHistory {
    return this.history;
  }

  private expectState(expected: SessionState, action: string): void {
    if (this.state !== expected) {
      throw new SessionStateError(`Cannot ${action} while ${this.state}`, { state: this.state, expected });
    }
  }

  async submit(input: ScenarioInput): Promise<ScenarioResult> {
    this.expectState('awaiting_input', 'submit a scenario');
    this.state = 'generating';

    try {
      const draft = await this.scenarioAgent.run(input, this.history);
      return await this.display(describeInput(input), draft.text, draft.tags, input.context);
    } catch (error) {
      this.state = 'awaiting_input';
      if (isScenarioFailure(error)) {
        orchestratorLog('[ORCHESTRATOR] Scenario failed (%s): %s', error.name, error.message);
        return { ok: false, error };
      }
      throw error;
    }
  }

  async refine(notes: string): Promise<ScenarioResult> {
    this.expectState('displaying', 'refine');
    const previous = this.current;
    if (!previous) {
      throw new SessionStateError('No scene is on display');
    }
    this.state = 'generating';

    try {
      const raw = await this.refineAgent.run(previous.originalInput, previous.text, notes);
      return await this.display(previous.originalInput, raw, previous.tags);
    } catch (error) {
      // the previous scene stays on display
      this.current = previous;
      this.state = 'displaying';
      if (isScenarioFailure(error)) {
        orchestratorLog('[ORCHESTRATOR] Refinement failed (%s): %s', error.name, error.message);
        return { ok: false, error };
      }
      throw error;
    }
  }

  startNew(): void {
    this.expectState('displaying', 'start a new scenario');
    this.current = undefined;
    this.state = 'awaiting_input';
  }

  exit(): void {
    if (this.state === 'terminal') return;
    if (this.state === 'generating') {
      throw new SessionStateError('Cannot exit while a scene is generating', { state: this.state });
    }
    this.current = undefined;
    this.state = 'terminal';
    orchestratorLog('[ORCHESTRATOR] Session closed');
  }

  /** Records a successful scene: context first, then the scene itself. */
  private async display(originalInput: string, raw: string, tags: string[], context?: string): Promise<ScenarioResult> {
    const text = this.configManager.getGeneration().cleanOutput ? cleanScene(raw) : raw;
    if (!text.trim()) {
      throw new MalformedResponseError('Generated scene was empty after cleaning');
    }

    if (context) this.history.append(context);
    this.history.append(text);
    const archiveError = await this.archiveScene(text);

    this.current = { originalInput, text, tags };
    this.state = 'displaying';
    orchestratorLog('[ORCHESTRATOR] Scene ready: %d chars, tags=%o', text.length, tags);

    return archiveError ? { ok: true, text, raw, tags, archiveError } : { ok: true, text, raw, tags };
  }

  private async archiveScene(text: string): Promise<Error | undefined> {
    if (!this.archive) return undefined;
    try {
      await this.archive.accept(text);
      return undefined;
    } catch (error) {
      orchestratorLog('[ORCHESTRATOR] Archive failed: %s', errMessage(error));
      return error instanceof Error ? error : new Error(errMessage(error));
    }
  }
}
