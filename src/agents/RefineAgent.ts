import { ConfigManager } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { AgentDependencies, BaseAgent } from './BaseAgent.js';

const log = createLogger(NAMESPACES.agents.refine);

export class RefineAgent extends BaseAgent {
  constructor(configManager: ConfigManager, deps: AgentDependencies = {}) {
    super('refine', configManager, deps);
  }

  async run(originalInput: string, previousScene: string, notes: string): Promise<string> {
    const payload = this.builder.buildRefinement(originalInput, previousScene, notes, this.getGeneration());
    log('Refining scene (%d chars) with notes: %s', previousScene.length, notes);
    return this.callLLM(payload);
  }
}
