import debug from 'debug';

export const NAMESPACES = {
  patterns: {
    store: 'parody:patterns:store'
  },
  context: {
    history: 'parody:context:history',
    resolver: 'parody:context:resolver'
  },
  agents: {
    base: 'parody:agents:base',
    orchestrator: 'parody:agents:orchestrator',
    scenario: 'parody:agents:scenario',
    refine: 'parody:agents:refine'
  },
  llm: {
    client: 'parody:llm:client',
    custom: 'parody:llm:custom',
    prompt: 'parody:llm:prompt'
  },
  config: 'parody:config'
} as const;

export interface DebugSettings {
  enabledNamespaces?: string;
}

export const createLogger = (namespace: string) => debug(namespace);

export function applyDebugSettings(settings: DebugSettings | undefined): void {
  if (settings?.enabledNamespaces) {
    debug.enable(settings.enabledNamespaces);
  }
}
