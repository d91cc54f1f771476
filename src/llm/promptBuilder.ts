import * as nunjucks from 'nunjucks';
import type { GenerationConfig, StyleSettings } from '../configManager.js';
import { BuildError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { countTokens } from '../utils/tokenCounter.js';
import { createTemplateEnvironment } from './templateEnv.js';
import type { PromptExtras, PromptPayload, StyleExample } from './types.js';

const log = createLogger(NAMESPACES.llm.prompt);

export const NO_CONTEXT = '(No direct context found)';

const LENGTH_GUIDES: Record<StyleSettings['length'], string> = {
  short: 'Keep it short, roughly 8 to 12 lines of dialogue.',
  medium: 'Aim for roughly 15 to 25 lines of dialogue.',
  long: 'Write a long scene, roughly 30 to 45 lines of dialogue.'
};

export type BuilderConfig = Pick<GenerationConfig, 'useExamples' | 'style' | 'maxPromptTokens'>;

/**
 * Picks the example sharing the most characters with the scene; ties keep
 * document order, so the choice is stable for identical input.
 */
export function pickExample(examples: readonly StyleExample[], characters: readonly string[]): StyleExample | undefined {
  const wanted = new Set(characters.map(c => c.toUpperCase()));
  let best: StyleExample | undefined;
  let bestScore = -1;
  for (const example of examples) {
    const score = example.characters.filter(c => wanted.has(c.toUpperCase())).length;
    if (score > bestScore) {
      best = example;
      bestScore = score;
    }
  }
  return best;
}

function formatProfiles(characters: readonly string[], characterTags: Record<string, string[]> | undefined): string {
  if (!characterTags) return '';
  return characters
    .filter(name => (characterTags[name]?.length ?? 0) > 0)
    .map(name => `${name}: ${characterTags[name].join(', ')}`)
    .join('\n');
}

/** Up to two tags per character, phrased as things the character might bring up. */
function formatInspirations(characters: readonly string[], characterTags: Record<string, string[]> | undefined): string {
  if (!characterTags) return '';
  return characters
    .map(name => ({ name, tags: (characterTags[name] ?? []).slice(0, 2) }))
    .filter(({ tags }) => tags.length > 0)
    .map(({ name, tags }) => `- ${name}: Might reference things such as ${tags.join(', ')}`)
    .join('\n');
}

export class PromptBuilder {
  private readonly env: nunjucks.Environment;

  constructor(env: nunjucks.Environment = createTemplateEnvironment()) {
    this.env = env;
  }

  private renderSystem(style: Readonly<StyleSettings>): string {
    return this.env.render('system.njk', { style, lengthGuide: LENGTH_GUIDES[style.length] }).trim();
  }

  /**
   * Builds the system and user messages for one scene.
   * Throws BuildError when there are no characters or the setting is blank.
   */
  build(
    setting: string,
    characters: readonly string[],
    contextWindow: readonly string[],
    tags: readonly string[],
    config: BuilderConfig,
    extras: PromptExtras = {}
  ): PromptPayload {
    const cast = characters.map(c => c.trim()).filter(Boolean);
    if (cast.length === 0) {
      throw new BuildError('At least one character is required');
    }
    if (!setting || !setting.trim()) {
      throw new BuildError('Setting must not be blank');
    }

    const example = config.useExamples && extras.examples ? pickExample(extras.examples, cast) : undefined;
    const baseData = {
      setting,
      characterList: cast.join(', '),
      premise: extras.premise?.trim() || '',
      vibes: (extras.vibes ?? []).join(', '),
      profiles: formatProfiles(cast, extras.characterTags),
      inspirations: formatInspirations(cast, extras.characterTags),
      tagHints: tags.join(', '),
      example: example?.text.trim() || ''
    };

    const render = (lines: readonly string[]): string => this.env.render('scenario.njk', {
      ...baseData,
      contextText: lines.length > 0 ? lines.join('\n') : NO_CONTEXT
    }).trim();

    let lines = [...contextWindow];
    let userMessage = render(lines);

    if (config.maxPromptTokens) {
      // Drop the oldest context lines until the message fits
      while (lines.length > 0 && countTokens(userMessage) > config.maxPromptTokens) {
        lines = lines.slice(1);
        userMessage = render(lines);
      }
      if (countTokens(userMessage) > config.maxPromptTokens) {
        log('User message still over budget (%d tokens) with no context left', countTokens(userMessage));
      }
    }

    const systemMessage = this.renderSystem(config.style);
    log('Built prompt: system=%d chars user=%d chars context=%d lines example=%s',
      systemMessage.length, userMessage.length, lines.length, example?.id ?? 'none');

    return { systemMessage, userMessage };
  }

  /**
   * Builds the payload that asks the model to rework a previous scene.
   * The original scenario text becomes the user message.
   */
  buildRefinement(
    originalInput: string,
    previousScene: string,
    notes: string,
    config: Pick<GenerationConfig, 'style'>
  ): PromptPayload {
    if (!originalInput.trim()) {
      throw new BuildError('Original scenario input must not be blank');
    }
    if (!previousScene.trim()) {
      throw new BuildError('There is no previous scene to refine');
    }
    if (!notes.trim()) {
      throw new BuildError('Refinement notes must not be blank');
    }

    const systemMessage = this.env.render('refine.njk', {
      style: config.style,
      previousScene: previousScene.trim(),
      notes: notes.trim()
    }).trim();

    return { systemMessage, userMessage: originalInput };
  }
}
