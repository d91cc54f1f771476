import * as nunjucks from 'nunjucks';
import * as path from 'path';
import { PROJECT_ROOT } from '../configManager.js';

export const PROMPTS_DIR = path.join(PROJECT_ROOT, 'prompts');

/** Template environment for prompts/*.njk and prompts/llm_templates/*.njk. */
export function createTemplateEnvironment(dir: string = PROMPTS_DIR): nunjucks.Environment {
  return new nunjucks.Environment(
    new nunjucks.FileSystemLoader(dir),
    { autoescape: false, trimBlocks: true, lstripBlocks: true }
  );
}
