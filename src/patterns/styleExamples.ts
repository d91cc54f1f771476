import * as fs from 'fs';
import type { Schema } from 'ajv';
import { LoadError, errMessage } from '../errors.js';
import type { StyleExample } from '../llm/types.js';
import { createValidator } from '../utils/schemaValidation.js';

const examplesSchema: Schema = {
  type: 'array',
  items: {
    type: 'object',
    required: ['id', 'characters', 'text'],
    properties: {
      id: { type: 'string', minLength: 1 },
      characters: { type: 'array', items: { type: 'string' } },
      text: { type: 'string', minLength: 1 }
    }
  }
};

const validateExamples = createValidator<StyleExample[]>(examplesSchema);

export function parseStyleExamples(source: unknown): StyleExample[] {
  const result = validateExamples(source);
  if (!result.valid || !result.value) {
    throw new LoadError(`Invalid style examples: ${result.errors.join('; ')}`, { errors: result.errorDetails });
  }
  return result.value;
}

export function loadStyleExamples(filePath: string): StyleExample[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new LoadError(`Cannot read style examples ${filePath}: ${errMessage(error)}`, { path: filePath }, { cause: error });
  }
  return parseStyleExamples(parsed);
}
