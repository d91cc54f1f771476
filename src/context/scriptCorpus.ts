import * as fs from 'fs';
import { LoadError, errMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { ContextHistory } from './contextHistory.js';

const log = createLogger(NAMESPACES.context.history);

export interface ScriptSources {
  /** Main script, one "NAME: line" per line */
  script?: string;
  /** Parody episodes, placed after the main script */
  parodyScript?: string;
}

export function readScriptLines(filePath: string): string[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new LoadError(`Cannot read script ${filePath}: ${errMessage(error)}`, { path: filePath }, { cause: error });
  }
  return raw.split(/\r?\n/).map(line => line.trim()).filter(Boolean);
}

/**
 * Seeds a history with the configured scripts. Parody lines come last, so
 * the most-recent-first window reaches them before the main script.
 */
export function loadScriptCorpus(sources: ScriptSources): ContextHistory {
  const lines: string[] = [];
  if (sources.script) lines.push(...readScriptLines(sources.script));
  if (sources.parodyScript) lines.push(...readScriptLines(sources.parodyScript));
  log('Loaded script corpus: %d lines', lines.length);
  return ContextHistory.fromLines(lines);
}
