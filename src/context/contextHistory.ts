import { createLogger, NAMESPACES } from '../logging.js';

const log = createLogger(NAMESPACES.context.history);

/**
 * Parse a history line to extract speaker and content.
 * Expected formats: "SPEAKER: line" or just "line"
 */
export function parseHistoryLine(line: string): { speaker: string | null; content: string } {
  const colonIndex = line.indexOf(':');
  if (colonIndex > 0 && colonIndex < 50) { // Reasonable speaker name length
    const speaker = line.substring(0, colonIndex).trim();
    const content = line.substring(colonIndex + 1).trim();
    if (speaker && !/\s{2,}/.test(speaker)) return { speaker, content };
  }
  return { speaker: null, content: line };
}

/**
 * Append-only record of dialogue/context lines for one session.
 * Reads never hand out the backing array.
 */
export class ContextHistory {
  private readonly lines: string[] = [];

  static fromLines(lines: Iterable<string>): ContextHistory {
    const history = new ContextHistory();
    for (const line of lines) history.append(line);
    return history;
  }

  /** Adds text to the history; multi-line text becomes several lines, blank lines are dropped. */
  append(text: string): void {
    for (const raw of text.split(/\r?\n/)) {
      const line = raw.trim();
      if (line) this.lines.push(line);
    }
  }

  get length(): number {
    return this.lines.length;
  }

  all(): string[] {
    return [...this.lines];
  }

  /** The last `n` lines, oldest first. */
  recentWindow(n: number): string[] {
    const count = Math.floor(n);
    if (!(count > 0)) return [];
    return this.lines.slice(Math.max(this.lines.length - count, 0));
  }

  /** The last `n` lines spoken by any of `speakers` (matched case-insensitively), oldest first. */
  linesBySpeakers(speakers: readonly string[], n: number): string[] {
    const count = Math.floor(n);
    if (!(count > 0) || speakers.length === 0) return [];
    const wanted = new Set(speakers.map(s => s.trim().toUpperCase()));
    const matched: string[] = [];
    for (let i = this.lines.length - 1; i >= 0 && matched.length < count; i--) {
      const { speaker } = parseHistoryLine(this.lines[i]);
      if (speaker && wanted.has(speaker.toUpperCase())) {
        matched.unshift(this.lines[i]);
      }
    }
    return matched;
  }

  /**
   * Context for a prompt: lines spoken by the scene's characters when there
   * are any, otherwise the plain recent window.
   */
  select(speakers: readonly string[], n: number): string[] {
    const relevant = this.linesBySpeakers(speakers, n);
    if (relevant.length > 0) {
      log('Selected %d speaker lines for %o', relevant.length, speakers);
      return relevant;
    }
    const recent = this.recentWindow(n);
    log('No speaker lines for %o, using %d recent lines', speakers, recent.length);
    return recent;
  }
}
