/**
 * Receives every finished scene. Persistence is up to the implementation;
 * the session only hands over the text.
 */
export interface ArchiveSink {
  accept(text: string): void | Promise<void>;
}

export interface ArchivedScene {
  timestamp: string;
  text: string;
}

/** Keeps archived scenes in memory, oldest first. */
export class MemoryArchiveSink implements ArchiveSink {
  private readonly entries: ArchivedScene[] = [];

  accept(text: string): void {
    this.entries.push({ timestamp: new Date().toISOString(), text });
  }

  list(): ArchivedScene[] {
    return Array.from(this.entries);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
