import { log } from "../utils/logger.js";

const memoryLog = log.withScope("memory");

export const DEFAULT_SHORT_TERM_CAPACITY = 15;

export type MemoryEntry = Readonly<{
  /** Epoch milliseconds. */
  timestamp: number;
  /** Player identifier or the NPC's own name. */
  source: string;
  event: string;
}>;

/**
 * Short-term queue bounded at `capacity`; each record() that overflows it
 * moves exactly one entry, the oldest, to the unbounded long-term log.
 */
export class MemoryLedger {
  readonly capacity: number;
  private shortTerm: MemoryEntry[] = [];
  private longTerm: MemoryEntry[] = [];

  constructor(capacity: number = DEFAULT_SHORT_TERM_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Short-term capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  record(source: string, event: string, timestamp: number = Date.now()): MemoryEntry {
    const entry: MemoryEntry = Object.freeze({ timestamp, source, event });
    this.shortTerm.push(entry);

    if (this.shortTerm.length > this.capacity) {
      const oldest = this.shortTerm.shift();
      if (oldest) {
        this.longTerm.push(oldest);
      }
    }

    memoryLog.debug(`Memory added (STM: ${this.shortTerm.length}/${this.capacity}, LTM: ${this.longTerm.length})`);
    return entry;
  }

  shortTermSnapshot(): readonly MemoryEntry[] {
    return [...this.shortTerm];
  }

  longTermSnapshot(): readonly MemoryEntry[] {
    return [...this.longTerm];
  }

  longTermCount(): number {
    return this.longTerm.length;
  }

  size(): number {
    return this.shortTerm.length;
  }

  /**
   * Chronological short-term transcript for prompt injection, oldest first.
   * Empty string when nothing has been recorded.
   */
  renderTranscript(): string {
    if (this.shortTerm.length === 0) {
      return "";
    }

    const lines = this.shortTerm.map((entry) => {
      const event = entry.event.trim().replace(/"/g, '\\"');
      return `${entry.source}: "${event}"`;
    });

    return ["=== RECENT MEMORY (OLDEST FIRST) ===", ...lines].join("\n");
  }
}
