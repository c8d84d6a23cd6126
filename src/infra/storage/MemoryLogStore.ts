import type { LogEntry, LogStore } from './LogStore.js';

/**
 * In-process LogStore. Payloads are deep-copied through JSON on the way in
 * and out so callers observe the same value semantics as the file store.
 */
export class MemoryLogStore implements LogStore {
  private readonly streams = new Map<string, LogEntry[]>();
  private readonly nextOffsets = new Map<string, number>();

  async append(stream: string, payloads: unknown[]): Promise<number> {
    const entries = this.streams.get(stream) ?? [];
    let offset = this.nextOffsets.get(stream) ?? 1;
    for (const payload of payloads) {
      entries.push({ offset, payload: clone(payload) });
      offset++;
    }
    this.streams.set(stream, entries);
    this.nextOffsets.set(stream, offset);
    return offset - 1;
  }

  async readRange(stream: string, fromOffset = 0, limit?: number): Promise<LogEntry[]> {
    const entries = (this.streams.get(stream) ?? []).filter((entry) => entry.offset >= fromOffset);
    const sliced = limit === undefined ? entries : entries.slice(0, limit);
    return sliced.map((entry) => ({ offset: entry.offset, payload: clone(entry.payload) }));
  }

  async compactAck(stream: string, keep: (entry: LogEntry) => boolean): Promise<number> {
    const entries = this.streams.get(stream) ?? [];
    const kept = entries.filter((entry) => keep({ offset: entry.offset, payload: clone(entry.payload) }));
    this.streams.set(stream, kept);
    return entries.length - kept.length;
  }

  /** Total entries in a stream (test helper) */
  size(stream: string): number {
    return this.streams.get(stream)?.length ?? 0;
  }
}

function clone(value: unknown): unknown {
  return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
}
