/**
 * File-backed LogStore
 *
 * One JSON-lines file per stream: `{ "o": <offset>, "p": <payload> }`.
 * - append: write + datasync before resolving
 * - compactAck: write survivors to `<stream>.log.tmp`, datasync, rename over the original
 * - a torn final line (crash mid-append) is ignored on read; corruption anywhere else is a StorageError
 */

import fs from 'fs/promises';
import path from 'path';
import { StorageError, errorMessage } from '../../lib/errors/index.js';
import { storageLogger } from '../../utils/logger.js';
import { KeyedMutex } from '../KeyedMutex.js';
import type { LogEntry, LogStore } from './LogStore.js';

const logger = storageLogger.child({ module: 'FileLogStore' });

const STREAM_NAME = /^[a-z0-9][a-z0-9-]*$/;

export class FileLogStore implements LogStore {
  private readonly mutex = new KeyedMutex();
  private readonly nextOffsets = new Map<string, number>();

  constructor(private readonly directory: string) {}

  async append(stream: string, payloads: unknown[]): Promise<number> {
    return this.mutex.runExclusive(stream, async () => {
      let offset = await this.nextOffset(stream);
      if (payloads.length === 0) return offset - 1;

      const lines = payloads.map((payload) => JSON.stringify({ o: offset++, p: payload })).join('\n') + '\n';

      try {
        await fs.mkdir(this.directory, { recursive: true });
        const handle = await fs.open(this.filePath(stream), 'a');
        try {
          await handle.write(lines);
          await handle.datasync();
        } finally {
          await handle.close();
        }
      } catch (error) {
        logger.error({ err: error, stream }, 'Append failed');
        // Offsets are re-read from disk next time
        this.nextOffsets.delete(stream);
        throw new StorageError(`Failed to append to stream '${stream}': ${errorMessage(error)}`, error);
      }

      this.nextOffsets.set(stream, offset);
      return offset - 1;
    });
  }

  async readRange(stream: string, fromOffset = 0, limit?: number): Promise<LogEntry[]> {
    return this.mutex.runExclusive(stream, async () => {
      const { entries: all } = await this.readAll(stream);
      const entries = all.filter((entry) => entry.offset >= fromOffset);
      return limit === undefined ? entries : entries.slice(0, limit);
    });
  }

  async compactAck(stream: string, keep: (entry: LogEntry) => boolean): Promise<number> {
    return this.mutex.runExclusive(stream, async () => {
      const { entries, torn } = await this.readAll(stream);
      const kept = entries.filter(keep);
      if (kept.length === entries.length && !torn) return 0;

      await this.rewrite(stream, kept);
      logger.debug({ stream, removed: entries.length - kept.length }, 'Stream compacted');
      return entries.length - kept.length;
    });
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private filePath(stream: string): string {
    if (!STREAM_NAME.test(stream)) {
      throw new StorageError(`Invalid stream name '${stream}'`);
    }
    return path.join(this.directory, `${stream}.log`);
  }

  private async nextOffset(stream: string): Promise<number> {
    const cached = this.nextOffsets.get(stream);
    if (cached !== undefined) return cached;

    const { entries, torn } = await this.readAll(stream);
    if (torn) {
      // Appending after a torn line would glue the next entry onto it
      await this.rewrite(stream, entries);
    }
    const next = entries.length === 0 ? 1 : entries[entries.length - 1].offset + 1;
    this.nextOffsets.set(stream, next);
    return next;
  }

  private async rewrite(stream: string, entries: LogEntry[]): Promise<void> {
    const target = this.filePath(stream);
    const temp = `${target}.tmp`;
    const body = entries.map((entry) => JSON.stringify({ o: entry.offset, p: entry.payload })).join('\n');

    try {
      await fs.mkdir(this.directory, { recursive: true });
      const handle = await fs.open(temp, 'w');
      try {
        await handle.write(body.length > 0 ? `${body}\n` : '');
        await handle.datasync();
      } finally {
        await handle.close();
      }
      await fs.rename(temp, target);
    } catch (error) {
      logger.error({ err: error, stream }, 'Rewrite failed, original log kept');
      await fs.rm(temp, { force: true });
      throw new StorageError(`Failed to rewrite stream '${stream}': ${errorMessage(error)}`, error);
    }
  }

  private async readAll(stream: string): Promise<{ entries: LogEntry[]; torn: boolean }> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath(stream), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return { entries: [], torn: false };
      throw new StorageError(`Failed to read stream '${stream}': ${errorMessage(error)}`, error);
    }

    const lines = raw.split('\n');
    const entries: LogEntry[] = [];
    let torn = false;

    lines.forEach((line, index) => {
      if (line.trim().length === 0) return;
      const entry = parseLine(line);
      if (entry) {
        entries.push(entry);
        return;
      }
      const isLastLine = lines.slice(index + 1).every((rest) => rest.trim().length === 0);
      if (!isLastLine) {
        throw new StorageError(`Corrupt entry in stream '${stream}' at line ${index + 1}`);
      }
      logger.warn({ stream, line: index + 1 }, 'Ignoring torn trailing entry');
      torn = true;
    });

    return { entries, torn };
  }
}

function parseLine(line: string): LogEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('o' in parsed) || !('p' in parsed)) {
    return null;
  }
  const offset = parsed.o;
  if (typeof offset !== 'number' || !Number.isInteger(offset)) return null;
  return { offset, payload: parsed.p };
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
