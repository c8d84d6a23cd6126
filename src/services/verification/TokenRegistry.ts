/**
 * QR / NFC punch tokens.
 *
 * Tokens are issued per site and generation by the admin service. A token is
 * single-use: consumption is persisted so a photographed code cannot be
 * replayed, even after a restart.
 */

import { z } from 'zod';
import { StorageError } from '../../lib/errors/index.js';
import { STREAMS, type LogEntry, type LogStore } from '../../infra/storage/LogStore.js';
import type { Site } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('TokenRegistry');

export interface PunchToken {
  tokenId: string;
  siteId: string;
  generation: number;
  expiresAt: string;
}

export type TokenCheck =
  | { valid: true; token: PunchToken }
  | { valid: false; reason: 'UNKNOWN' | 'WRONG_SITE' | 'EXPIRED' | 'STALE_GENERATION' | 'ALREADY_CONSUMED' };

const consumedEventSchema = z.object({
  tokenId: z.string(),
  employeeId: z.string(),
  at: z.string(),
});

export class TokenRegistry {
  private readonly tokens = new Map<string, PunchToken>();
  private readonly consumed = new Set<string>();
  private opened = false;

  constructor(private readonly store: LogStore) {}

  async open(): Promise<void> {
    if (this.opened) return;
    for (const entry of await this.store.readRange(STREAMS.consumedTokens)) {
      this.consumed.add(parseConsumed(entry).tokenId);
    }
    this.opened = true;
  }

  register(token: PunchToken): void {
    this.tokens.set(token.tokenId, { ...token });
  }

  check(tokenId: string, site: Site | undefined, siteId: string, now: Date): TokenCheck {
    const token = this.tokens.get(tokenId);
    if (!token) return { valid: false, reason: 'UNKNOWN' };
    if (this.consumed.has(tokenId)) return { valid: false, reason: 'ALREADY_CONSUMED' };
    if (token.siteId !== siteId || !site) return { valid: false, reason: 'WRONG_SITE' };
    if (Date.parse(token.expiresAt) <= now.getTime()) return { valid: false, reason: 'EXPIRED' };
    if (token.generation !== site.activeTokenGeneration) return { valid: false, reason: 'STALE_GENERATION' };
    return { valid: true, token };
  }

  async consume(tokenId: string, employeeId: string, now: Date): Promise<void> {
    await this.store.append(STREAMS.consumedTokens, [{ tokenId, employeeId, at: now.toISOString() }]);
    this.consumed.add(tokenId);
    logger.debug({ tokenId, employeeId }, 'Token consumed');
  }

  isConsumed(tokenId: string): boolean {
    return this.consumed.has(tokenId);
  }
}

function parseConsumed(entry: LogEntry): z.infer<typeof consumedEventSchema> {
  const parsed = consumedEventSchema.safeParse(entry.payload);
  if (!parsed.success) {
    throw new StorageError(`Corrupt token consumption at offset ${entry.offset}`);
  }
  return parsed.data;
}
