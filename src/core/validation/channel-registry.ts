/**
 * Channel registry: the optional collaborator the validator consults to
 * check that a tagged interval names channels its session actually recorded.
 */

import { z } from 'zod';
import { BrainmetaError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

export interface ChannelRegistry {
  has(sessionId: string, channelId: string): boolean;
}

const channelMapSchema = z.record(z.array(z.string()));

/**
 * Registry backed by an in-memory map of session id to channel ids.
 */
export class InMemoryChannelRegistry implements ChannelRegistry {
  private readonly channels = new Map<string, ReadonlySet<string>>();

  constructor(entries: Record<string, readonly string[]> = {}) {
    for (const [sessionId, channelIds] of Object.entries(entries)) {
      this.channels.set(sessionId, new Set(channelIds));
    }
  }

  /**
   * Build from parsed JSON shaped `{ "<session id>": ["<channel id>", ...] }`.
   */
  static fromJson(data: unknown): InMemoryChannelRegistry {
    const parsed = channelMapSchema.safeParse(data);
    if (!parsed.success) {
      throw new BrainmetaError(
        ExitCode.INVALID_INPUT,
        'Channel registry must map session ids to arrays of channel ids',
      );
    }
    return new InMemoryChannelRegistry(parsed.data);
  }

  has(sessionId: string, channelId: string): boolean {
    return this.channels.get(sessionId)?.has(channelId) ?? false;
  }
}
