/**
 * Typed constructors for the records a client submits.
 *
 * Builders only assemble fields; they do not validate. Pass the result to
 * `validate()` before submission.
 */

import type {
  IntervalTag,
  SessionMetadataV2,
  TaggedIntervalV2,
  UserProfileV2,
} from '../../types/records.js';
import { isPlainObject } from '../validation/normalize.js';
import { convertDatetimes, toTimestamp } from './datetimes.js';

export interface UserProfileInput {
  firstName?: string;
  lastName?: string;
  role: string;
  group?: string;
  email: string;
  age?: number;
  weight?: number;
  gender?: string;
  devices?: string[];
}

/**
 * Build a v2 user record. Every declared field is present; omitted optional
 * ones are null, which the validator treats as absent.
 */
export function buildUserProfile(input: UserProfileInput): UserProfileV2 {
  return {
    first_name: input.firstName ?? null,
    last_name: input.lastName ?? null,
    role: input.role,
    group: input.group ?? null,
    email: input.email,
    age: input.age ?? null,
    weight: input.weight ?? null,
    gender: input.gender ?? null,
    devices: input.devices ?? null,
  };
}

export interface SessionMetadataInput {
  userId: string;
  /** Session date; a Date becomes `YYYY-MM-DD` (UTC). */
  date: Date | string;
  sessionType?: string;
  tags?: string[];
  /** Extra metadata (e.g. recording headers) merged after the declared fields. */
  extra?: Record<string, unknown>;
}

/**
 * Build a v2 session record, one per recording session.
 */
export function buildSessionMetadata(input: SessionMetadataInput): SessionMetadataV2 {
  const sessionDate = input.date instanceof Date ? input.date.toISOString().slice(0, 10) : input.date;
  const extra = convertDatetimes(input.extra ?? {});
  return {
    ...(isPlainObject(extra) ? extra : {}),
    user_id: input.userId,
    session_date: sessionDate,
    session_type: input.sessionType ?? '',
    session_tags: [...(input.tags ?? [])],
  };
}

export interface TaggedIntervalInput {
  sessionId: string;
  start: Date | string;
  end: Date | string;
  tags: Array<string | IntervalTag>;
  /** Empty or omitted: the tags apply to every channel. */
  channelIds?: string[];
}

/**
 * Build a v2 tagged interval. Bare strings become tags without properties.
 */
export function buildTaggedInterval(input: TaggedIntervalInput): TaggedIntervalV2 {
  return {
    session_id: input.sessionId,
    start_time: toTimestamp(input.start),
    end_time: toTimestamp(input.end),
    channel_ids: [...(input.channelIds ?? [])],
    tags: input.tags.map((tag) => (typeof tag === 'string' ? { tag, properties: {} } : { ...tag })),
  };
}
