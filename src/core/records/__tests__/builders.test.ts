/**
 * Tests for record builders and date conversion.
 */

import { describe, it, expect } from 'vitest';
import { buildSessionMetadata, buildTaggedInterval, buildUserProfile } from '../builders.js';
import { convertDatetimes } from '../datetimes.js';
import { validate } from '../../validation/schema-validator.js';

const noon = new Date(Date.UTC(2024, 0, 15, 12, 0, 0));

describe('buildUserProfile', () => {
  it('fills omitted optional fields with null', () => {
    const user = buildUserProfile({ role: 'Developer', email: 'dev@lab.test', age: 30 });
    expect(user).toEqual({
      first_name: null,
      last_name: null,
      role: 'Developer',
      group: null,
      email: 'dev@lab.test',
      age: 30,
      weight: null,
      gender: null,
      devices: null,
    });
  });

  it('produces a valid v2 user profile', () => {
    const user = buildUserProfile({
      firstName: 'Ada',
      role: 'Admin',
      email: 'ada@lab.test',
      devices: ['MUSE-0001'],
    });
    const result = validate(user, 'UserProfile', 'v2');
    expect(result.ok).toBe(true);
    expect(result.normalized).toEqual(user);
  });
});

describe('buildSessionMetadata', () => {
  it('formats the session date and merges extra metadata', () => {
    const session = buildSessionMetadata({
      userId: 'u1',
      date: noon,
      tags: ['eyes-closed'],
      extra: { recorded_at: noon, device: { serial: 'MUSE-0001', started: noon } },
    });
    expect(session).toEqual({
      recorded_at: '2024-01-15T12:00:00.000Z',
      device: { serial: 'MUSE-0001', started: '2024-01-15T12:00:00.000Z' },
      user_id: 'u1',
      session_date: '2024-01-15',
      session_type: '',
      session_tags: ['eyes-closed'],
    });
  });

  it('produces a valid v2 session record', () => {
    const session = buildSessionMetadata({ userId: 'u1', date: '2024-01-15', sessionType: 'resting' });
    expect(validate(session, 'SessionMetadata', 'v2').ok).toBe(true);
  });

  it('lets declared fields win over extra metadata', () => {
    const session = buildSessionMetadata({ userId: 'u1', date: '2024-01-15', extra: { user_id: 'other' } });
    expect(session.user_id).toBe('u1');
  });
});

describe('buildTaggedInterval', () => {
  it('converts timestamps and bare tags', () => {
    const tagged = buildTaggedInterval({
      sessionId: 's1',
      start: noon,
      end: '2024-01-15T12:00:05Z',
      tags: ['blink', { tag: 'artifact', properties: { source: 'jaw' } }],
    });
    expect(tagged).toEqual({
      session_id: 's1',
      start_time: '2024-01-15T12:00:00.000Z',
      end_time: '2024-01-15T12:00:05Z',
      channel_ids: [],
      tags: [
        { tag: 'blink', properties: {} },
        { tag: 'artifact', properties: { source: 'jaw' } },
      ],
    });
    expect(validate(tagged, 'TaggedInterval', 'v2').ok).toBe(true);
  });
});

describe('convertDatetimes', () => {
  it('converts nested dates without touching the input', () => {
    const input = { at: noon, list: [noon, 1], nested: { at: noon, name: 'x' } };
    expect(convertDatetimes(input)).toEqual({
      at: '2024-01-15T12:00:00.000Z',
      list: ['2024-01-15T12:00:00.000Z', 1],
      nested: { at: '2024-01-15T12:00:00.000Z', name: 'x' },
    });
    expect(input.at).toBe(noon);
  });

  it('passes scalars through', () => {
    expect(convertDatetimes('x')).toBe('x');
    expect(convertDatetimes(null)).toBeNull();
  });
});
