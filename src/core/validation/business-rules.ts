/**
 * Semantic checks the schemas cannot express.
 *
 * Rules see the coerced record and report `Custom` defects. They are
 * independent of the shape checks and skip values of the wrong shape,
 * which the schema check has already reported.
 */

import type { RecordKind } from '../../types/records.js';
import type { FieldError, MetadataRecord } from '../../types/validation.js';
import type { ChannelRegistry } from './channel-registry.js';
import { compareInstants, parseInstant } from './formats.js';
import { isPlainObject } from './normalize.js';

export interface RuleContext {
  channels?: ChannelRegistry;
}

export interface RuleOutcome {
  errors: FieldError[];
  advisories: FieldError[];
}

type BusinessRule = (record: MetadataRecord, context: RuleContext, outcome: RuleOutcome) => void;

function custom(path: string, message: string): FieldError {
  return { path, kind: 'Custom', message };
}

const sessionReference: BusinessRule = (record, _context, outcome) => {
  const sessionId = record['session_id'];
  if (typeof sessionId === 'string' && sessionId.trim() === '') {
    outcome.errors.push(custom('session_id', 'session_id must be a non-blank identifier'));
  }
};

const temporalOrder: BusinessRule = (record, _context, outcome) => {
  const start = record['start_time'];
  const end = record['end_time'];
  if (typeof start !== 'string' || typeof end !== 'string') return;
  // Every string the date-time format accepts parses here; anything else
  // has already been reported as WrongFormat.
  const startAt = parseInstant(start);
  const endAt = parseInstant(end);
  if (startAt && endAt && compareInstants(endAt, startAt) < 0) {
    outcome.errors.push(custom('end_time', 'end_time precedes start_time'));
  }
};

const tagList: BusinessRule = (record, _context, outcome) => {
  const tags = record['tags'];
  if (!Array.isArray(tags)) return;
  if (tags.length === 0) {
    outcome.errors.push(custom('tags', 'tags must contain at least one entry'));
    return;
  }
  tags.forEach((entry: unknown, index) => {
    const label = isPlainObject(entry) ? entry['tag'] : undefined;
    if (typeof label === 'string' && label.trim() === '') {
      outcome.errors.push(custom(`tags.${index}.tag`, 'tag label must not be empty'));
    }
  });
};

// Advisory only: the registry may not know every channel of a session.
const knownChannels: BusinessRule = (record, context, outcome) => {
  const registry = context.channels;
  const sessionId = record['session_id'];
  const channelIds = record['channel_ids'];
  if (!registry || typeof sessionId !== 'string' || !Array.isArray(channelIds)) return;
  channelIds.forEach((channelId: unknown, index) => {
    if (typeof channelId === 'string' && !registry.has(sessionId, channelId)) {
      outcome.advisories.push(
        custom(`channel_ids.${index}`, `channel '${channelId}' is not registered for session '${sessionId}'`),
      );
    }
  });
};

const RULES: Record<RecordKind, readonly BusinessRule[]> = {
  UserProfile: [],
  SessionMetadata: [],
  TaggedInterval: [sessionReference, temporalOrder, tagList, knownChannels],
};

/**
 * Run every rule of a record kind.
 */
export function applyBusinessRules(
  kind: RecordKind,
  record: MetadataRecord,
  context: RuleContext = {},
): RuleOutcome {
  const outcome: RuleOutcome = { errors: [], advisories: [] };
  for (const rule of RULES[kind]) {
    rule(record, context, outcome);
  }
  return outcome;
}
