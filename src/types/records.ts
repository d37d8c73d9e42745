/**
 * Record kinds and the typed shapes of the bundled schema revisions.
 */

/** The closed set of record kinds. */
export const RECORD_KINDS = ['UserProfile', 'SessionMetadata', 'TaggedInterval'] as const;

export type RecordKind = (typeof RECORD_KINDS)[number];

/** Key of each kind inside a schema document. */
export const SCHEMA_DOCUMENT_KEYS = {
  UserProfile: 'userSchema',
  SessionMetadata: 'sessionSchema',
  TaggedInterval: 'tagSchema',
} as const satisfies Record<RecordKind, string>;

/** UserProfile, revision v1. */
export interface UserProfileV1 {
  first_name?: string | null;
  last_name?: string | null;
  email: string;
  age?: number | null;
  weight?: number | null;
  sex?: string | null;
}

/** UserProfile, revision v2. `gender` replaces `sex`. */
export interface UserProfileV2 {
  first_name?: string | null;
  last_name?: string | null;
  role: string;
  group?: string | null;
  email: string;
  age?: number | null;
  weight?: number | null;
  gender?: string | null;
  devices?: string[] | null;
}

/** SessionMetadata, revision v1. */
export interface SessionMetadataV1 {
  user_id: string;
  session_date: string;
  karolinska_sleep_score?: number;
  hours_awake?: number;
  duration_of_last_sleep?: number;
  additional_notes?: string;
}

/** SessionMetadata, revision v2. */
export interface SessionMetadataV2 {
  user_id: string;
  session_date: string;
  session_type: string;
  session_tags?: string[];
  additional_notes?: string;
  [extra: string]: unknown;
}

/** One label applied to a tagged interval. */
export interface IntervalTag {
  tag: string;
  properties?: Record<string, unknown>;
}

/** TaggedInterval, revision v2. */
export interface TaggedIntervalV2 {
  session_id: string;
  start_time: string;
  end_time: string;
  /** Empty means the tags apply to every channel. */
  channel_ids?: string[];
  tags: IntervalTag[];
}
