// src/services/store/SessionStore.ts

import { SessionState, sessionStateSchema } from '../../models/session.model';
import { SessionStateError } from '../collector/errors';
import { KeyValueStore } from './KeyValueStore';

export const DEFAULT_SESSION_TTL_SECONDS = 3600;

export function serializeSession(state: SessionState): string {
  return JSON.stringify(state);
}

/** Parses a stored record; unknown metadata keys and malformed fields are rejected. */
export function deserializeSession(raw: string, sessionId?: string): SessionState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SessionStateError(
      `Stored session is not valid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
      sessionId,
    );
  }

  const result = sessionStateSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new SessionStateError(`Stored session is malformed: ${issues.join('; ')}`, sessionId);
  }
  return result.data;
}

/**
 * Session records keyed by id. Every save refreshes the record's TTL, so an
 * idle session expires `ttlSeconds` after its last turn.
 */
export class SessionStore {
  private readonly KEY_PREFIX = 'collector:session:';

  constructor(
    private store: KeyValueStore,
    private ttlSeconds: number = DEFAULT_SESSION_TTL_SECONDS,
  ) {}

  async load(sessionId: string): Promise<SessionState | null> {
    const raw = await this.store.get(this.key(sessionId));
    return raw === null ? null : deserializeSession(raw, sessionId);
  }

  async save(state: SessionState): Promise<void> {
    await this.store.put(this.key(state.sessionId), serializeSession(state), this.ttlSeconds);
  }

  async delete(sessionId: string): Promise<void> {
    await this.store.delete(this.key(sessionId));
  }

  async exists(sessionId: string): Promise<boolean> {
    return this.store.exists(this.key(sessionId));
  }

  private key(sessionId: string): string {
    return `${this.KEY_PREFIX}${sessionId}`;
  }
}
