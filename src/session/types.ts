/**
 * Type definitions for dialogue sessions.
 */

import { z } from 'zod';
import type { FlushResult } from '../memory/contextual-memory.js';

export const SessionStateSchema = z.enum(['active', 'closed', 'expired']);

export type SessionState = z.infer<typeof SessionStateSchema>;

/** Read-only view of a session. */
export interface SessionInfo {
  id: string;
  /** Persistence scope for preferences and long-term memory */
  userId: string;
  /** Unix ms */
  startedAt: number;
  /** Unix ms of the last submitted work */
  lastActivityAt: number;
  metadata: Record<string, unknown>;
  state: SessionState;
}

export interface StartSessionOptions {
  id?: string;
  /** Defaults to the session id */
  userId?: string;
  metadata?: Record<string, unknown>;
}

export interface SessionCloseReport {
  sessionId: string;
  state: Exclude<SessionState, 'active'>;
  reason: string;
  /** Id of the summary entry, null when the session recorded no turns */
  summaryEntryId: string | null;
  flush: FlushResult;
}
