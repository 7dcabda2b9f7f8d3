/**
 * Per-session batch managers. Each session owns its rows, location and
 * API key override; the engine and taxonomy index are shared.
 */

import { randomUUID } from 'node:crypto';
import { NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { ResolutionEngine } from '../matching';
import { type BatchManager, createBatchManager } from './batch.service';
import type { BatchSettings } from './batch.types';

export interface Session {
  id: string;
  batch: BatchManager;
  createdAt: Date;
}

export interface SessionRegistry {
  create(settings?: BatchSettings): Session;
  get(sessionId: string): Session;
  has(sessionId: string): boolean;
  remove(sessionId: string): boolean;
  size(): number;
}

export function createSessionRegistry(
  engine: ResolutionEngine,
  createId: () => string = randomUUID,
): SessionRegistry {
  const sessions = new Map<string, Session>();

  return {
    create(settings = {}) {
      const session: Session = {
        id: createId(),
        batch: createBatchManager(engine, settings),
        createdAt: new Date(),
      };
      sessions.set(session.id, session);
      logger.debug({ sessionId: session.id, hasLocation: Boolean(settings.location) }, 'Session created');
      return session;
    },

    get(sessionId) {
      const session = sessions.get(sessionId);
      if (!session) {
        throw new NotFoundError(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND');
      }
      return session;
    },

    has(sessionId) {
      return sessions.has(sessionId);
    },

    remove(sessionId) {
      const removed = sessions.delete(sessionId);
      if (removed) logger.debug({ sessionId }, 'Session removed');
      return removed;
    },

    size() {
      return sessions.size;
    },
  };
}
