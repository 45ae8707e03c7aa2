/**
 * Session Manager - named session blobs on disk
 *
 * Blobs are opaque provider state (cookies, local storage) written
 * atomically as JSON under the sessions directory. Names are reduced to
 * `[A-Za-z0-9_-]`, so a name can never escape the directory.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { SessionState } from '../types/page.js';
import { logger } from '../utils/logger.js';
import { PersistentStore } from '../utils/persistent-store.js';

const log = logger.session;

export interface SavedSession {
  name: string;
  path: string;
}

function parseSessionState(raw: unknown): SessionState {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('Session file does not contain an object');
  }
  return { ...raw };
}

export function sanitizeSessionName(name: string): string {
  const safe = Array.from(name)
    .filter((ch) => /[A-Za-z0-9_-]/.test(ch))
    .join('');
  return safe || 'default';
}

export class SessionManager {
  constructor(private readonly sessionsDir: string) {}

  sessionPath(name: string): string {
    return path.resolve(this.sessionsDir, `${sanitizeSessionName(name)}.json`);
  }

  private store(name: string): PersistentStore<SessionState> {
    return new PersistentStore(this.sessionPath(name), parseSessionState, {
      componentName: 'SessionManager',
      prettyPrint: false,
    });
  }

  async save(name: string, state: SessionState): Promise<SavedSession> {
    const store = this.store(name);
    await Promise.all([store.save(state), store.flush()]);
    log.info('Session saved', { session: sanitizeSessionName(name) });
    return { name: sanitizeSessionName(name), path: store.getFilePath() };
  }

  /**
   * Load a saved blob, null when no session of that name exists.
   */
  async load(name: string): Promise<SessionState | null> {
    const state = await this.store(name).load();
    if (state === null) {
      log.debug('Session not found', { session: sanitizeSessionName(name) });
    }
    return state;
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.sessionsDir);
    } catch (error) {
      log.debug('Sessions directory unreadable', { error: String(error) });
      return [];
    }
    return entries
      .filter((entry) => entry.endsWith('.json'))
      .map((entry) => entry.slice(0, -'.json'.length))
      .sort();
  }
}
