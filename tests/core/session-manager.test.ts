import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { SessionManager, sanitizeSessionName } from '../../src/core/session-manager.js';

describe('SessionManager', () => {
  let sessionsDir: string;
  let sessionManager: SessionManager;

  beforeEach(async () => {
    sessionsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mendscrape-sessions-'));
    sessionManager = new SessionManager(sessionsDir);
  });

  afterEach(async () => {
    await fs.rm(sessionsDir, { recursive: true, force: true });
  });

  describe('sanitizeSessionName', () => {
    it('should keep only safe characters', () => {
      expect(sanitizeSessionName('../evil name!')).toBe('evilname');
      expect(sanitizeSessionName('shop_login-2')).toBe('shop_login-2');
    });

    it('should fall back to default for an empty result', () => {
      expect(sanitizeSessionName('../..')).toBe('default');
    });
  });

  it('should keep session files inside the sessions directory', () => {
    expect(sessionManager.sessionPath('../../etc/passwd')).toBe(path.join(sessionsDir, 'etcpasswd.json'));
  });

  it('should save and load a session blob', async () => {
    const state = { cookies: [{ domain: 'shop.example', name: 'sid', value: 'test-session' }] };
    const saved = await sessionManager.save('shop', state);

    expect(saved).toEqual({ name: 'shop', path: path.join(sessionsDir, 'shop.json') });
    await expect(sessionManager.load('shop')).resolves.toEqual(state);
  });

  it('should return null for a session that was never saved', async () => {
    await expect(sessionManager.load('missing')).resolves.toBeNull();
  });

  it('should reject a session file that is not an object', async () => {
    await fs.writeFile(path.join(sessionsDir, 'broken.json'), '[1, 2]');
    await expect(sessionManager.load('broken')).rejects.toThrow('Session file does not contain an object');
  });

  it('should list saved sessions in order', async () => {
    await sessionManager.save('beta', {});
    await sessionManager.save('alpha', {});
    await expect(sessionManager.list()).resolves.toEqual(['alpha', 'beta']);
  });

  it('should list nothing when the directory does not exist', async () => {
    const missing = new SessionManager(path.join(sessionsDir, 'nope'));
    await expect(missing.list()).resolves.toEqual([]);
  });
});
