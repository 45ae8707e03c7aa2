/**
 * Tests for the structured logger with secret redaction
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { configureLogger, logger } from '../../src/utils/logger.js';

describe('Logger', () => {
  let stderrSpy: MockInstance<typeof process.stderr.write>;

  const lines = (): Array<Record<string, unknown>> =>
    stderrSpy.mock.calls
      .map(([chunk]) => String(chunk))
      .join('')
      .split('\n')
      .filter((line) => line.length > 0)
      .map((line) => JSON.parse(line));

  beforeEach(() => {
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    configureLogger({ level: 'debug', prettyPrint: false });
  });

  afterEach(() => {
    configureLogger({ level: 'silent' });
    stderrSpy.mockRestore();
  });

  it('should write JSON lines tagged with the component', () => {
    logger.pool.info('Opened tab', { tabId: 'default' });

    expect(lines()).toEqual([
      expect.objectContaining({ level: 'info', component: 'PagePool', tabId: 'default', msg: 'Opened tab' }),
    ]);
  });

  it('should redact cookies and session state', () => {
    logger.session.info('Request made', {
      headers: { Cookie: 'session=test-session', accept: 'text/html' },
      state: { cookies: [{ name: 'session', value: 'test-session' }] },
    });

    const [line] = lines();
    expect(line.headers).toEqual({ Cookie: '[REDACTED]', accept: 'text/html' });
    expect(line.state).toEqual({ cookies: '[REDACTED]' });
  });

  it('should serialise errors passed to error()', () => {
    logger.cli.error('Unhandled failure', { error: new TypeError('bad input') });

    expect(lines()[0].err).toMatchObject({ name: 'TypeError', message: 'bad input' });
  });

  it('should follow a reconfigured base logger', () => {
    const worker = logger.create('Worker');
    configureLogger({ level: 'warn' });
    worker.info('Fetched page');
    worker.warn('Slow page', { site: 'shop.example' });

    expect(lines()).toEqual([
      expect.objectContaining({ level: 'warn', component: 'Worker', site: 'shop.example', msg: 'Slow page' }),
    ]);
  });

  it('should respect the configured level', () => {
    configureLogger({ level: 'warn' });
    logger.executor.info('Task completed');
    logger.executor.debug('Task detail');

    expect(lines()).toEqual([]);
  });

  it('should add the elapsed time to timed messages', () => {
    logger.executor.timed('Task completed', Date.now() - 5, { action: 'extract' });

    const [line] = lines();
    expect(line.action).toBe('extract');
    expect(typeof line.durationMs).toBe('number');
  });
});
