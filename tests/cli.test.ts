import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { runCli, USAGE, type CliIO } from '../src/cli.js';
import type { HtmlFetcher } from '../src/core/static-page-provider.js';
import { parseConfig } from '../src/utils/config-loader.js';
import type { AgentConfigInput } from '../src/utils/config-schemas.js';

const ITEM = 'https://shop.example/item/1';

const NAVIGATE_TASK = { action: 'navigate', target: { url: ITEM } };
const NAVIGATE_RESULT = { status: 'ok', result: { tabId: 'default', url: ITEM, status: 200, ok: true } };

class MemoryIO implements CliIO {
  out = '';
  err = '';

  constructor(
    private readonly files: Record<string, string> = {},
    private readonly stdinText = ''
  ) {}

  stdout(text: string): void {
    this.out += text;
  }

  stderr(text: string): void {
    this.err += text;
  }

  async readStdin(): Promise<string> {
    return this.stdinText;
  }

  async readFile(file: string): Promise<string> {
    const content = this.files[file];
    if (content === undefined) throw new Error(`ENOENT: ${file}`);
    return content;
  }
}

const fetcher: HtmlFetcher = async (url) =>
  url === ITEM
    ? { url, status: 200, body: '<html><body><h1>Lamp</h1></body></html>', setCookies: [] }
    : { url, status: 404, body: '', setCookies: [] };

describe('cli', () => {
  let cwd: string;
  let config: AgentConfigInput;

  const run = (argv: string[], io: MemoryIO, overrides: AgentConfigInput = config) =>
    runCli(argv, io, { config: overrides, fetcher, cwd });

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'mendscrape-cli-'));
    config = { browser: { engine: 'static' }, log: { level: 'silent' } };
  });

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true });
  });

  describe('usage', () => {
    it('should print help', async () => {
      const io = new MemoryIO();
      await expect(run(['--help'], io)).resolves.toBe(0);
      expect(io.out).toBe(USAGE);
    });

    it('should require a command', async () => {
      const io = new MemoryIO();
      await expect(run([], io)).resolves.toBe(2);
      expect(io.err).toBe(`Missing command\n\n${USAGE}`);
      expect(io.out).toBe('');
    });

    it('should reject an unknown command', async () => {
      const io = new MemoryIO();
      await expect(run(['launch'], io)).resolves.toBe(2);
      expect(io.err.startsWith('Unknown command: launch\n')).toBe(true);
    });

    it('should require a task for run', async () => {
      const io = new MemoryIO();
      await expect(run(['run'], io)).resolves.toBe(2);
      expect(io.err.startsWith('run requires --task <file|->\n')).toBe(true);
    });

    it('should reject unknown options', async () => {
      const io = new MemoryIO();
      await expect(run(['run', '--task', 'task.json', '--bogus'], io)).resolves.toBe(2);
      expect(io.out).toBe('');
    });

    it('should reject extra arguments', async () => {
      const io = new MemoryIO();
      await expect(run(['run', 'extra', '--task', 'task.json'], io)).resolves.toBe(2);
      expect(io.err.startsWith('Unexpected argument: extra\n')).toBe(true);
    });
  });

  it('should print a sample configuration with the defaults', async () => {
    const io = new MemoryIO();
    await expect(run(['sample-config'], io)).resolves.toBe(0);
    expect(yaml.load(io.out)).toEqual(parseConfig({}));
  });

  describe('run', () => {
    it('should run a task file and print the result as one JSON line', async () => {
      const io = new MemoryIO({ 'task.json': JSON.stringify(NAVIGATE_TASK) });

      await expect(run(['run', '--task', 'task.json'], io)).resolves.toBe(0);
      expect(io.out).toBe(`${JSON.stringify(NAVIGATE_RESULT)}\n`);
    });

    it('should read the task from stdin and indent with --pretty', async () => {
      const io = new MemoryIO({}, JSON.stringify(NAVIGATE_TASK));

      await expect(run(['run', '-t', '-', '--pretty'], io)).resolves.toBe(0);
      expect(io.out).toBe(`${JSON.stringify(NAVIGATE_RESULT, null, 2)}\n`);
    });

    it('should exit with 1 when the task fails', async () => {
      const io = new MemoryIO({
        'task.json': JSON.stringify({ action: 'navigate', target: { url: 'https://shop.example/gone' } }),
      });

      await expect(run(['run', '--task', 'task.json'], io)).resolves.toBe(1);
      expect(JSON.parse(io.out)).toMatchObject({ status: 'error', error: { kind: 'navigation_error' } });
    });

    it('should report a missing task file as an invalid task', async () => {
      const io = new MemoryIO();
      await expect(run(['run', '--task', 'missing.json'], io)).resolves.toBe(1);
      expect(JSON.parse(io.out)).toEqual({
        status: 'error',
        error: { kind: 'invalid_task', message: 'Cannot read task: ENOENT: missing.json', retryable: false },
      });
      expect(io.err).toBe('');
    });

    it('should report a task that is not JSON as an invalid task', async () => {
      const io = new MemoryIO({ 'task.json': '{ action: navigate' });
      await expect(run(['run', '--task', 'task.json'], io)).resolves.toBe(1);
      const envelope: unknown = JSON.parse(io.out);
      expect(envelope).toMatchObject({ status: 'error', error: { kind: 'invalid_task', retryable: false } });
      expect(io.out.startsWith('{"status":"error","error":{"kind":"invalid_task","message":"Cannot read task: ')).toBe(
        true
      );
    });

    it('should report an invalid configuration as a task error', async () => {
      const io = new MemoryIO({ 'task.json': JSON.stringify(NAVIGATE_TASK) });

      await expect(run(['run', '--task', 'task.json'], io, { browser: { max_tabs: 0 } })).resolves.toBe(1);
      expect(JSON.parse(io.out)).toMatchObject({ status: 'error', error: { kind: 'invalid_config' } });
    });
  });
});
