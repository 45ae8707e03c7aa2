/**
 * Command line front end.
 *
 *   mendscrape run --task <file|-> [--config path] [--pretty]
 *   mendscrape sample-config
 *
 * The task result is the only thing written to stdout; a task file that
 * cannot be read or parsed is reported there as an `invalid_task` error.
 * Exit codes: 0 when the task status is ok, 1 when it is error, 2 for usage
 * errors.
 */

import { promises as fs } from 'fs';
import { parseArgs } from 'util';
import { createAgent, type CreateAgentOptions } from './sdk.js';
import { generateSampleConfig } from './utils/config-loader.js';
import { TaskValidationError, toTaskError } from './types/errors.js';
import { logger } from './utils/logger.js';

const log = logger.cli;

export const EXIT_OK = 0;
export const EXIT_TASK_FAILED = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage:
  mendscrape run --task <file|-> [--config <path>] [--pretty]
  mendscrape sample-config

Options:
  -t, --task     Task JSON file, or - to read it from stdin
  -c, --config   Configuration file (YAML or JSON)
  -p, --pretty   Indent the JSON result
  -h, --help     Show this help
`;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<string>;
  readFile(path: string): Promise<string>;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  readStdin: async () => {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf-8');
  },
  readFile: (path) => fs.readFile(path, 'utf-8'),
};

type ParsedCli =
  | { command: 'help' }
  | { command: 'sample-config' }
  | { command: 'run'; task: string; config?: string; pretty: boolean };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseCli(argv: string[]): ParsedCli {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        task: { type: 'string', short: 't' },
        config: { type: 'string', short: 'c' },
        pretty: { type: 'boolean', short: 'p', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  const { values, positionals } = parsed;
  if (values.help) return { command: 'help' };

  const [command, ...rest] = positionals;
  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument: ${rest[0]}`);
  }

  switch (command) {
    case 'sample-config':
      return { command: 'sample-config' };
    case 'run':
      if (!values.task) throw new UsageError('run requires --task <file|->');
      return { command: 'run', task: values.task, config: values.config, pretty: values.pretty ?? false };
    case undefined:
      throw new UsageError('Missing command');
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

/**
 * Run the CLI and return the exit code.
 */
export async function runCli(
  argv: string[],
  io: CliIO = processIO,
  agentOptions: Omit<CreateAgentOptions, 'configPath'> = {}
): Promise<number> {
  let cli: ParsedCli;
  try {
    cli = parseCli(argv);
  } catch (error) {
    io.stderr(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (cli.command === 'help') {
    io.stdout(USAGE);
    return EXIT_OK;
  }
  if (cli.command === 'sample-config') {
    io.stdout(generateSampleConfig());
    return EXIT_OK;
  }

  const indent = cli.pretty ? 2 : undefined;
  const emit = (value: unknown) => io.stdout(`${JSON.stringify(value, null, indent)}\n`);

  let task: unknown;
  try {
    const raw = cli.task === '-' ? await io.readStdin() : await io.readFile(cli.task);
    task = JSON.parse(raw);
  } catch (error) {
    const message = `Cannot read task: ${error instanceof Error ? error.message : String(error)}`;
    emit({ status: 'error', error: toTaskError(new TaskValidationError(message)) });
    return EXIT_TASK_FAILED;
  }

  let agent;
  try {
    agent = await createAgent({ ...agentOptions, configPath: cli.config });
  } catch (error) {
    emit({ status: 'error', error: toTaskError(error) });
    return EXIT_TASK_FAILED;
  }

  try {
    const result = await agent.run(task);
    emit(result);
    return result.status === 'ok' ? EXIT_OK : EXIT_TASK_FAILED;
  } finally {
    await agent.cleanup().catch((error: unknown) => {
      log.warn('Cleanup failed', { error: error instanceof Error ? error.message : String(error) });
    });
  }
}
