#!/usr/bin/env node

import cac from 'cac';
import { ArchiveError } from 'slotpak-protocol';
import { createConsoleLogger, parseLogLevel } from 'slotpak-db';
import {
  CommandContext,
  CommandError,
  addCommand,
  compressCommand,
  extractCommand,
  infoCommand,
  listCommand,
  removeCommand,
  renameCommand,
  repackCommand,
} from './commands';

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
  readonly env: Record<string, string | undefined>;
  readonly cwd: string;
}

interface Flags {
  long: boolean;
  compress: boolean;
  overwrite: boolean;
  repack: boolean;
  level?: number;
}

interface CommandDefinition {
  usage: string;
  minArgs: number;
  maxArgs: number;
  flags: ReadonlyArray<keyof Flags>;
  run(ctx: CommandContext, args: string[], flags: Flags): Promise<void> | void;
}

const COMMANDS: Record<string, CommandDefinition> = {
  list: {
    usage: 'list <archive> [--long]',
    minArgs: 1,
    maxArgs: 1,
    flags: ['long'],
    run: (ctx, [archive], flags) => listCommand(ctx, archive, flags.long),
  },
  info: {
    usage: 'info <archive>',
    minArgs: 1,
    maxArgs: 1,
    flags: [],
    run: (ctx, [archive]) => infoCommand(ctx, archive),
  },
  extract: {
    usage: 'extract <archive> <outdir> [names...]',
    minArgs: 2,
    maxArgs: Infinity,
    flags: [],
    run: (ctx, [archive, outdir, ...names]) => extractCommand(ctx, archive, outdir, names),
  },
  add: {
    usage: 'add <archive> <paths...> [--compress] [--level N] [--overwrite] [--repack]',
    minArgs: 2,
    maxArgs: Infinity,
    flags: ['compress', 'level', 'overwrite', 'repack'],
    run: (ctx, [archive, ...inputs], flags) => addCommand(ctx, archive, inputs, flags),
  },
  remove: {
    usage: 'remove <archive> <names...>',
    minArgs: 2,
    maxArgs: Infinity,
    flags: [],
    run: (ctx, [archive, ...names]) => removeCommand(ctx, archive, names),
  },
  rename: {
    usage: 'rename <archive> <from> <to> [--overwrite]',
    minArgs: 3,
    maxArgs: 3,
    flags: ['overwrite'],
    run: (ctx, [archive, from, to], flags) => renameCommand(ctx, archive, from, to, flags.overwrite),
  },
  repack: {
    usage: 'repack <archive>',
    minArgs: 1,
    maxArgs: 1,
    flags: [],
    run: (ctx, [archive]) => repackCommand(ctx, archive),
  },
  compress: {
    usage: 'compress <archive> [--level N]',
    minArgs: 1,
    maxArgs: 1,
    flags: ['level'],
    run: (ctx, [archive], flags) => compressCommand(ctx, archive, flags.level),
  },
};

const GLOBAL_OPTIONS = new Set(['verbose', 'help', 'h']);

export function usage(): string {
  return [
    'Usage: slotpak <command> [options]',
    '',
    'Commands:',
    ...Object.values(COMMANDS).map(command => `  ${command.usage}`),
    '',
    'Options:',
    '  --verbose   log every archive operation to stderr',
    '  -h, --help  show this message',
    '',
    'SLOTPAK_LOG sets the log level: silent, error, warn, info or debug.',
  ].join('\n');
}

function parseLevel(raw: unknown): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const level = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number(raw) : NaN;
  if (!Number.isInteger(level) || level < 0 || level > 9) {
    throw new CommandError('Usage', `--level takes an integer from 0 to 9, got '${String(raw)}'`);
  }
  return level;
}

function parseCommandLine(args: string[]) {
  const cli = cac('slotpak');
  cli.option('--long', 'Show sizes and compression');
  cli.option('--compress', 'Deflate added entries');
  cli.option('--level <n>', 'Deflate level, 0-9');
  cli.option('--overwrite', 'Replace existing entries');
  cli.option('--repack', 'Repack after adding');
  cli.option('--verbose', 'Debug logging');
  cli.option('-h, --help', 'Show help');

  const parsed = cli.parse(['node', 'slotpak', ...args], { run: false });
  const options: Record<string, unknown> = { ...parsed.options };
  delete options['--'];
  return { positionals: [...parsed.args], options };
}

export function describeFailure(error: unknown): string {
  if (error instanceof ArchiveError || error instanceof CommandError) {
    return `${error.code}: ${error.message}`;
  }
  // fs errors may come from another realm, so `instanceof Error` is not reliable here.
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    const message = error.message;
    if ('code' in error && typeof error.code === 'string') {
      return message.startsWith(`${error.code}:`) ? message : `${error.code}: ${message}`;
    }
    const name = 'name' in error && typeof error.name === 'string' ? error.name : 'Error';
    return `${name}: ${message}`;
  }
  return String(error);
}

/** Runs one command line and resolves to the process exit status. */
export async function run(args: string[], io: CliIo): Promise<number> {
  try {
    const { positionals, options } = parseCommandLine(args);
    const [name, ...rest] = positionals;

    if (options.help === true) {
      io.stdout(usage());
      return 0;
    }
    if (name === undefined) {
      io.stderr(usage());
      return 1;
    }
    const command = Object.prototype.hasOwnProperty.call(COMMANDS, name) ? COMMANDS[name] : undefined;
    if (!command) {
      throw new CommandError('Usage', `Unknown command '${name}'`);
    }
    for (const [key, value] of Object.entries(options)) {
      if (value === undefined || value === false) {
        continue;
      }
      if (!GLOBAL_OPTIONS.has(key) && !command.flags.some(flag => flag === key)) {
        throw new CommandError('Usage', `Option '--${key}' does not apply to '${name}'`);
      }
    }
    if (rest.length < command.minArgs || rest.length > command.maxArgs) {
      throw new CommandError('Usage', `slotpak ${command.usage}`);
    }

    const level = options.verbose === true ? 'debug' : parseLogLevel(io.env.SLOTPAK_LOG, 'warn');
    const ctx: CommandContext = {
      cwd: io.cwd,
      logger: createConsoleLogger('slotpak', level, io.stderr),
      stdout: io.stdout,
    };
    await command.run(ctx, rest.map(String), {
      long: options.long === true,
      compress: options.compress === true,
      overwrite: options.overwrite === true,
      repack: options.repack === true,
      level: parseLevel(options.level),
    });
    return 0;
  } catch (error) {
    io.stderr(`error: ${describeFailure(error)}`);
    return 1;
  }
}

if (require.main === module) {
  run(process.argv.slice(2), {
    stdout: line => process.stdout.write(`${line}\n`),
    stderr: line => process.stderr.write(`${line}\n`),
    env: process.env,
    cwd: process.cwd(),
  }).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
