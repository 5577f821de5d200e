/**
 * condaci command-line program
 *
 * Commands:
 *   condaci setup --url <url> [--channel <name>]
 *   condaci build [--path <path>] [--user <name>] [--key <secret>]
 *
 * Global options: --json, --log-file <path>, --quiet
 *
 * Options follow the mode they belong to (`condaci setup --url <url>`);
 * the global options may go on either side of it.
 *
 * Exit codes:
 *   0 — success (including builds that skip the upload, --help, --version)
 *   2 — validation or configuration error, including unknown modes and options
 *   3 — an external command failed
 *   4 — unexpected bug
 */

import { Command, type CommanderError } from 'commander';
import { readCiState } from './ci/index.js';
import { loadToolConfig } from './config/index.js';
import { setupMiniconda } from './setup/index.js';
import { buildAndUpload } from './upload/index.js';
import {
  createErrorEnvelope,
  createLogger,
  exitCodeFor,
  runCommand,
  ValidationError,
  wrapError,
  type CommandRunner,
  type LineWriter,
  type RunnerErrorEnvelope,
  type StructuredLogger,
} from './runner/index.js';

export const VERSION = '0.1.0';

export interface ProgramDeps {
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  home?: string;
  stdout?: LineWriter;
  stderr?: LineWriter;
  exit?: (code: number) => never;
}

type GlobalOptions = {
  json?: boolean;
  logFile?: string;
  quiet?: boolean;
};

interface SetupCommandOptions {
  url?: string;
  channel?: string;
}

interface BuildCommandOptions {
  path?: string;
  user?: string;
  key?: string;
}

const writeStderr: LineWriter = (line) => {
  process.stderr.write(line + '\n');
};

export function createProgram(deps: ProgramDeps = {}): Command {
  const {
    runner = runCommand,
    env = process.env,
    home,
    stdout,
    stderr = writeStderr,
    exit = (code: number): never => process.exit(code),
  } = deps;

  const program = new Command();

  program
    .name('condaci')
    .description('Sets up Miniconda, builds conda packages and uploads them to binstar on CI')
    .version(VERSION)
    .option('--json', 'Emit structured JSON log lines to stderr')
    .option('--log-file <path>', 'Append structured JSON log lines to a file')
    .option('--quiet', 'Only print errors')
    // Inherited by the sub-commands declared below.
    .exitOverride((err) => exitOnParseError(err))
    .configureOutput({
      writeErr: (str) => stderr(str.trimEnd()),
      outputError: () => undefined,
    });

  function loggerFor(): StructuredLogger {
    const globals = program.opts<GlobalOptions>();
    return createLogger({
      module: 'condaci',
      filePath: globals.logFile,
      minLevel: env.DEBUG ? 'debug' : 'info',
      json: globals.json,
      echo: !globals.quiet,
      stdout,
      stderr,
    });
  }

  function exitWithEnvelope(envelope: RunnerErrorEnvelope, json?: boolean): never {
    if (json) {
      stderr(JSON.stringify({ error: envelope }, null, 2));
    } else {
      stderr(`Error [${envelope.code}]: ${envelope.userMessage}`);
      if (env.DEBUG && envelope.cause) {
        stderr(`  cause: ${envelope.cause}`);
      }
    }
    return exit(exitCodeFor(envelope.code));
  }

  /** Commander's own exits: help and version succeed, anything else is bad input. */
  function exitOnParseError(err: CommanderError): never {
    if (err.exitCode === 0) {
      return exit(0);
    }
    const message = err.code === 'commander.help'
      ? 'A mode is required: setup or build'
      : err.message.replace(/^error: /, '');
    return exitWithEnvelope(createErrorEnvelope('VALIDATION_ERROR', message), program.opts<GlobalOptions>().json);
  }

  function handleCliError(err: unknown, command: string, log: StructuredLogger): never {
    const envelope = wrapError(err);
    log.debug(`${command}.error`, envelope.userMessage, { code: envelope.code });
    return exitWithEnvelope(envelope, program.opts<GlobalOptions>().json);
  }

  // -------------------------------------------------------------------------
  // setup — install Miniconda and the build/upload plugins
  // -------------------------------------------------------------------------

  program
    .command('setup')
    .description('Install Miniconda, update conda and install conda-build and binstar')
    .addHelpText('after', '\nExample:\n  condaci setup --url https://repo.anaconda.com/miniconda/Miniconda3-latest-Linux-x86_64.sh -c my-channel\n')
    .option('--url <url>', 'URL to download the Miniconda installer from (required)')
    .option('-c, --channel <name>', 'Extra channel to add for dependencies')
    .action((options: SetupCommandOptions) => {
      const log = loggerFor();
      try {
        if (options.url === undefined) {
          throw new ValidationError('You must provide a miniconda URL for the setup command');
        }
        const config = loadToolConfig(env, home);
        setupMiniconda(options.url, { channel: options.channel, config, runner, log });
      } catch (err) {
        handleCliError(err, 'setup', log);
      }
    });

  // -------------------------------------------------------------------------
  // build — conda build, then upload when credentials and CI state allow
  // -------------------------------------------------------------------------

  program
    .command('build')
    .description('Build a conda recipe and upload the package to binstar')
    .addHelpText('after', '\nExample:\n  condaci build -p ./conda -u my-user -k "$BINSTAR_KEY"\n')
    .option('-p, --path <path>', 'Path to the conda recipe')
    .option('-u, --user <name>', 'binstar user to upload to (required to upload)')
    .option('-k, --key <secret>', 'binstar key for uploading (required to upload)')
    .action((options: BuildCommandOptions) => {
      const log = loggerFor();
      try {
        const config = loadToolConfig(env, home);
        buildAndUpload(options.path, {
          user: options.user,
          key: options.key,
          readCiState: () => readCiState(env),
          config,
          runner,
          log,
        });
      } catch (err) {
        handleCliError(err, 'build', log);
      }
    });

  return program;
}
