/**
 * CLI entry point: program construction and a testable run loop.
 *
 * runCli() never calls process.exit. It resolves to the exit code so the
 * bin script (main.ts) and tests can both drive it.
 */

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { registerAddCommand } from './commands/add.js';
import { registerListCommand } from './commands/list.js';
import { registerCompleteCommand } from './commands/complete.js';
import { registerDeleteCommand } from './commands/delete.js';
import { resolveFormat } from './middleware/output-format.js';
import { cliError, processWriter, type OutputWriter } from './renderers/index.js';
import { colorsSupported } from './renderers/colors.js';
import type { CliRuntime, CommandContext } from './context.js';
import { loadConfig } from '../core/config.js';
import { TodoError } from '../core/errors.js';
import { initLogger, silenceLogger } from '../core/logger.js';
import { getDataDir, getInstallDir, resolveDataPath } from '../core/paths.js';
import { TaskStore } from '../store/task-store.js';
import { ExitCode } from '../types/exit-codes.js';

/** Options for runCli. Everything defaults to the real process. */
export interface CliOptions {
  writer?: OutputWriter;
  env?: NodeJS.ProcessEnv;
  /** Overrides TODO_DATA_DIR and the install location. */
  dataDir?: string;
  /** Write pino logs under the data directory. Default: false, which discards logs. */
  fileLogging?: boolean;
  /** Force ANSI color on or off. Default: detected from env and stdout. */
  colors?: boolean;
}

const EXAMPLES = `
Examples:
  todo add "Buy milk"     Add a new task
  todo list               List all tasks
  todo complete 1         Mark task #1 as complete
  todo delete 1           Delete task #1
`;

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(getInstallDir(), 'package.json'), 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Build the commander program.
 * Output settings are configured before subcommands are added so they inherit them.
 */
export function createProgram(runtime: CliRuntime, writer: OutputWriter = processWriter): Command {
  const program = new Command();

  program
    .name('todo')
    .description('Manage your tasks from the command line')
    .version(getPackageVersion())
    .option('--json', 'Output in JSON format')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => writer.out(str),
      writeErr: (str) => writer.err(str),
    })
    .addHelpText('after', EXAMPLES);

  registerAddCommand(program, runtime);
  registerListCommand(program, runtime);
  registerCompleteCommand(program, runtime);
  registerDeleteCommand(program, runtime);

  return program;
}

/**
 * Parse arguments and run one command.
 *
 * @param argv - User arguments, without the node and script paths
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const writer = options.writer ?? processWriter;
  const env = options.env ?? process.env;
  // Filled in by the preAction hook.
  const state: { context: CommandContext | null; exitCode: number } = {
    context: null,
    exitCode: ExitCode.SUCCESS,
  };

  const runtime: CliRuntime = {
    context() {
      if (!state.context) throw new Error('Command context requested before preAction hook ran');
      return state.context;
    },
    setExitCode(code) {
      state.exitCode = code;
    },
  };

  const program = createProgram(runtime, writer);

  // Resolve config, logging and output format once, before the command runs.
  program.hook('preAction', async (thisCommand) => {
    const dataDir = options.dataDir ?? getDataDir(env);
    const config = await loadConfig(dataDir, env);
    if (options.fileLogging) {
      initLogger(dataDir, config.logging);
    } else {
      silenceLogger();
    }

    const format = resolveFormat(thisCommand.opts(), config.output.defaultFormat);
    state.context = {
      store: new TaskStore({
        filePath: resolveDataPath(dataDir, config.storage.fileName),
        lock: config.storage.lock,
        onDiagnostic: (message) => writer.err(message + '\n'),
      }),
      output: {
        format,
        writer,
        colors: options.colors ?? colorsSupported(env, process.stdout),
        unicode: config.output.showUnicode,
      },
    };
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version exit 0; every other commander exit is a usage error.
      return err.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.INVALID_INPUT;
    }
    if (err instanceof TodoError) {
      if (state.context) {
        cliError(state.context.output, err);
      } else {
        writer.err(`Error: ${err.message}\n`);
      }
      return err.code;
    }
    throw err;
  }

  return state.exitCode;
}
