/**
 * CLI list command.
 */

import { Command } from 'commander';
import { listTasks } from '../../core/tasks/list.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { TaskFilter } from '../../types/task.js';
import { cliOutput } from '../renderers/index.js';
import type { CliRuntime, CommandContext } from '../context.js';

/**
 * Print tasks in collection order. Never writes the tasks file,
 * except where loading itself creates or resets it.
 */
export async function runList(ctx: CommandContext, filter: TaskFilter = 'all'): Promise<ExitCode> {
  const tasks = listTasks(await ctx.store.load(), filter);
  cliOutput(ctx.output, { command: 'list', data: { tasks, total: tasks.length } });
  return ExitCode.SUCCESS;
}

/**
 * Register the list command.
 */
export function registerListCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('list')
    .alias('ls')
    .description('List all tasks')
    .option('--pending', 'Show only tasks not yet completed')
    .option('--done', 'Show only completed tasks')
    .action(async (opts: { pending?: boolean; done?: boolean }) => {
      let filter: TaskFilter = 'all';
      if (opts.pending && !opts.done) filter = 'pending';
      if (opts.done && !opts.pending) filter = 'done';
      runtime.setExitCode(await runList(runtime.context(), filter));
    });
}
