/**
 * CLI add command.
 */

import { Command } from 'commander';
import { addTask } from '../../core/tasks/add.js';
import { getLogger } from '../../core/logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliOutput } from '../renderers/index.js';
import type { CliRuntime, CommandContext } from '../context.js';

/**
 * Add a task and report its assigned id.
 */
export async function runAdd(ctx: CommandContext, text: string): Promise<ExitCode> {
  return ctx.store.withLock(async () => {
    const tasks = await ctx.store.load();
    const task = addTask(text, tasks);
    await ctx.store.save(tasks);
    getLogger('cli').info({ taskId: task.id }, 'task added');

    cliOutput(ctx.output, { command: 'add', data: { task } });
    return ExitCode.SUCCESS;
  });
}

/**
 * Register the add command.
 */
export function registerAddCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('add <text>')
    .description('Add a new task')
    .action(async (text: string) => {
      runtime.setExitCode(await runAdd(runtime.context(), text));
    });
}
