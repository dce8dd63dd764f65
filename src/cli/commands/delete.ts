/**
 * CLI delete command.
 */

import { Command } from 'commander';
import { deleteTask } from '../../core/tasks/delete.js';
import { taskNotFound } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliError, cliOutput } from '../renderers/index.js';
import type { CliRuntime, CommandContext } from '../context.js';
import { parseTaskId } from './task-id.js';

/**
 * Delete a task. A missing id is reported and nothing is saved.
 */
export async function runDelete(ctx: CommandContext, taskId: number): Promise<ExitCode> {
  return ctx.store.withLock(async () => {
    const tasks = await ctx.store.load();
    const deletedTask = deleteTask(taskId, tasks);
    if (!deletedTask) {
      const err = taskNotFound(taskId);
      cliError(ctx.output, err);
      return err.code;
    }

    await ctx.store.save(tasks);
    getLogger('cli').info({ taskId }, 'task deleted');

    cliOutput(ctx.output, { command: 'delete', data: { deletedTask } });
    return ExitCode.SUCCESS;
  });
}

/**
 * Register the delete command.
 */
export function registerDeleteCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('delete')
    .alias('rm')
    .description('Delete a task')
    .argument('<id>', 'Task ID to delete', parseTaskId)
    .action(async (taskId: number) => {
      runtime.setExitCode(await runDelete(runtime.context(), taskId));
    });
}
