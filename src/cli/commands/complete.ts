/**
 * CLI complete command.
 */

import { Command } from 'commander';
import { completeTask } from '../../core/tasks/complete.js';
import { taskNotFound } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliError, cliOutput } from '../renderers/index.js';
import type { CliRuntime, CommandContext } from '../context.js';
import { parseTaskId } from './task-id.js';

/**
 * Mark a task complete. A missing id is reported and nothing is saved.
 */
export async function runComplete(ctx: CommandContext, taskId: number): Promise<ExitCode> {
  return ctx.store.withLock(async () => {
    const tasks = await ctx.store.load();
    const task = completeTask(taskId, tasks);
    if (!task) {
      const err = taskNotFound(taskId);
      cliError(ctx.output, err);
      return err.code;
    }

    await ctx.store.save(tasks);
    getLogger('cli').info({ taskId }, 'task completed');

    cliOutput(ctx.output, { command: 'complete', data: { task } });
    return ExitCode.SUCCESS;
  });
}

/**
 * Register the complete command.
 */
export function registerCompleteCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('complete')
    .alias('done')
    .description('Mark a task as complete')
    .argument('<id>', 'Task ID to complete', parseTaskId)
    .action(async (taskId: number) => {
      runtime.setExitCode(await runComplete(runtime.context(), taskId));
    });
}
