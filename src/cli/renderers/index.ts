/**
 * Central output dispatch for CLI commands.
 *
 * Commands hand a typed result to cliOutput(), which either renders it for a
 * human or wraps it in the JSON envelope, depending on the resolved format.
 * Confirmations go to stdout; failures go to stderr through cliError().
 */

import type { OutputFormat } from '../../types/config.js';
import type { Task } from '../../types/task.js';
import type { TodoError } from '../../core/errors.js';
import {
  renderAdd, renderList, renderComplete, renderDelete,
  type RenderOptions,
} from './tasks.js';

export type { RenderOptions };

/** Destination for CLI text. Chunks are written as given. */
export interface OutputWriter {
  out(text: string): void;
  err(text: string): void;
}

/** Writer bound to the process streams. */
export const processWriter: OutputWriter = {
  out: (text) => { process.stdout.write(text); },
  err: (text) => { process.stderr.write(text); },
};

/** Resolved output settings for one invocation. */
export interface OutputContext extends RenderOptions {
  format: OutputFormat;
  writer: OutputWriter;
}

/** Data produced by each command, keyed by command name. */
export type CommandResult =
  | { command: 'add'; data: { task: Task } }
  | { command: 'list'; data: { tasks: Task[]; total: number } }
  | { command: 'complete'; data: { task: Task } }
  | { command: 'delete'; data: { deletedTask: Task } };

function renderHuman(result: CommandResult, opts: RenderOptions): string {
  switch (result.command) {
    case 'add': return renderAdd(result.data);
    case 'list': return renderList(result.data, opts);
    case 'complete': return renderComplete(result.data);
    case 'delete': return renderDelete(result.data);
  }
}

/**
 * Write a command result to stdout in the resolved format.
 */
export function cliOutput(ctx: OutputContext, result: CommandResult): void {
  if (ctx.format === 'json') {
    ctx.writer.out(JSON.stringify({ success: true, data: result.data }) + '\n');
    return;
  }
  ctx.writer.out(renderHuman(result, ctx) + '\n');
}

/**
 * Write an error to stderr in the resolved format.
 * Human format prints `Error: <message>`.
 */
export function cliError(ctx: OutputContext, error: TodoError): void {
  if (ctx.format === 'json') {
    ctx.writer.err(JSON.stringify(error.toJSON()) + '\n');
    return;
  }
  ctx.writer.err(`Error: ${error.message}\n`);
}
