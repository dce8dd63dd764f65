/**
 * Per-invocation state shared by command handlers.
 */

import type { TaskStore } from '../store/task-store.js';
import type { ExitCode } from '../types/exit-codes.js';
import type { OutputContext } from './renderers/index.js';

/** What a handler needs to run: storage plus where and how to report. */
export interface CommandContext {
  store: TaskStore;
  output: OutputContext;
}

/**
 * Bridge between commander actions and the running CLI.
 * The context is built in the preAction hook, after flags and config are known.
 */
export interface CliRuntime {
  context(): CommandContext;
  setExitCode(code: ExitCode): void;
}
