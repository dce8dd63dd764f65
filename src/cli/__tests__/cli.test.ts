/**
 * End-to-end tests for runCli: argument parsing, config, output and exit codes.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runCli, type CliOptions } from '../index.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../../core/logger.js';

let dataDir: string;
let out: string[];
let err: string[];

function run(argv: string[], env: NodeJS.ProcessEnv = {}): Promise<number> {
  const options: CliOptions = {
    dataDir,
    env,
    colors: false,
    writer: {
      out: (text) => { out.push(text); },
      err: (text) => { err.push(text); },
    },
  };
  return runCli(argv, options);
}

function reset(): void {
  out = [];
  err = [];
}

beforeEach(async () => {
  dataDir = await mkdtemp(join(tmpdir(), 'todo-cli-'));
  reset();
});

afterEach(async () => {
  await rm(dataDir, { recursive: true, force: true });
});

describe('runCli task lifecycle', () => {
  it('adds, lists, completes and deletes a task', async () => {
    expect(await run(['add', 'Buy milk'])).toBe(ExitCode.SUCCESS);
    expect(out).toEqual(['Added task #1: Buy milk\n']);

    const saved: unknown = JSON.parse(await readFile(join(dataDir, 'tasks.json'), 'utf-8'));
    expect(saved).toMatchObject([{ id: 1, text: 'Buy milk', completed: false }]);

    reset();
    expect(await run(['list'])).toBe(ExitCode.SUCCESS);
    expect(out.join('')).toMatch(/^\[1\] \[ \] Buy milk \(\d{4}-\d{2}-\d{2} \d{2}:\d{2}\)\n$/);

    reset();
    expect(await run(['complete', '1'])).toBe(ExitCode.SUCCESS);
    expect(out).toEqual(['Marked task #1 as complete\n']);

    reset();
    await run(['list']);
    expect(out.join('')).toMatch(/^\[1\] \[✓\] Buy milk \(/);

    reset();
    expect(await run(['delete', '1'])).toBe(ExitCode.SUCCESS);
    expect(out).toEqual(['Deleted task #1\n']);

    reset();
    await run(['list']);
    expect(out).toEqual(['No tasks found.\n']);
    expect(err).toEqual([]);
  });

  it('exits 1 naming the id when completing a missing task', async () => {
    expect(await run(['complete', '99'])).toBe(ExitCode.NOT_FOUND);
    expect(out).toEqual([]);
    expect(err).toEqual(['Error: Task #99 not found\n']);
    expect(await readFile(join(dataDir, 'tasks.json'), 'utf-8')).toBe('[]\n');
  });

  it('reports id 0 as not found', async () => {
    await run(['add', 'Buy milk']);
    reset();
    expect(await run(['complete', '0'])).toBe(ExitCode.NOT_FOUND);
    expect(err).toEqual(['Error: Task #0 not found\n']);

    reset();
    expect(await run(['delete', '0'])).toBe(ExitCode.NOT_FOUND);
    expect(err).toEqual(['Error: Task #0 not found\n']);
  });

  it('keeps every task when one has a bad created_at', async () => {
    await writeFile(join(dataDir, 'tasks.json'), JSON.stringify([
      { id: 1, text: 'Buy milk', completed: false, created_at: '2026-01-01T10:00:00' },
      { id: 2, text: 'Call mom', completed: false, created_at: null },
    ]));
    expect(await run(['list'])).toBe(ExitCode.SUCCESS);
    expect(out).toEqual(['[1] [ ] Buy milk (2026-01-01 10:00)\n[2] [ ] Call mom (Unknown)\n']);
    expect(err).toEqual([]);
  });

  it('accepts command aliases', async () => {
    await run(['add', 'Read']);
    reset();
    expect(await run(['done', '1'])).toBe(ExitCode.SUCCESS);
    expect(await run(['ls', '--done'])).toBe(ExitCode.SUCCESS);
    expect(await run(['rm', '1'])).toBe(ExitCode.SUCCESS);
    expect(out[0]).toBe('Marked task #1 as complete\n');
    expect(out[1]).toMatch(/^\[1\] \[✓\] Read \(/);
    expect(out[2]).toBe('Deleted task #1\n');
  });

  it('filters the list', async () => {
    await run(['add', 'a']);
    await run(['add', 'b']);
    await run(['complete', '2']);
    reset();

    await run(['list', '--pending']);
    expect(out.join('')).toMatch(/^\[1\] \[ \] a \([^)]+\)\n$/);

    reset();
    await run(['list', '--pending', '--done']);
    expect(out.join('').split('\n')).toHaveLength(3);
  });

  it('recovers from a corrupted tasks file', async () => {
    await writeFile(join(dataDir, 'tasks.json'), '{ not json');
    expect(await run(['list'])).toBe(ExitCode.SUCCESS);
    expect(err).toHaveLength(1);
    expect(err[0]).toMatch(/^Error: Corrupted tasks file detected \(.+\)\. Reinitializing\.\.\.\n$/);
    expect(out).toEqual(['No tasks found.\n']);
    expect(await readFile(join(dataDir, 'tasks.json'), 'utf-8')).toBe('[]\n');
    // Without file logging, log records go nowhere rather than to stderr.
    expect(getLogger('store').level).toBe('silent');
  });
});

describe('runCli --json', () => {
  it('writes success envelopes to stdout', async () => {
    expect(await run(['--json', 'add', 'Ship it'])).toBe(ExitCode.SUCCESS);
    expect(JSON.parse(out.join(''))).toMatchObject({
      success: true,
      data: { task: { id: 1, text: 'Ship it', completed: false } },
    });
  });

  it('writes error envelopes to stderr with the same exit code', async () => {
    expect(await run(['--json', 'delete', '5'])).toBe(ExitCode.NOT_FOUND);
    expect(out).toEqual([]);
    expect(JSON.parse(err.join(''))).toEqual({
      success: false,
      error: {
        code: 1,
        name: 'NOT_FOUND',
        message: 'Task #5 not found',
        fix: "Run 'todo list' to see existing task ids",
      },
    });
  });

  it('uses the configured default format', async () => {
    expect(await run(['list'], { TODO_FORMAT: 'json' })).toBe(ExitCode.SUCCESS);
    expect(JSON.parse(out.join(''))).toEqual({ success: true, data: { tasks: [], total: 0 } });
  });
});

describe('runCli usage errors', () => {
  it('rejects a non-numeric id with exit 2', async () => {
    expect(await run(['complete', 'abc'])).toBe(ExitCode.INVALID_INPUT);
    expect(err.join('')).toContain('Task ID must be an integer.');
    expect(existsSync(join(dataDir, 'tasks.json'))).toBe(false);
  });

  it('rejects a missing argument with exit 2', async () => {
    expect(await run(['add'])).toBe(ExitCode.INVALID_INPUT);
    expect(err.join('')).toContain("missing required argument 'text'");
  });

  it('rejects extra arguments with exit 2', async () => {
    expect(await run(['add', 'Buy', 'milk'])).toBe(ExitCode.INVALID_INPUT);
    expect(err.join('')).toContain('too many arguments');
    expect(out).toEqual([]);
    expect(existsSync(join(dataDir, 'tasks.json'))).toBe(false);
  });

  it('rejects an unknown command with exit 2', async () => {
    expect(await run(['frobnicate'])).toBe(ExitCode.INVALID_INPUT);
    expect(err.join('')).toContain("unknown command 'frobnicate'");
  });

  it('exits 0 for --help and --version', async () => {
    expect(await run(['--help'])).toBe(ExitCode.SUCCESS);
    expect(out.join('')).toContain('Examples:');

    reset();
    expect(await run(['--version'])).toBe(ExitCode.SUCCESS);
    expect(out).toEqual(['1.0.0\n']);
  });
});

describe('runCli configuration', () => {
  it('reads the tasks file name from the config file', async () => {
    await writeFile(join(dataDir, 'todo.config.json'), JSON.stringify({ storage: { fileName: 'work.json' } }));
    await run(['add', 'Review']);
    expect(existsSync(join(dataDir, 'work.json'))).toBe(true);
    expect(existsSync(join(dataDir, 'tasks.json'))).toBe(false);
  });

  it('lets environment variables override the config file', async () => {
    await writeFile(join(dataDir, 'todo.config.json'), JSON.stringify({ output: { showUnicode: true } }));
    await run(['add', 'x']);
    await run(['complete', '1']);
    reset();
    await run(['list'], { TODO_OUTPUT_SHOW_UNICODE: 'false' });
    expect(out.join('')).toMatch(/^\[1\] \[x\] x \(/);
  });

  it('runs commands under the file lock when enabled', async () => {
    expect(await run(['add', 'Locked'], { TODO_STORAGE_LOCK: 'true' })).toBe(ExitCode.SUCCESS);
    expect(out).toEqual(['Added task #1: Locked\n']);
    expect(existsSync(join(dataDir, 'tasks.json.lock'))).toBe(false);
  });

  it('creates a missing data directory when locking', async () => {
    const nested = join(dataDir, 'sub');
    const code = await runCli(['add', 'x'], {
      dataDir: nested,
      env: { TODO_STORAGE_LOCK: 'true' },
      colors: false,
      writer: { out: (text) => { out.push(text); }, err: (text) => { err.push(text); } },
    });
    expect(code).toBe(ExitCode.SUCCESS);
    expect(out).toEqual(['Added task #1: x\n']);
    expect(existsSync(join(nested, 'tasks.json'))).toBe(true);
  });

  it('exits 8 on an unreadable config file', async () => {
    await writeFile(join(dataDir, 'todo.config.json'), '{ broken');
    expect(await run(['list'])).toBe(ExitCode.CONFIG_ERROR);
    expect(err).toEqual([`Error: Invalid JSON in: ${join(dataDir, 'todo.config.json')}\n`]);
    expect(out).toEqual([]);
  });

  it('exits 8 on a config value of the wrong type', async () => {
    expect(await run(['list'], { TODO_FORMAT: 'xml' })).toBe(ExitCode.CONFIG_ERROR);
    expect(err.join('')).toMatch(/^Error: Invalid configuration \(output\.defaultFormat: /);
  });
});
