/**
 * End-to-end tests for the hooktask CLI
 *
 * The hook manager is replaced by a recording runner; the utility guard
 * resolves against a temporary PATH holding stub executables.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Chalk } from 'chalk';
import { runCli, VERSION } from './program.js';
import { renderHelp } from './commands/help.js';
import { COMMANDS } from './command-table.js';
import { RecordingProcessRunner } from '../services/exec/recording-runner.js';
import { Logger, LogLevel } from '../core/logger.js';
import type { CliIO } from './utils/output.js';

const plain = new Chalk({ level: 0 });

const UNINSTALL = ['uninstall', '--hook-type', 'pre-commit', '--hook-type', 'commit-msg'];
const INSTALL = ['install', '--install-hooks', '--hook-type', 'pre-commit', '--hook-type', 'commit-msg'];

interface Harness {
  runner: RecordingProcessRunner;
  stdout: () => string;
  stderr: () => string;
  logs: string[];
  run: (...argv: string[]) => Promise<number>;
}

function argvOf(runner: RecordingProcessRunner): Array<{ command: string; args: string[] }> {
  return runner.calls.map(({ command, args }) => ({ command, args }));
}

describe('hooktask CLI', () => {
  let workDir: string;
  let binDir: string;
  let emptyDir: string;

  async function addExecutable(name: string): Promise<void> {
    const file = path.join(binDir, name);
    await fs.writeFile(file, '#!/bin/sh\nexit 0\n');
    await fs.chmod(file, 0o755);
  }

  function harness(
    exitCodes: Partial<Record<string, number>> = {},
    pathDir: string = binDir,
    extraEnv: Record<string, string> = {}
  ): Harness {
    const out: string[] = [];
    const err: string[] = [];
    const logs: string[] = [];
    const io: CliIO = {
      stdout: (text) => { out.push(text); },
      stderr: (text) => { err.push(text); }
    };
    const runner = new RecordingProcessRunner(exitCodes);
    const logger = new Logger({ level: LogLevel.WARN, write: line => logs.push(line) });

    return {
      runner,
      stdout: () => out.join(''),
      stderr: () => err.join(''),
      logs,
      run: (...argv) => runCli(argv, {
        io,
        style: plain,
        runner,
        env: { PATH: pathDir, ...extraEnv },
        cwd: workDir,
        logger
      })
    };
  }

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hooktask-work-'));
    binDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hooktask-bin-'));
    emptyDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hooktask-empty-'));
    await addExecutable('pre-commit');
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
    await fs.rm(binDir, { recursive: true, force: true });
    await fs.rm(emptyDir, { recursive: true, force: true });
  });

  describe('help', () => {
    it('should print help when no command is given', async () => {
      const h = harness();
      expect(await h.run()).toBe(0);
      expect(h.stdout()).toBe(renderHelp(COMMANDS, plain, 25));
      expect(h.runner.calls).toEqual([]);
    });

    it('should print the same listing for the help command', async () => {
      const h = harness();
      expect(await h.run('help')).toBe(0);
      expect(h.stdout()).toBe(renderHelp(COMMANDS, plain, 25));
    });

    it('should honour a configured column width', async () => {
      await fs.writeFile(path.join(workDir, '.hooktask.yaml'), 'helpColumnWidth: 30\n');
      const h = harness();
      expect(await h.run('help')).toBe(0);
      expect(h.stdout()).toBe(renderHelp(COMMANDS, plain, 30));
    });

    it('should print the same listing for -h and --help', async () => {
      for (const flag of ['-h', '--help']) {
        const h = harness();
        expect(await h.run(flag)).toBe(0);
        expect(h.stdout()).toBe(renderHelp(COMMANDS, plain, 25));
        expect(h.stderr()).toBe('');
      }
    });

    it('should show the listing instead of running a command given -h', async () => {
      const h = harness();
      expect(await h.run('run-hooks', '-h')).toBe(0);
      expect(h.stdout()).toBe(renderHelp(COMMANDS, plain, 25));
      expect(h.runner.calls).toEqual([]);
    });

    it('should print the version', async () => {
      const h = harness();
      expect(await h.run('--version')).toBe(0);
      expect(h.stdout()).toBe(`${VERSION}\n`);
    });
  });

  describe('check-utility-install', () => {
    it('should exit 0 silently for an installed utility', async () => {
      const h = harness();
      expect(await h.run('check-utility-install', 'UTILITY=pre-commit')).toBe(0);
      expect(h.stdout()).toBe('');
      expect(h.stderr()).toBe('');
    });

    it('should accept the bare name and the --utility option', async () => {
      const h = harness();
      expect(await h.run('check-utility-install', 'pre-commit')).toBe(0);
      expect(await h.run('check-utility-install', '--utility', 'pre-commit')).toBe(0);
      expect(h.stdout()).toBe('');
    });

    it('should exit 1 with an install hint for a missing utility', async () => {
      const h = harness();
      expect(await h.run('check-utility-install', 'UTILITY=this-tool-does-not-exist-9999')).toBe(1);
      expect(h.stdout()).toBe(
        '\nERROR. "this-tool-does-not-exist-9999" is required.\n' +
        'To install: uv tool install this-tool-does-not-exist-9999\n\n'
      );
    });

    it('should treat a missing name as not found', async () => {
      const h = harness();
      expect(await h.run('check-utility-install')).toBe(1);
      expect(h.stdout()).toBe('\nERROR. "" is required.\nTo install: uv tool install \n\n');
    });
  });

  describe('install-hooks', () => {
    it('should reinstall hooks and succeed when repeated', async () => {
      const h = harness();

      expect(await h.run('install-hooks')).toBe(0);
      expect(await h.run('install-hooks')).toBe(0);

      expect(argvOf(h.runner)).toEqual([
        { command: 'pre-commit', args: UNINSTALL },
        { command: 'pre-commit', args: INSTALL },
        { command: 'pre-commit', args: UNINSTALL },
        { command: 'pre-commit', args: INSTALL }
      ]);
    });

    it('should run the hook manager in the working directory and environment', async () => {
      const h = harness();

      expect(await h.run('install-hooks')).toBe(0);
      expect(h.runner.calls.map(call => call.options)).toEqual([
        { cwd: workDir, env: { PATH: binDir } },
        { cwd: workDir, env: { PATH: binDir } }
      ]);
    });

    it('should ignore uninstall failures', async () => {
      const h = harness({ uninstall: 1 });
      expect(await h.run('install-hooks')).toBe(0);
    });

    it('should use the hook manager named in the config file', async () => {
      await addExecutable('prek');
      await fs.writeFile(path.join(workDir, 'hooks.yaml'), 'hookManager: prek\nhookTypes: [pre-push]\n');
      const h = harness();

      expect(await h.run('--config', 'hooks.yaml', 'install-hooks')).toBe(0);
      expect(argvOf(h.runner)).toEqual([
        { command: 'prek', args: ['uninstall', '--hook-type', 'pre-push'] },
        { command: 'prek', args: ['install', '--install-hooks', '--hook-type', 'pre-push'] }
      ]);
    });
  });

  describe('init', () => {
    it('should install and then update', async () => {
      const h = harness();

      expect(await h.run('init')).toBe(0);
      expect(argvOf(h.runner)).toEqual([
        { command: 'pre-commit', args: UNINSTALL },
        { command: 'pre-commit', args: INSTALL },
        { command: 'pre-commit', args: ['autoupdate'] }
      ]);
      expect(h.stdout()).toBe('\nInstalling pre-commit hooks...\n\n\nUpdating pre-commit hooks...\n\n');
    });

    it('should run nothing when the hook manager is missing', async () => {
      const h = harness({}, emptyDir);

      expect(await h.run('init')).toBe(1);
      expect(h.runner.calls).toEqual([]);
      expect(h.stdout()).toBe('\nERROR. "pre-commit" is required.\nTo install: uv tool install pre-commit\n\n');
    });

    it('should stop at a failing install with its exit code', async () => {
      const h = harness({ install: 4 });

      expect(await h.run('init')).toBe(4);
      expect(h.runner.calls.map(call => call.args[0])).toEqual(['uninstall', 'install']);
    });

    it('should propagate a failing update', async () => {
      const h = harness({ autoupdate: 3 });
      expect(await h.run('init')).toBe(3);
    });
  });

  describe('update-hooks and run-hooks', () => {
    it('should run autoupdate', async () => {
      const h = harness();
      expect(await h.run('update-hooks')).toBe(0);
      expect(argvOf(h.runner)).toEqual([{ command: 'pre-commit', args: ['autoupdate'] }]);
    });

    it('should run hooks on staged changes', async () => {
      const h = harness({ run: 1 });
      expect(await h.run('run-hooks')).toBe(1);
      expect(argvOf(h.runner)).toEqual([{ command: 'pre-commit', args: ['run'] }]);
    });

    it('should not require the guard for hook runs', async () => {
      const h = harness({}, emptyDir);
      expect(await h.run('run-hooks')).toBe(0);
      expect(h.runner.calls).toHaveLength(1);
    });

    it('should make lint behave exactly like run-hooks-all', async () => {
      for (const exitCode of [0, 1, 2]) {
        const all = harness({ run: exitCode });
        const lint = harness({ run: exitCode });

        const allCode = await all.run('run-hooks-all');
        const lintCode = await lint.run('lint');

        expect(lintCode).toBe(allCode);
        expect(allCode).toBe(exitCode);
        expect(lint.runner.calls).toEqual(all.runner.calls);
        expect(argvOf(lint.runner)).toEqual([
          { command: 'pre-commit', args: ['run', '--all-files', '--color', 'always'] }
        ]);
      }
    });
  });

  describe('errors', () => {
    it('should reject unknown commands with a usage error', async () => {
      const h = harness();
      expect(await h.run('bogus')).toBe(2);
      expect(h.stderr()).toBe("Usage Error: Unknown command 'bogus'. See 'hooktask help'.\n");
    });

    it('should reject unknown options', async () => {
      const h = harness();
      expect(await h.run('run-hooks', '--bogus')).toBe(2);
      expect(h.runner.calls).toEqual([]);
    });

    it('should exit 78 on an invalid config file', async () => {
      await fs.writeFile(path.join(workDir, '.hooktask.yaml'), 'hookTypes: []\n');
      const h = harness();

      expect(await h.run('run-hooks')).toBe(78);
      expect(h.stderr()).toMatch(/^Configuration Error \(field: hookTypes\): /);
      expect(h.runner.calls).toEqual([]);
    });
  });

  describe('logging', () => {
    it('should log settings at debug level with --verbose', async () => {
      const h = harness();
      expect(await h.run('--verbose', 'run-hooks')).toBe(0);
      expect(h.logs[0]).toMatch(/^\[hooktask\] \[DEBUG\] Loaded settings /);
    });

    it('should take the level from HOOKTASK_LOG_LEVEL', async () => {
      const h = harness({}, binDir, { HOOKTASK_LOG_LEVEL: 'debug' });
      expect(await h.run('run-hooks')).toBe(0);
      expect(h.logs[0]).toMatch(/^\[hooktask\] \[DEBUG\] Loaded settings /);
    });

    it('should stay quiet by default', async () => {
      const h = harness();
      expect(await h.run('run-hooks')).toBe(0);
      expect(h.logs).toEqual([]);
    });
  });
});
