/**
 * Launch collaborator: turns a launch target into an argv and spawns it
 * detached from the launcher, so the launched program outlives it.
 */

import { spawn } from 'child_process';
import { parseExecCommand } from './command-line.js';
import { LaunchError, describeError } from './errors.js';
import { createLogger } from './logger.js';
import type { LaunchMode, LaunchTarget } from './types.js';

const log = createLogger('Launcher');

export interface LaunchCommands {
  terminalCommand: readonly string[];
  editorCommand: readonly string[];
}

export type Spawner = (argv: string[]) => Promise<void>;

function requireTerminal(commands: LaunchCommands): string[] {
  const terminal = commands.terminalCommand.filter(Boolean);
  if (terminal.length === 0) {
    throw new LaunchError('No terminal command is configured (settings: terminalCommand)');
  }
  return terminal;
}

export function buildLaunchCommand(target: LaunchTarget, mode: LaunchMode | null, commands: LaunchCommands): string[] {
  if (target.kind === 'path') {
    const editor = commands.editorCommand.filter(Boolean);
    if (editor.length === 0) {
      throw new LaunchError('No editor command is configured (settings: editorCommand)');
    }
    return [...requireTerminal(commands), ...editor, target.absolutePath];
  }

  const argv = parseExecCommand(target.exec);
  if (argv.length === 0) {
    throw new LaunchError(`${target.name} has an empty command line`);
  }
  if (mode === 'terminal') return [...requireTerminal(commands), ...argv];
  return argv;
}

export const spawnDetached: Spawner = (argv) => {
  return new Promise<void>((resolve, reject) => {
    const [command, ...args] = argv;
    if (!command) {
      reject(new LaunchError('Nothing to launch'));
      return;
    }

    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', (error) => {
      reject(new LaunchError(`Failed to start ${command}: ${describeError(error)}`, { cause: error }));
    });
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
};

export function createLauncher(
  commands: LaunchCommands,
  spawner: Spawner = spawnDetached
): (target: LaunchTarget, mode: LaunchMode | null) => Promise<void> {
  return async (target, mode) => {
    const argv = buildLaunchCommand(target, mode, commands);
    log.info(`Launching: ${argv.join(' ')}`);
    await spawner(argv);
  };
}
