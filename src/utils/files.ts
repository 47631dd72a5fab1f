import { DeviceCommandResult } from '../types';
import { CommandRunner, escapeShellArg } from './adb';
import { pickDevice } from './devices';

/**
 * Build the adb arguments for a shell passthrough. With `root` the joined
 * command runs as a single `su -c` script.
 */
export function buildShellArgs(command: readonly string[], root = false): string[] {
  if (root) {
    return ['shell', 'su', '-c', escapeShellArg(command.join(' '))];
  }
  return ['shell', ...command];
}

export function runShell(
  runner: CommandRunner,
  command: readonly string[],
  options: { root?: boolean; serial?: string } = {}
): DeviceCommandResult {
  const deviceId = pickDevice(runner, options.serial);
  return { deviceId, ...runner.run(buildShellArgs(command, options.root), { serial: deviceId }) };
}

export function pullFile(
  runner: CommandRunner,
  remote: string,
  local = '.',
  serial?: string
): DeviceCommandResult {
  const deviceId = pickDevice(runner, serial);
  return { deviceId, ...runner.run(['pull', remote, local], { serial: deviceId }) };
}

export function pushFile(
  runner: CommandRunner,
  local: string,
  remote: string,
  serial?: string
): DeviceCommandResult {
  const deviceId = pickDevice(runner, serial);
  return { deviceId, ...runner.run(['push', local, remote], { serial: deviceId }) };
}
