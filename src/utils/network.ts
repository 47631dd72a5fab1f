import { CommandResult, DeviceCommandResult } from '../types';
import { CommandRunner } from './adb';
import { pickDevice } from './devices';

export const DEFAULT_TCPIP_PORT = 5555;

// Restart adbd on the device listening on a TCP port
export function enableTcpip(
  runner: CommandRunner,
  port: number = DEFAULT_TCPIP_PORT,
  serial?: string
): DeviceCommandResult {
  const deviceId = pickDevice(runner, serial);
  return { deviceId, ...runner.run(['tcpip', String(port)], { serial: deviceId }) };
}

export function connectTcpip(
  runner: CommandRunner,
  host: string,
  port: number = DEFAULT_TCPIP_PORT
): CommandResult {
  return runner.run(['connect', `${host}:${port}`]);
}

// Back to USB mode; adb picks the device itself
export function disableTcpip(runner: CommandRunner): CommandResult {
  return runner.run(['usb']);
}
