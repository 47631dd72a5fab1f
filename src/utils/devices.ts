import {
  AndroidDevice,
  CommandFailedError,
  DeviceDetails,
  DeviceNotFoundError,
  DeviceState,
  MultipleDevicesError,
  NoDevicesFoundError,
} from '../types';
import { CommandRunner } from './adb';
import { describeError } from './error';

// Stand-in serial printed by dry runs, which never query adb for devices
export const DRY_RUN_DEVICE = '<device>';

const DEVICE_STATES: readonly DeviceState[] = ['device', 'offline', 'unauthorized'];

function isDeviceState(value: string): value is DeviceState {
  return (DEVICE_STATES as readonly string[]).includes(value);
}

// Parse device list from `adb devices -l` output
export function parseDeviceList(output: string): AndroidDevice[] {
  const devices: AndroidDevice[] = [];

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();
    // Skip the header and daemon notices such as "* daemon started successfully"
    if (!line || line.toLowerCase().startsWith('list of devices') || line.startsWith('*')) {
      continue;
    }

    const parts = line.split(/\s+/);
    const [id, state] = parts;
    if (!id || !state || !isDeviceState(state)) {
      continue;
    }

    const device: AndroidDevice = { id, state };

    for (const part of parts.slice(2)) {
      if (part.startsWith('model:')) {
        device.model = part.substring(6);
      } else if (part.startsWith('transport_id:')) {
        device.transportId = part.substring(13);
      }
    }

    devices.push(device);
  }

  return devices;
}

function getProp(runner: CommandRunner, serial: string, name: string): string {
  return runner.run(['shell', 'getprop', name], { serial }).stdout.trim();
}

// Get list of attached devices, enriched with Android release and SDK level
export function listDevices(runner: CommandRunner): AndroidDevice[] {
  const { exitCode, stdout, stderr } = runner.run(['devices', '-l']);

  if (exitCode !== 0) {
    throw new CommandFailedError(`adb devices exited with code ${exitCode}: ${stderr.trim()}`, {
      exitCode,
    });
  }

  const devices = parseDeviceList(stdout);

  for (const device of devices) {
    if (device.state !== 'device') continue;

    try {
      device.android = getProp(runner, device.id, 'ro.build.version.release') || undefined;
      device.sdk = getProp(runner, device.id, 'ro.build.version.sdk') || undefined;
    } catch (error) {
      runner.logger.debug(`Failed to read properties of ${device.id}: ${describeError(error)}`);
    }
  }

  return devices;
}

/**
 * Choose the device a command targets. An explicit serial must be online;
 * without one, exactly one online device is required.
 */
export function pickDevice(runner: CommandRunner, preferredSerial?: string): string {
  if (runner.dryRun) {
    return preferredSerial ?? DRY_RUN_DEVICE;
  }

  const online = listDevices(runner).filter(device => device.state === 'device');

  if (preferredSerial) {
    if (online.some(device => device.id === preferredSerial)) {
      return preferredSerial;
    }
    throw new DeviceNotFoundError(preferredSerial);
  }

  if (online.length === 0) {
    throw new NoDevicesFoundError();
  }

  if (online.length > 1) {
    throw new MultipleDevicesError(online);
  }

  return online[0].id;
}

function summarizeBattery(dump: string): string {
  const level = /level: (\d+)/.exec(dump);
  const status = /status: (\d+)/.exec(dump);

  if (level && status) {
    return `${level[1]}% (status=${status[1]})`;
  }

  return dump.length > 60 ? `${dump.slice(0, 60)}...` : dump;
}

// Collect a one-screen summary of a device
export function getDeviceDetails(runner: CommandRunner, serial: string): DeviceDetails {
  const sh = (...command: string[]): string =>
    runner.run(['shell', ...command], { serial }).stdout.trim();

  const storage = sh('df', '-h', '/data');
  const mem = sh('dumpsys', 'meminfo', '-c');

  return {
    serial,
    model: sh('getprop', 'ro.product.model'),
    brand: sh('getprop', 'ro.product.brand'),
    android: sh('getprop', 'ro.build.version.release'),
    sdk: sh('getprop', 'ro.build.version.sdk'),
    abi: sh('getprop', 'ro.product.cpu.abi'),
    root: sh('id').includes('uid=0') ? 'yes' : 'no',
    battery: summarizeBattery(sh('dumpsys', 'battery')),
    storage: storage.split(/\s+/).filter(Boolean).join(' '),
    mem: mem ? mem.split('\n')[0].trim() : '',
  };
}
