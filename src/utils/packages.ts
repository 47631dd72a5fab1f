import fs from 'fs';
import path from 'path';
import {
  AppStartInput,
  ArgumentError,
  CommandResult,
  DeviceCommandResult,
  InstallInput,
  PackageDetails,
} from '../types';
import { CommandRunner } from './adb';
import { pickDevice } from './devices';

const INSTALL_TIMEOUT_MS = 60000;

export interface PermissionGrantResult {
  permission: string;
  ok: boolean;
  output: string;
}

function withDevice(deviceId: string, result: CommandResult): DeviceCommandResult {
  return { deviceId, ...result };
}

export function installApk(
  runner: CommandRunner,
  input: InstallInput,
  serial?: string
): DeviceCommandResult & { apkPath: string } {
  const apkPath = path.resolve(input.apk);

  if (!fs.existsSync(apkPath)) {
    throw new ArgumentError(`APK not found: ${input.apk}`, { apkPath });
  }

  const flags = [
    input.replace ? '-r' : '',
    input.downgrade ? '-d' : '',
    input.grantAll ? '-g' : '',
  ].filter(Boolean);

  const deviceId = pickDevice(runner, serial);
  const result = runner.run(['install', ...flags, apkPath], {
    serial: deviceId,
    timeoutMs: Math.max(runner.timeoutMs, INSTALL_TIMEOUT_MS),
  });

  return { ...withDevice(deviceId, result), apkPath };
}

export function uninstallApp(
  runner: CommandRunner,
  packageName: string,
  options: { keepData?: boolean; serial?: string } = {}
): DeviceCommandResult {
  const deviceId = pickDevice(runner, options.serial);
  const args = ['uninstall', ...(options.keepData ? ['-k'] : []), packageName];
  return withDevice(deviceId, runner.run(args, { serial: deviceId }));
}

/**
 * Build the `shell am start` arguments. An activity starting with '.' or
 * without a package part is completed with the package name; a package with
 * neither activity nor action goes through the launcher via monkey.
 */
export function buildAppStartArgs(input: AppStartInput): string[] {
  const { package: packageName, activity, action } = input;

  if (packageName && !activity && !action) {
    return ['shell', 'monkey', '-p', packageName, '-c', 'android.intent.category.LAUNCHER', '1'];
  }

  const args = ['shell', 'am', 'start', '-W'];

  if (action) {
    args.push('-a', action);
  }

  if (input.data) {
    args.push('-d', input.data);
  }

  for (const extra of input.extra) {
    const separator = extra.indexOf('=');
    args.push('--es', extra.slice(0, separator), extra.slice(separator + 1));
  }

  if (activity && (activity.includes('/') || packageName)) {
    const component = activity.includes('/') ? activity : `${packageName}/${activity}`;
    args.push('-n', component);
  } else if (packageName) {
    args.push('-p', packageName);
  }

  return args;
}

export function startApp(
  runner: CommandRunner,
  input: AppStartInput,
  serial?: string
): DeviceCommandResult {
  const deviceId = pickDevice(runner, serial);
  return withDevice(deviceId, runner.run(buildAppStartArgs(input), { serial: deviceId }));
}

export function stopApp(
  runner: CommandRunner,
  packageName: string,
  serial?: string
): DeviceCommandResult {
  const deviceId = pickDevice(runner, serial);
  return withDevice(
    deviceId,
    runner.run(['shell', 'am', 'force-stop', packageName], { serial: deviceId })
  );
}

export function clearAppData(
  runner: CommandRunner,
  packageName: string,
  serial?: string
): DeviceCommandResult {
  const deviceId = pickDevice(runner, serial);
  return withDevice(deviceId, runner.run(['shell', 'pm', 'clear', packageName], { serial: deviceId }));
}

export function grantPermissions(
  runner: CommandRunner,
  packageName: string,
  permissions: string[],
  serial?: string
): { deviceId: string; results: PermissionGrantResult[] } {
  const deviceId = pickDevice(runner, serial);
  const results = permissions.map(permission => {
    const { exitCode, stdout, stderr } = runner.run(
      ['shell', 'pm', 'grant', packageName, permission],
      { serial: deviceId }
    );
    return { permission, ok: exitCode === 0, output: (stderr.trim() || stdout.trim()) };
  });

  return { deviceId, results };
}

// Pull the interesting fields out of `dumpsys package <name>`
export function parsePackageDump(
  packageName: string,
  dump: string,
  pmPathOutput = ''
): PackageDetails {
  const details: PackageDetails = {
    package: packageName,
    versionName: '',
    versionCode: '',
    uid: '',
    grantedPermissions: [],
    path: pmPathOutput.trim().replace(/^package:/, ''),
    mainActivity: '',
  };
  const granted = new Set<string>();

  for (const line of dump.split('\n')) {
    if (line.includes('versionName=')) {
      details.versionName = line.split('versionName=').pop()?.trim() ?? '';
    }
    if (line.includes('versionCode=')) {
      details.versionCode = line.split('versionCode=').pop()?.split(/\s+/)[0] ?? '';
    }
    if (line.includes('userId=')) {
      details.uid = line.split('userId=').pop()?.split(/\s+/)[0] ?? '';
    }
    if (line.includes('granted=true') && line.includes('android.permission')) {
      const permission = line.trim().split(/\s+/)[0].replace(/:$/, '');
      granted.add(permission);
    }
    if (line.includes('android.intent.action.MAIN') && line.includes('LAUNCHER')) {
      const component = /cmp=(\S+)/.exec(line);
      if (component) {
        details.mainActivity = component[1];
      }
    }
  }

  details.grantedPermissions = Array.from(granted);
  return details;
}

export function getPackageDetails(
  runner: CommandRunner,
  packageName: string,
  serial?: string
): { deviceId: string; result: CommandResult; details?: PackageDetails } {
  const deviceId = pickDevice(runner, serial);
  const result = runner.run(['shell', 'dumpsys', 'package', packageName], { serial: deviceId });

  if (result.exitCode !== 0) {
    return { deviceId, result };
  }

  const pmPath = runner.run(['shell', 'pm', 'path', packageName], { serial: deviceId });
  const details = parsePackageDump(
    packageName,
    result.stdout,
    pmPath.exitCode === 0 ? pmPath.stdout : ''
  );

  return { deviceId, result, details };
}
