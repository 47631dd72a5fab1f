import fs from 'fs';
import path from 'path';
import { Command, CommanderError } from 'commander';
import pkg from '../package.json';
import { CliContext, CliIO } from './context';
import {
  AnalyzeLogsInputSchema,
  AppStartInputSchema,
  ArgumentError,
  CliError,
  CommandFailedError,
  EXIT_CODES,
  ExitCode,
  GlobalOptionsSchema,
  GrantPermsInputSchema,
  InstallInputSchema,
  JsonOutputSchema,
  KeyInputSchema,
  LogcatInputSchema,
  PackageInputSchema,
  PullInputSchema,
  PushInputSchema,
  RecordInputSchema,
  ScreenDensityInputSchema,
  ScreenRotateInputSchema,
  ScreenshotInputSchema,
  ScreenSizeInputSchema,
  ShellInputSchema,
  SwipeInputSchema,
  TapInputSchema,
  TcpipConnectInputSchema,
  TcpipEnableInputSchema,
  TextInputSchema,
  UninstallInputSchema,
} from './types';
import { loadConfig } from './utils/config';
import { getDeviceDetails, listDevices, pickDevice } from './utils/devices';
import { parseInput } from './utils/error';
import { pullFile, pushFile, runShell } from './utils/files';
import { formatJson, formatTable } from './utils/format';
import { inputText, keyEvent, swipe, tap } from './utils/input';
import { analyzeLogFile, formatReportJson, formatReportText } from './utils/log-analyzer';
import { captureLogcat } from './utils/logcat';
import { connectTcpip, disableTcpip, enableTcpip } from './utils/network';
import {
  clearAppData,
  getPackageDetails,
  grantPermissions,
  installApk,
  startApp,
  stopApp,
  uninstallApp,
} from './utils/packages';
import { recordScreen, rotateScreen, screenDensity, screenSize } from './utils/screen';
import { captureScreenshot, defaultScreenshotPath } from './utils/screenshot';

type Options = Record<string, unknown>;

export interface MainOptions {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  /** Aborted on Ctrl+C. */
  signal?: AbortSignal;
  color?: boolean;
}

function registerDeviceCommands(program: Command, ctx: CliContext): void {
  program
    .command('devices')
    .description('List connected devices')
    .option('--json', 'Print JSON instead of a table')
    .action((options: Options) => {
      const { json } = parseInput(JsonOutputSchema, options);
      const rows = listDevices(ctx.runner).map(device => ({
        serial: device.id,
        state: device.state,
        model: device.model ?? '',
        android: device.android ?? '',
        sdk: device.sdk ?? '',
        transport: device.transportId ?? '',
      }));
      ctx.print(json ? formatJson(rows) : formatTable(rows));
    });

  program
    .command('device-info')
    .description('Show model, Android version, battery, storage and memory of a device')
    .option('--json', 'Print JSON instead of a table')
    .action((options: Options) => {
      const { json } = parseInput(JsonOutputSchema, options);
      const deviceId = pickDevice(ctx.runner, ctx.serial);
      const details = getDeviceDetails(ctx.runner, deviceId);
      ctx.print(json ? formatJson(details) : formatTable([{ ...details }]));
    });
}

function registerPackageCommands(program: Command, ctx: CliContext): void {
  program
    .command('install')
    .description('Install an APK')
    .argument('<apk>', 'Path to the .apk file')
    .option('--replace', 'Replace an existing installation (-r)')
    .option('--downgrade', 'Allow a version downgrade (-d)')
    .option('--grant-all', 'Grant all runtime permissions (-g)')
    .action((apk: string, options: Options) => {
      const input = parseInput(InstallInputSchema, { ...options, apk });
      ctx.printResult(installApk(ctx.runner, input, ctx.serial), 'Installed');
    });

  program
    .command('uninstall')
    .description('Uninstall a package')
    .requiredOption('--package <name>', 'Package name')
    .option('--keep-data', 'Keep the data and cache directories (-k)')
    .action((options: Options) => {
      const input = parseInput(UninstallInputSchema, options);
      ctx.printResult(
        uninstallApp(ctx.runner, input.package, { keepData: input.keepData, serial: ctx.serial })
      );
    });

  const app = program.command('app').description('Manage applications');

  app
    .command('start')
    .description('Start an activity or launch a package')
    .option('--package <name>', 'Package name')
    .option('--activity <name>', 'Activity, e.g. .MainActivity or pkg/.MainActivity')
    .option('--action <action>', 'Intent action')
    .option('--data <uri>', 'Intent data URI')
    .option('--extra <key=value...>', 'String extras')
    .action((options: Options) => {
      const input = parseInput(AppStartInputSchema, options);
      ctx.printResult(startApp(ctx.runner, input, ctx.serial));
    });

  app
    .command('stop')
    .description('Force-stop a package')
    .requiredOption('--package <name>', 'Package name')
    .action((options: Options) => {
      const input = parseInput(PackageInputSchema, options);
      ctx.printResult(stopApp(ctx.runner, input.package, ctx.serial), 'OK');
    });

  app
    .command('clear')
    .description('Clear the data of a package')
    .requiredOption('--package <name>', 'Package name')
    .action((options: Options) => {
      const input = parseInput(PackageInputSchema, options);
      ctx.printResult(clearAppData(ctx.runner, input.package, ctx.serial));
    });

  app
    .command('grant-perms')
    .description('Grant runtime permissions to a package')
    .requiredOption('--package <name>', 'Package name')
    .requiredOption('--perms <permission...>', 'Permissions to grant')
    .action((options: Options) => {
      const input = parseInput(GrantPermsInputSchema, options);
      const { results } = grantPermissions(ctx.runner, input.package, input.perms, ctx.serial);

      for (const result of results) {
        ctx.print(result.ok ? `${result.permission}: OK` : `${result.permission}: FAIL - ${result.output}`);
      }

      if (results.some(result => !result.ok)) {
        ctx.exitCode = EXIT_CODES.FAILURE;
      }
    });

  app
    .command('info')
    .description('Show version, uid, permissions and APK path of a package')
    .requiredOption('--package <name>', 'Package name')
    .action((options: Options) => {
      const input = parseInput(PackageInputSchema, options);
      const { result, details } = getPackageDetails(ctx.runner, input.package, ctx.serial);

      if (!details) {
        ctx.printResult(result);
        return;
      }

      ctx.print(formatJson(details));
    });
}

function registerCaptureCommands(program: Command, ctx: CliContext, signal?: AbortSignal): void {
  program
    .command('screenshot')
    .description('Save a PNG screenshot')
    .option('--out <file>', 'Output file')
    .action((options: Options) => {
      const input = parseInput(ScreenshotInputSchema, options);
      const deviceId = pickDevice(ctx.runner, ctx.serial);
      const out = input.out ?? defaultScreenshotPath(ctx.config.outputDirScreens, deviceId);
      const result = captureScreenshot(ctx.runner, deviceId, out);

      if (result) {
        ctx.print(`Screenshot saved: ${result.path} (${result.width}x${result.height})`);
      }
    });

  program
    .command('record')
    .description('Record the screen to an MP4 file')
    .option('--duration <seconds>', 'Recording length, 1-180 seconds (default 30)')
    .option('--bitrate <mbps>', 'Bit rate in Mbit/s (default 4)')
    .option('--out <file>', 'Output file')
    .action((options: Options) => {
      const input = parseInput(RecordInputSchema, options);
      const result = recordScreen(ctx.runner, input, {
        outputDir: ctx.config.outputDirScreens,
        serial: ctx.serial,
      });

      ctx.print(
        ctx.runner.dryRun
          ? `[DRY-RUN] Video would be saved to ${result.path}`
          : `Video saved: ${result.path}`
      );
    });

  program
    .command('logcat')
    .description('Capture logcat to a file')
    .option('--out <file>', 'Output file')
    .option('--since <time>', 'Start time: 30s, 5m, 2h, 1d or ISO-8601')
    .option('--filter <tag:level...>', 'Filter specs, e.g. ActivityManager:I')
    .option('--clear', 'Clear the log buffer first')
    .option('--duration <seconds>', 'Stop after this many seconds (0 = until Ctrl+C)')
    .action(async (options: Options) => {
      const input = parseInput(LogcatInputSchema, options);
      ctx.interruptHandled = true;

      const result = await captureLogcat(ctx.runner, input, {
        outputDir: ctx.config.outputDirLogs,
        serial: ctx.serial,
        signal,
      });

      if (result.status) {
        ctx.print(`Logs saved: ${result.path}`);
      }
    });

  program
    .command('analyze-logs')
    .description('Summarize a saved logcat file')
    .requiredOption('--file <path>', 'Log file to analyze')
    .option('--json', 'Print JSON')
    .action(async (options: Options) => {
      const input = parseInput(AnalyzeLogsInputSchema, options);
      const file = path.resolve(input.file);

      if (!fs.existsSync(file)) {
        throw new ArgumentError(`Log file not found: ${input.file}`, { file });
      }

      const report = await analyzeLogFile(file);
      ctx.print(input.json ? formatReportJson(report) : formatReportText(report));
    });
}

function registerInputCommands(program: Command, ctx: CliContext): void {
  const input = program.command('input').description('Send input events');

  input
    .command('tap')
    .description('Tap at a screen coordinate')
    .argument('<x>')
    .argument('<y>')
    .action((x: string, y: string) => {
      const point = parseInput(TapInputSchema, { x, y });
      ctx.printResult(tap(ctx.runner, point.x, point.y, ctx.serial));
    });

  input
    .command('text')
    .description('Type text')
    .argument('<text>')
    .action((text: string) => {
      const parsed = parseInput(TextInputSchema, { text });
      ctx.printResult(inputText(ctx.runner, parsed.text, ctx.serial));
    });

  input
    .command('key')
    .description('Send a key event, e.g. KEYCODE_BACK or 4')
    .argument('<key>')
    .action((key: string) => {
      const parsed = parseInput(KeyInputSchema, { key });
      ctx.printResult(keyEvent(ctx.runner, parsed.key, ctx.serial));
    });

  input
    .command('swipe')
    .description('Swipe between two coordinates')
    .argument('<x1>')
    .argument('<y1>')
    .argument('<x2>')
    .argument('<y2>')
    .option('--duration <ms>', 'Swipe duration in milliseconds')
    .action((x1: string, y1: string, x2: string, y2: string, options: Options) => {
      const parsed = parseInput(SwipeInputSchema, { ...options, x1, y1, x2, y2 });
      ctx.printResult(swipe(ctx.runner, parsed, ctx.serial));
    });
}

function registerFileCommands(program: Command, ctx: CliContext): void {
  program
    .command('shell')
    .description('Run a shell command on the device (pass it after --)')
    .option('--root', "Run through 'su -c'")
    .argument('[command...]')
    .passThroughOptions()
    .action((command: string[], options: Options) => {
      const input = parseInput(ShellInputSchema, { ...options, command });
      const { exitCode, stdout, stderr } = runShell(ctx.runner, input.command, {
        root: input.root,
        serial: ctx.serial,
      });

      if (stdout) {
        ctx.io.stdout.write(stdout);
      }

      if (exitCode !== 0) {
        throw new CommandFailedError(
          `Shell command exited with code ${exitCode}${stderr.trim() ? `: ${stderr.trim()}` : ''}`,
          { exitCode }
        );
      }
    });

  program
    .command('pull')
    .description('Copy a file from the device')
    .requiredOption('--remote <path>', 'Path on the device')
    .option('--out <path>', 'Local destination (default: current directory)')
    .action((options: Options) => {
      const input = parseInput(PullInputSchema, options);
      ctx.printResult(pullFile(ctx.runner, input.remote, input.out, ctx.serial));
    });

  program
    .command('push')
    .description('Copy a file to the device')
    .requiredOption('--src <path>', 'Local file')
    .requiredOption('--remote <path>', 'Destination on the device')
    .action((options: Options) => {
      const input = parseInput(PushInputSchema, options);
      ctx.printResult(pushFile(ctx.runner, input.src, input.remote, ctx.serial));
    });
}

function registerSettingsCommands(program: Command, ctx: CliContext): void {
  const tcpip = program.command('tcpip').description('adb over Wi-Fi');

  tcpip
    .command('enable')
    .description('Restart adbd on the device in TCP mode')
    .option('--port <port>', 'TCP port (default 5555)')
    .action((options: Options) => {
      const input = parseInput(TcpipEnableInputSchema, options);
      ctx.printResult(enableTcpip(ctx.runner, input.port, ctx.serial));
    });

  tcpip
    .command('connect')
    .description('Connect to a device over TCP')
    .requiredOption('--host <host>', 'Device address')
    .option('--port <port>', 'TCP port (default 5555)')
    .action((options: Options) => {
      const input = parseInput(TcpipConnectInputSchema, options);
      ctx.printResult(connectTcpip(ctx.runner, input.host, input.port));
    });

  tcpip
    .command('disable')
    .description('Switch adbd back to USB mode')
    .action(() => {
      ctx.printResult(disableTcpip(ctx.runner));
    });

  const screen = program.command('screen').description('Display settings');

  screen
    .command('size')
    .description('Show or override the display size')
    .option('--set <WxH>', 'New size, e.g. 1080x1920')
    .action((options: Options) => {
      const input = parseInput(ScreenSizeInputSchema, options);
      ctx.printResult(screenSize(ctx.runner, input.set, ctx.serial));
    });

  screen
    .command('density')
    .description('Show or override the display density')
    .option('--set <dpi>', 'New density')
    .action((options: Options) => {
      const input = parseInput(ScreenDensityInputSchema, options);
      ctx.printResult(screenDensity(ctx.runner, input.set, ctx.serial));
    });

  screen
    .command('rotate')
    .description('Lock the orientation or re-enable auto-rotation')
    .option('--landscape', 'Lock to landscape')
    .option('--portrait', 'Lock to portrait')
    .option('--unlock', 'Re-enable auto-rotation')
    .action((options: Options) => {
      const input = parseInput(ScreenRotateInputSchema, options);
      ctx.printResult(rotateScreen(ctx.runner, input, ctx.serial), 'OK');
    });
}

export function createProgram(ctx: CliContext, signal?: AbortSignal): Command {
  const program = new Command();

  program
    .name('droidctl')
    .description('Everyday adb tasks: devices, apps, input, logs and screen capture')
    .version(pkg.version, '-V, --version')
    .option('--adb <path>', 'adb executable or platform-tools directory')
    .option('-s, --serial <id>', 'Target device serial')
    .option('--timeout <seconds>', 'Timeout for one-shot adb commands')
    .option('--dry-run', 'Print adb commands instead of running them')
    .option('--verbose', 'Debug output')
    .option('--quiet', 'Warnings and errors only')
    .option('--log-file <path>', 'Diagnostic log file')
    // Global options go before the command so `shell` can pass its own through
    .enablePositionalOptions()
    .exitOverride()
    .configureOutput({
      writeOut: text => ctx.io.stdout.write(text),
      writeErr: text => ctx.io.stderr.write(text),
    })
    .hook('preAction', () => {
      ctx.setup(parseInput(GlobalOptionsSchema, program.opts()));
    });

  registerDeviceCommands(program, ctx);
  registerPackageCommands(program, ctx);
  registerCaptureCommands(program, ctx, signal);
  registerInputCommands(program, ctx);
  registerFileCommands(program, ctx);
  registerSettingsCommands(program, ctx);

  return program;
}

/**
 * Run the CLI with `argv` in process.argv form and resolve with the exit
 * code. Never throws.
 */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<ExitCode> {
  const io = options.io ?? { stdout: process.stdout, stderr: process.stderr };
  const { config, warnings } = loadConfig({ env: options.env, homeDir: options.homeDir });
  const ctx = new CliContext({
    io,
    config,
    configWarnings: warnings,
    env: options.env,
    color: options.color,
  });
  const { signal } = options;
  const interrupted = () => Boolean(signal?.aborted) && !ctx.interruptHandled;

  try {
    await createProgram(ctx, signal).parseAsync([...argv]);

    if (interrupted()) {
      return ctx.reportError(new CliError('INTERRUPTED', 'Interrupted by user (Ctrl+C)'));
    }

    return ctx.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_ARGUMENTS;
    }

    if (interrupted()) {
      return ctx.reportError(new CliError('INTERRUPTED', 'Interrupted by user (Ctrl+C)'));
    }

    return ctx.reportError(error);
  } finally {
    ctx.close();
  }
}
