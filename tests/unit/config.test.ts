import fs from 'fs';
import os from 'os';
import path from 'path';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG, loadConfig } from '../../src/utils/config';

describe('Configuration', () => {
  let homeDir: string;

  const writeConfig = (content: string) =>
    fs.writeFileSync(path.join(homeDir, CONFIG_FILE_NAME), content);

  beforeEach(() => {
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'droidctl-home-'));
  });

  afterEach(() => {
    fs.rmSync(homeDir, { recursive: true, force: true });
  });

  it('should fall back to defaults without a file or environment', () => {
    expect(loadConfig({ env: {}, homeDir })).toEqual({
      config: {
        adbPath: undefined,
        defaultSerial: undefined,
        ...DEFAULT_CONFIG,
      },
      warnings: [],
    });
  });

  it('should read values from the config file', () => {
    writeConfig(
      JSON.stringify({
        adbPath: '/opt/android/platform-tools',
        defaultSerial: 'emulator-5554',
        defaultTimeout: 90,
        outputDirLogs: 'captures/logs',
        theme: 'ignored',
      })
    );

    const { config, warnings } = loadConfig({ env: {}, homeDir });

    expect(warnings).toEqual([]);
    expect(config).toEqual({
      adbPath: '/opt/android/platform-tools',
      defaultSerial: 'emulator-5554',
      defaultTimeout: 90,
      outputDirLogs: 'captures/logs',
      outputDirScreens: 'screenshots',
      logFile: 'droidctl.log',
    });
  });

  it('should let DROIDCTL_* variables override the file', () => {
    writeConfig(JSON.stringify({ defaultSerial: 'emulator-5554', defaultTimeout: 90 }));

    const { config } = loadConfig({
      env: {
        DROIDCTL_DEFAULT_SERIAL: 'R58M123ABC',
        DROIDCTL_DEFAULT_TIMEOUT: '45',
        DROIDCTL_OUTPUT_SCREENS: 'shots',
        DROIDCTL_LOG_FILE: '',
      },
      homeDir,
    });

    expect(config.defaultSerial).toBe('R58M123ABC');
    expect(config.defaultTimeout).toBe(45);
    expect(config.outputDirScreens).toBe('shots');
    expect(config.logFile).toBe('droidctl.log');
  });

  it('should treat blank strings in the file as unset', () => {
    writeConfig(JSON.stringify({ defaultSerial: '   ', logFile: '' }));

    const { config } = loadConfig({ env: {}, homeDir });

    expect(config.defaultSerial).toBeUndefined();
    expect(config.logFile).toBe('droidctl.log');
  });

  it('should warn and use defaults when the file is not valid JSON', () => {
    writeConfig('{ "defaultTimeout": ');

    const { config, warnings } = loadConfig({ env: {}, homeDir });

    expect(config.defaultTimeout).toBe(30);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith(`Failed to read config ${path.join(homeDir, CONFIG_FILE_NAME)}: `)).toBe(
      true
    );
  });

  it('should warn about values of the wrong type', () => {
    writeConfig(JSON.stringify({ defaultTimeout: 'soon' }));

    const { config, warnings } = loadConfig({ env: {}, homeDir });

    expect(config.defaultTimeout).toBe(30);
    expect(warnings).toEqual([
      `Ignoring invalid config ${path.join(homeDir, CONFIG_FILE_NAME)}: defaultTimeout: Expected number, received string`,
    ]);
  });

  it('should ignore a timeout variable that is not a positive integer', () => {
    const { config, warnings } = loadConfig({ env: { DROIDCTL_DEFAULT_TIMEOUT: '0' }, homeDir });

    expect(config.defaultTimeout).toBe(30);
    expect(warnings).toEqual(["Ignoring invalid DROIDCTL_DEFAULT_TIMEOUT '0'"]);
  });
});
