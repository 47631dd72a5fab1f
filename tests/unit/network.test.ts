import { connectTcpip, DEFAULT_TCPIP_PORT, disableTcpip, enableTcpip } from '../../src/utils/network';
import { createMockRunner, mockSingleDeviceListOutput } from '../mocks/adb.mock';

describe('TCP/IP Utilities', () => {
  it('should restart adbd on the default port', () => {
    const runner = createMockRunner({
      'devices -l': mockSingleDeviceListOutput,
      'tcpip 5555': 'restarting in TCP mode port: 5555\n',
    });

    const result = enableTcpip(runner);

    expect(DEFAULT_TCPIP_PORT).toBe(5555);
    expect(result.deviceId).toBe('emulator-5554');
    expect(result.stdout).toBe('restarting in TCP mode port: 5555\n');
  });

  it('should connect without selecting a device', () => {
    const runner = createMockRunner({
      'connect 192.168.1.100:5555': 'connected to 192.168.1.100:5555\n',
    });

    expect(connectTcpip(runner, '192.168.1.100').stdout).toBe('connected to 192.168.1.100:5555\n');
    expect(runner.calls).toEqual([
      { args: ['connect', '192.168.1.100:5555'], serial: undefined, timeoutMs: undefined },
    ]);
  });

  it('should honour a custom port and switch back to USB', () => {
    const runner = createMockRunner({}, { dryRun: true });

    enableTcpip(runner, 5037, 'emulator-5554');
    connectTcpip(runner, '10.0.0.7', 5037);
    disableTcpip(runner);

    expect(runner.printed).toEqual([
      '[DRY-RUN] /usr/bin/adb -s emulator-5554 tcpip 5037',
      '[DRY-RUN] /usr/bin/adb connect 10.0.0.7:5037',
      '[DRY-RUN] /usr/bin/adb usb',
    ]);
  });
});
