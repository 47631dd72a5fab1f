import { DeviceCommandResult, SwipeInput } from '../types';
import { CommandRunner } from './adb';
import { pickDevice } from './devices';

// Characters `input text` would otherwise hand to the device shell
const INPUT_TEXT_ESCAPES: Record<string, string> = {
  ' ': '%s',
  '&': '\\&',
  '<': '\\<',
  '>': '\\>',
  '(': '\\(',
  ')': '\\)',
  ';': '\\;',
  '|': '\\|',
  '*': '\\*',
  '~': '\\~',
  "'": "\\'",
  '"': '\\"',
  '#': '\\#',
  '%': '\\%',
  '!': '\\!',
  '?': '\\?',
  ':': '\\:',
  '/': '\\/',
  '\\': '\\\\',
};

export function sanitizeInputText(text: string): string {
  return Array.from(text, char => INPUT_TEXT_ESCAPES[char] ?? char).join('');
}

function sendInput(runner: CommandRunner, args: string[], serial?: string): DeviceCommandResult {
  const deviceId = pickDevice(runner, serial);
  return { deviceId, ...runner.run(['shell', 'input', ...args], { serial: deviceId }) };
}

export function tap(runner: CommandRunner, x: number, y: number, serial?: string) {
  return sendInput(runner, ['tap', String(x), String(y)], serial);
}

export function inputText(runner: CommandRunner, text: string, serial?: string) {
  return sendInput(runner, ['text', sanitizeInputText(text)], serial);
}

export function keyEvent(runner: CommandRunner, key: string, serial?: string) {
  return sendInput(runner, ['keyevent', key], serial);
}

export function swipe(runner: CommandRunner, input: SwipeInput, serial?: string) {
  const args = ['swipe', input.x1, input.y1, input.x2, input.y2].map(String);
  if (input.duration) {
    args.push(String(input.duration));
  }
  return sendInput(runner, args, serial);
}
