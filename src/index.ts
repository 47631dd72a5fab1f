#!/usr/bin/env node

import pc from 'picocolors';
import { main } from './cli';

const controller = new AbortController();

process.on('SIGINT', () => {
  if (controller.signal.aborted) {
    // Second Ctrl+C: stop waiting for the capture to wind down
    process.exit(1);
  }
  controller.abort();
});

main(process.argv, { signal: controller.signal, color: pc.isColorSupported })
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('Unexpected failure:', error);
    process.exitCode = 1;
  });
