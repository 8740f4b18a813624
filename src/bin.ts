#!/usr/bin/env node
import { main } from './cli';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('[Fusion] Fatal:', err);
    process.exitCode = 1;
  },
);
