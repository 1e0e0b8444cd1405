#!/usr/bin/env -S node --import tsx
import { createProgram } from './program.ts';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`volume-frames: ${message}`);
    process.exitCode = 1;
  });
