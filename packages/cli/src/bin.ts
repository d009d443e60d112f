#!/usr/bin/env tsx
import { createProgram } from './cli.js';

try {
  createProgram().parse(process.argv);
} catch (error) {
  console.error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
}
