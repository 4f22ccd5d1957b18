#!/usr/bin/env node
// src/cli/bin.ts

import 'dotenv/config';
import pc from 'picocolors';
import { OperationCancelledError, summarizeError } from '../utils/errors';
import { buildProgram } from './program';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`${pc.red('error')} ${summarizeError(error)}\n`);
    process.exitCode = error instanceof OperationCancelledError ? 130 : 1;
  });
