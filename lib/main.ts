#!/usr/bin/env node
import { createProgram } from './cli.js';
import { getErrorMessage } from './util.js';

createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        process.stderr.write(`imagesmith: ${getErrorMessage(error)}\n`);
        process.exitCode = 1;
    });
