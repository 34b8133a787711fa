#!/usr/bin/env node
import { run } from './index.js';
import { error } from './utils/console.js';
import { errorMessage } from './utils/errors.js';

run(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        error(`Unexpected error: ${errorMessage(err)}`);
        process.exitCode = 1;
    });
