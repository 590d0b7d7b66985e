#!/usr/bin/env node
import { buildProgram, describeError } from './src/cli';
import { Logger } from './src/utils/Logger';

buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        Logger.error(describeError(error));
        process.exitCode = 1;
    });
