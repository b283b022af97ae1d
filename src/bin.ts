#!/usr/bin/env node
import { program } from './cli/index.js';
import { exitWithError } from './cli/run.js';

program.parseAsync(process.argv).catch(exitWithError);
