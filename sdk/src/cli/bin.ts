#!/usr/bin/env node
import 'dotenv/config';

import { hideBin } from 'yargs/helpers';

import { runCli } from './index.js';

runCli(hideBin(process.argv)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
