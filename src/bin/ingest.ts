#!/usr/bin/env node
import dotenv from 'dotenv';

import { runIngestCommand } from '../cli/ingest';

dotenv.config();

runIngestCommand(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
