#!/usr/bin/env node
import dotenv from 'dotenv';

import { runChatCommand } from '../cli/chat';

dotenv.config();

runChatCommand(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
