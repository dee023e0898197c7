#!/usr/bin/env node
import { buildCli } from "./cli.js";
import { errorMessage } from "./errors.js";

buildCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`chat-tutor: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
