#!/usr/bin/env tsx
import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { registerConfigCommand } from "./commands/config";
import { registerPlayCommand } from "./commands/play";
import { registerVerifyCommand } from "./commands/verify";

program
  .name("llmduel")
  .description("llmduel - Pit two language models against each other at chess")
  .version("0.1.0", "-v, --version");

registerConfigCommand(program);
registerPlayCommand(program);
registerVerifyCommand(program);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
