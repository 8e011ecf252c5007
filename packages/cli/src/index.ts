#!/usr/bin/env node

/**
 * rrf-backup CLI - back up the SD card of a RepRapFirmware controller
 */

import { Command } from "commander";
import { createRequire } from "module";
import { EXIT_CONFIG_ERROR, registerBackupCommand } from "./commands/backup.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const program = new Command();

program
  .name("rrf-backup")
  .description("Mirror a RepRapFirmware controller's files into a local directory")
  .version(pkg.version)
  // Usage errors (unknown flag, bad port) are configuration errors
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? 0 : EXIT_CONFIG_ERROR);
  });

registerBackupCommand(program);

await program.parseAsync();
