#!/usr/bin/env tsx

/**
 * CLI entry point for batrepl
 * Batch literal find-and-replace in HTML/JS files, driven by a CSV table
 */

import { Command } from "commander";
import { replaceCommand } from "./commands/replace";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("batrepl")
  .description("Batch find and replace in HTML/JS files")
  .version("0.1.0");

// Main replace command (default action)
program
  .option("-s, --source <path>", "CSV file with find,replace[,note] rows")
  .option("-t, --target <path>", "Directory to scan for .html and .js files")
  .option(
    "-l, --log <level>",
    "Log file level: NONE, DEBUG, INFO, WARNING, ERROR or CRITICAL",
  )
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "List every failed file in the summary")
  .action(replaceCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
