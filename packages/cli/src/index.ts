#!/usr/bin/env node

import fs from "fs";
import { program } from "commander";
import chalk from "chalk";
import { z } from "zod";
import { parseCommand } from "./commands/parse.js";
import { runCommand } from "./commands/run.js";
import { formatsCommand } from "./commands/formats.js";
import { logsCommand } from "./commands/logs.js";

const { version } = z
  .object({ version: z.string() })
  .parse(JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

program
  .name("lintlens")
  .description("Normalize static-analysis tool output into violations by file")
  .version(version);

program
  .command("parse [file]")
  .description("Parse saved tool output (reads stdin when no file is given)")
  .option("-f, --format <format>", "Tool output format (see 'lintlens formats')")
  .option("-r, --root <dir>", "Directory paths are made relative to")
  .option("-o, --output <format>", "Output format (table|json)")
  .option("--fail-on-violations", "Exit with code 1 when violations are found")
  .action(parseCommand);

program
  .command("run <command...>")
  .description("Run a linter and parse its standard output")
  .option("-f, --format <format>", "Tool output format (see 'lintlens formats')")
  .option("-r, --root <dir>", "Directory paths are made relative to")
  .option("-o, --output <format>", "Output format (table|json)")
  .option("--fail-on-violations", "Exit with code 1 when violations are found")
  .option("--timeout <ms>", "Linter timeout in milliseconds")
  .action(runCommand);

program
  .command("formats")
  .description("List supported tool output formats")
  .action(formatsCommand);

program
  .command("logs <format>")
  .description("Show recent parse runs for a format")
  .option("-n, --limit <count>", "Number of entries to show", "20")
  .action(logsCommand);

program.on("command:*", () => {
  console.error(
    chalk.red(
      "Invalid command: %s\nSee --help for a list of available commands."
    ),
    program.args.join(" ")
  );
  process.exit(1);
});

await program.parseAsync();
