#!/usr/bin/env node
import { Command } from "commander";
import { runComparison } from "./app.js";

const program = new Command();

program
  .name("bench-compare")
  .description("Compare rust and nodejs benchmark results")
  .argument("<results_dir>", "Directory containing benchmark results")
  .option("-v, --verbose", "Verbose output", false)
  .action((resultsDir: string, opts: { verbose: boolean }) => {
    process.exitCode = runComparison({ resultsDir, verbose: opts.verbose });
  });

program.parse();
