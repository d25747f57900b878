#!/usr/bin/env node
/**
 * Serpentine CLI - Main entry point
 * Python subset → C++ transpiler
 */

import { Command } from "commander";
import { astCommand, transpileCommand } from "./transpile.ts";

const program = new Command();

program
  .name("serpentine")
  .description("Transpile a Python subset to C++ built on the DynamicType runtime")
  .version("0.1.0");

// Transpile command
program
  .command("transpile <input>")
  .description("Transpile a .py file to C++")
  .option("-o, --output <file>", "Output .cpp file (default: input name with .cpp)")
  .option("-c, --config <file>", "JSON config file, e.g. serpentine.config.json")
  .option("--source-map", "Write a source map next to the output")
  .option("-v, --verbose", "Enable verbose logging")
  .option("--log <namespaces>", "Comma-separated log namespaces (parser,codegen,scope,...)")
  .option("--time", "Show timing for each phase")
  .option("--debug", "Show stack traces for errors")
  .action(transpileCommand);

// AST command
program
  .command("ast <input>")
  .description("Print the parsed syntax tree as JSON")
  .option("--no-pretty", "Print the JSON on one line")
  .option("--debug", "Show stack traces for errors")
  .action(astCommand);

await program.parseAsync(process.argv);
