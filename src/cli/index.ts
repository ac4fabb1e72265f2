#!/usr/bin/env node
/**
 * ctestgen CLI entry point
 *
 * Commands:
 * - generate - Generate, validate and rate Unity tests for C functions
 * - analyze  - Show functions, dependency edges and required stubs
 */

import { Command } from "commander";

import { VERSION } from "../version.js";

import { registerAnalyzeCommand } from "./commands/analyze.js";
import { registerGenerateCommand } from "./commands/generate.js";

const program = new Command();

program
  .name("ctestgen")
  .description("AI-driven Unity test generation for C codebases")
  .version(VERSION);

registerGenerateCommand(program);
registerAnalyzeCommand(program);

await program.parseAsync();
