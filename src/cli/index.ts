#!/usr/bin/env node

/**
 * pegforge CLI
 *
 * Usage:
 *   pegforge generate <grammar.gram> [-o out.ts] [--class Name]
 *   pegforge check <grammar.gram> [--first-sets]
 *   pegforge parse <grammar.gram> <input> [--start rule]
 *   pegforge explain <code>
 */

import { runCli } from "./commands.js";

process.exitCode = runCli(process.argv.slice(2));
