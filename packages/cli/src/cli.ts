#!/usr/bin/env node

/**
 * cfgtree CLI entry point
 */

import { runProgram } from "./program.js";

process.exitCode = await runProgram(process.argv.slice(2));
