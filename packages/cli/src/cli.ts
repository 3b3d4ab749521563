#!/usr/bin/env node

/**
 * typereg CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv.slice(2));
