#!/usr/bin/env node
/**
 * CLI entry: hex2bin [--fill 0xNN] [--codec none|zstd] [--level N] [--verbose] [src] [dest]
 */

import { runHex2Bin } from '../src/cli/hex2bin.js';

process.exitCode = await runHex2Bin(process.argv.slice(2));
