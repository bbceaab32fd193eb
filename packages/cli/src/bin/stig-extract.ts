#!/usr/bin/env node
/**
 * bin/stig-extract.ts: entry point for the `stig-extract` CLI command.
 *
 * stig-extract ./U_MS_Windows_11_STIG_V2R3_Manual-xccdf.xml
 * STIG_XCCDF_PATH=./benchmark.xml stig-extract --limit 10
 * stig-extract ./benchmark.xml --json > rules.json
 */

import { createProgram } from '../commands/index.js';

createProgram().parse();
