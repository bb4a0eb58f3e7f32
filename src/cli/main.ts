#!/usr/bin/env node

/**
 * swaggerpub CLI entry point.
 * Thin wrapper — all logic delegated to core.
 */

import 'dotenv/config';

import { CLI_INFO } from '../config/defaults.js';
import { runCli } from './publish.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), CLI_INFO);
}

void main();
