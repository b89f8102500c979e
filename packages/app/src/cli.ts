#!/usr/bin/env node

/**
 * CLI entry point for the market-data-downloader binary
 *
 * Loads .env, then hands the arguments to start.ts.
 */

import 'dotenv/config';
import { main } from './start.js';

process.exitCode = await main(process.argv.slice(2), { env: process.env, attachHandlers: true });
