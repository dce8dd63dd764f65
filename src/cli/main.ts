#!/usr/bin/env node
/**
 * todo executable.
 */

import { runCli } from './index.js';
import { closeLogger } from '../core/logger.js';

const code = await runCli(process.argv.slice(2), { fileLogging: true });
closeLogger();
process.exitCode = code;
