#!/usr/bin/env node

/**
 * scaffold-patch - idempotent patching of generated project scaffolds
 */

import { buildProgram } from './cli.js';
import { exitWithError } from './commands/context.js';

buildProgram().parseAsync().catch(exitWithError);
