#!/usr/bin/env node
/**
 * quarry CLI entry point
 *
 * @module packages/cli/bin/quarry
 */

import 'dotenv/config';
import { createProgram } from '../commands/index.js';

await createProgram().parseAsync();
