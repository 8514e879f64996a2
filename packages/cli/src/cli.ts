#!/usr/bin/env node
/**
 * pgrotate CLI
 *
 * Usage:
 *   pgrotate <command> [options]
 *
 * Commands:
 *   step     Run one rotation step for a version
 *   run      Run every step for a version staged AWSPENDING
 *   status   Show rotation flag and version stages
 */

import { buildProgram } from './program.js';

await buildProgram().parseAsync();
