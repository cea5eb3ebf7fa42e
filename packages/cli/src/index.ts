/**
 * exprcc CLI - compile integer expressions to x86-64 assembly
 */

import { run } from './program.js';

process.exitCode = run(process.argv);
