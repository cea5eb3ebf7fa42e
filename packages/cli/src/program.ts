/**
 * exprcc command definition
 */

import { compile, evaluate, ExpressionError } from '@exprcc/compiler';
import { createLogger, type Logger } from '@exprcc/logger';
import { Command, CommanderError } from 'commander';
import * as fs from 'node:fs';
import { loadConfig, type ExprccConfig } from './config.js';
import { EXIT_SUCCESS, Reporter, type OutputStream } from './reporter.js';

export const VERSION = '0.1.0';

export interface CliIO {
  stdout: OutputStream;
  stderr: OutputStream;
}

export interface RunOptions {
  io?: CliIO;
  cwd?: string;
  env?: Record<string, string | undefined>;
}

interface CompileCommandOptions {
  output?: string;
  evaluate?: boolean;
  verbose?: boolean;
  color: boolean;
}

/**
 * Compile one expression, writing assembly (or its exit status) on success and
 * a diagnostic on failure. Returns the exit status.
 */
function compileExpression(
  expressions: string[],
  options: CompileCommandOptions,
  context: { name: string; io: CliIO; config: ExprccConfig },
): number {
  const { io, config } = context;

  const logger: Logger = createLogger({
    environment: config.environment,
    minLevel: options.verbose ? 'debug' : config.logLevel,
    sink: (line) => io.stderr.write(`${line}\n`),
  }).child({ command: context.name });

  const reporter = new Reporter(io.stderr, {
    color: options.color && config.color && io.stderr.isTTY === true,
  });

  if (expressions.length !== 1) {
    logger.debug('usage_error', { arguments: expressions.length });
    return reporter.report(`${context.name}: wrong number of arguments`);
  }

  const expression = expressions[0];

  try {
    if (options.evaluate) {
      const result = evaluate(expression, { logger });
      io.stdout.write(`${result.exitStatus}\n`);
      return EXIT_SUCCESS;
    }

    const assembly = compile(expression, { logger });

    if (options.output) {
      fs.writeFileSync(options.output, assembly);
      logger.info('assembly_written', { path: options.output });
    } else {
      io.stdout.write(assembly);
    }
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof ExpressionError) {
      logger.debug('compile_failed', { kind: error.kind, reason: error.reason });
      return reporter.reportAt(error);
    }
    if (error instanceof Error) {
      logger.debug('command_failed', { error });
      return reporter.report(`${context.name}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Build the exprcc command. The action records its exit status through
 * `onExit`; commander's own exits are turned into thrown CommanderErrors.
 */
export function createProgram(
  io: CliIO,
  config: ExprccConfig,
  onExit: (status: number) => void,
): Command {
  const program = new Command();

  program
    .name('exprcc')
    .description('Compile an integer +/- expression to x86-64 assembly')
    .version(VERSION)
    .argument('[expression...]', 'Expression to compile, e.g. "5+20-4"', [])
    .option('-o, --output <file>', 'Write assembly to a file instead of stdout')
    .option('--evaluate', 'Print the exit status the compiled program returns')
    .option('--verbose', 'Log pipeline events to stderr')
    .option('--no-color', 'Disable colored output')
    // Expressions such as "-1" that follow other options reach the compiler too
    .allowUnknownOption()
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })
    .action((expressions: string[], options: CompileCommandOptions) => {
      onExit(compileExpression(expressions, options, { name: program.name(), io, config }));
    });

  return program;
}

/**
 * A lone argument that is not one of the program's options is the expression,
 * even when it starts with "-": `exprcc --` compiles "--" instead of ending
 * the options.
 */
function expressionArgv(program: Command, argv: string[]): string[] {
  const args = argv.slice(2);
  if (args.length !== 1) {
    return argv;
  }

  const [arg] = args;
  const isOption =
    arg === '-h' ||
    arg === '--help' ||
    program.options.some((option) => option.short === arg || option.long === arg);
  return isOption ? argv : [...argv.slice(0, 2), '--', arg];
}

/**
 * Run the CLI against a full argv (`[node, script, ...args]`) and return the
 * exit status
 */
export function run(argv: string[], options: RunOptions = {}): number {
  const io = options.io ?? { stdout: process.stdout, stderr: process.stderr };
  const config = loadConfig(options.cwd, options.env);

  let status = EXIT_SUCCESS;
  const program = createProgram(io, config, (code) => {
    status = code;
  });

  try {
    program.parse(expressionArgv(program, argv));
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return status;
}
