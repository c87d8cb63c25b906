#!/usr/bin/env node
/**
 * Rekord CLI - run a program or start the interactive session
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { formatDiagnostic, formatValue } from 'rekord-core';
import { Session } from './session.js';
import { type CliOptions, debugFromEnv, maxStepsFromEnv, parseMaxSteps } from './options.js';

/**
 * Run a whole program and print the final stack, top first
 */
function runProgram(session: Session, source: string): void {
  const { stack } = session.runSource(source);
  for (let i = stack.length - 1; i >= 0; i--) {
    console.log(formatValue(stack[i]));
  }
}

function startRepl(session: Session): void {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log(session.feed('%help').output.join('\n'));
  rl.setPrompt(session.prompt);
  rl.prompt();

  rl.on('line', (line) => {
    const { output, status } = session.feed(line);
    for (const text of output) {
      console.log(text);
    }
    if (status === 'exit') {
      rl.close();
      return;
    }
    rl.setPrompt(session.prompt);
    rl.prompt();
  });

  rl.on('SIGINT', () => {
    console.log("\nEnter the command '%exit' to exit.");
    rl.prompt();
  });
}

const program = new Command();

program
  .name('rekord')
  .description('Compiler and virtual machine for a tiny language of records and closures')
  .version('0.1.0')
  .option('-e, --eval <source>', 'Run the given source instead of a file')
  .option('-d, --debug', 'Trace every instruction to stderr', debugFromEnv())
  .option('--max-steps <n>', 'Abort a run after n instructions', parseMaxSteps, maxStepsFromEnv())
  .argument('[file]', 'Program file to run')
  .action((file: string | undefined, options: CliOptions) => {
    const session = new Session({ debug: options.debug, maxSteps: options.maxSteps });

    try {
      if (options.eval !== undefined) {
        runProgram(session, options.eval);
      } else if (file) {
        const source = fs.readFileSync(path.resolve(file), 'utf-8');
        runProgram(session, source);
      } else {
        startRepl(session);
      }
    } catch (error) {
      console.error(`Error: ${formatDiagnostic(error)}`);
      if (process.env.DEBUG && error instanceof Error) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

program.parse();
