#!/usr/bin/env node
/**
 * tracegraph CLI - evaluate formula sheets from the command line.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { TracegraphError } from '../core/errors.js';
import type { Sheet } from '../sheet/sheet.js';
import { loadSheetFile, saveSheetFile } from '../storage/files.js';
import {
  collectAssignment,
  formatSnapshot,
  parseAssignment,
  type Assignment,
} from './assignments.js';
import { createConsoleLogger } from './logger.js';

interface SheetCommandOptions {
  set: Assignment[];
  verbose?: boolean;
}

const program = new Command();

program
  .name('tracegraph')
  .description('Lazy, incrementally recomputed formula sheets')
  .version('0.1.0')
  .configureOutput({
    outputError: (message, write) => write(chalk.red(message)),
  });

/**
 * Run a command body, reporting engine errors in red.
 */
function run(action: () => void): void {
  try {
    action();
  } catch (error) {
    if (error instanceof TracegraphError) {
      console.error(chalk.red(error.message));
      process.exit(1);
    }
    throw error;
  }
}

function openSheet(file: string, options: SheetCommandOptions): Sheet {
  const sheet = loadSheetFile(file, {
    logger: createConsoleLogger(options.verbose ?? false),
  });
  for (const { id, value } of options.set) {
    sheet.set(id, value);
  }
  return sheet;
}

/**
 * Read every cell, printing failures per cell. Returns false if any failed.
 */
function printCells(sheet: Sheet): boolean {
  let ok = true;
  for (const id of sheet.ids()) {
    try {
      console.log(`${chalk.cyan(id)} = ${sheet.get(id)}`);
    } catch (error) {
      if (!(error instanceof TracegraphError)) throw error;
      console.log(`${chalk.cyan(id)} ${chalk.red(`! ${error.message}`)}`);
      ok = false;
    }
  }
  return ok;
}

// Eval command
program
  .command('eval <file>')
  .description('Evaluate every cell of a sheet')
  .option('-s, --set <assignment>', 'Assign a source cell before evaluating (id=value)', collectAssignment, [])
  .option('-v, --verbose', 'Log evaluation activity to stderr')
  .action((file: string, options: SheetCommandOptions) => {
    run(() => {
      const sheet = openSheet(file, options);
      if (sheet.name) console.log(chalk.bold(sheet.name));
      if (!printCells(sheet)) process.exit(1);
    });
  });

// Get command
program
  .command('get <file> <id>')
  .description('Print the value of one cell')
  .option('-s, --set <assignment>', 'Assign a source cell before evaluating (id=value)', collectAssignment, [])
  .option('-v, --verbose', 'Log evaluation activity to stderr')
  .action((file: string, id: string, options: SheetCommandOptions) => {
    run(() => {
      const sheet = openSheet(file, options);
      console.log(String(sheet.get(id)));
    });
  });

// Set command
program
  .command('set <file> <assignments...>')
  .description('Assign source cells and save the sheet')
  .action((file: string, assignments: string[]) => {
    run(() => {
      const sheet = openSheet(file, { set: assignments.map(parseAssignment) });
      saveSheetFile(file, sheet);
      console.log(chalk.green(`Updated ${assignments.length} cell(s) in ${file}`));
    });
  });

// Graph command
program
  .command('graph <file>')
  .description('Evaluate a sheet and print its dependency graph')
  .option('-s, --set <assignment>', 'Assign a source cell before evaluating (id=value)', collectAssignment, [])
  .option('--json', 'Print the graph as JSON')
  .option('-v, --verbose', 'Log evaluation activity to stderr')
  .action((file: string, options: SheetCommandOptions & { json?: boolean }) => {
    run(() => {
      const sheet = openSheet(file, options);
      for (const id of sheet.ids()) {
        try {
          sheet.get(id);
        } catch (error) {
          if (!(error instanceof TracegraphError)) throw error;
          console.error(chalk.red(`${id}: ${error.message}`));
        }
      }

      const nodes = sheet.engine.snapshot();
      if (options.json) {
        console.log(JSON.stringify(nodes, null, 2));
        return;
      }
      for (const line of formatSnapshot(nodes)) {
        console.log(line);
      }
    });
  });

program.parse();
