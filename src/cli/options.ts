/**
 * CLI option parsing and workflow file loading
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { ValidationError } from '../errors.js';

export type OptionValue = string | boolean;

export interface CLIOptions {
  command: string;
  args: string[];
  options: Record<string, OptionValue>;
}

/**
 * Parse command options: `--key value` or a bare `--flag`
 */
export function parseOptions(args: string[]): Record<string, OptionValue> {
  const options: Record<string, OptionValue> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const nextArg = args[i + 1];
      if (nextArg !== undefined && !nextArg.startsWith('--')) {
        options[key] = nextArg;
        i++;
      } else {
        options[key] = true;
      }
    }
  }

  return options;
}

/** Positional arguments, skipping option names and their values */
export function positionals(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const nextArg = args[i + 1];
      if (nextArg !== undefined && !nextArg.startsWith('--')) {
        i++;
      }
      continue;
    }
    result.push(arg);
  }
  return result;
}

export function parseCommandLine(argv: string[]): CLIOptions {
  const [command, ...commandArgs] = argv;
  return {
    command: command || 'help',
    args: positionals(commandArgs),
    options: parseOptions(commandArgs),
  };
}

/**
 * Parse a JSON object given on the command line (e.g. --params)
 */
export function parseJsonOption(value: OptionValue | undefined, name: string): Record<string, unknown> {
  if (typeof value !== 'string') {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new ValidationError(`--${name} must be valid JSON`, { cause: error });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(`--${name} must be a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Read a workflow file: a JSON array of tasks or an object with a `tasks` array
 */
export function loadWorkflowFile(filePath: string, baseDir: string = process.cwd()): unknown[] {
  const fullPath = resolve(baseDir, filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Cannot read workflow file ${filePath}`, { cause: error, context: { fullPath } });
  }

  if (Array.isArray(parsed)) {
    return parsed;
  }
  if (typeof parsed === 'object' && parsed !== null) {
    const tasks: unknown = Reflect.get(parsed, 'tasks');
    if (Array.isArray(tasks)) {
      return tasks;
    }
  }
  throw new ValidationError(`Workflow file ${filePath} must contain a task array or { "tasks": [...] }`);
}
