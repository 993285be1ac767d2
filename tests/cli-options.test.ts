/**
 * CLI argument parsing
 */

import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';
import { loadWorkflowFile, parseCommandLine, parseJsonOption, parseOptions } from '../src/cli/options.js';
import { ValidationError } from '../src/errors.js';

const fixtures = fileURLToPath(new URL('./fixtures', import.meta.url));

describe('parseCommandLine', () => {
  it('should split command, positionals and options', () => {
    expect(parseCommandLine(['run', 'workflow.json', '--narrative', '--agents', 'agents.js'])).toEqual({
      command: 'run',
      args: ['workflow.json'],
      options: { narrative: true, agents: 'agents.js' },
    });
  });

  it('should default to help', () => {
    expect(parseCommandLine([]).command).toBe('help');
  });

  it('should treat an option followed by another option as a flag', () => {
    expect(parseOptions(['--critical', '--params', '{}'])).toEqual({ critical: true, params: '{}' });
  });
});

describe('parseJsonOption', () => {
  it('should parse JSON objects', () => {
    expect(parseJsonOption('{"column":"amount","threshold":2}', 'params')).toEqual({ column: 'amount', threshold: 2 });
    expect(parseJsonOption(undefined, 'params')).toEqual({});
    expect(parseJsonOption(true, 'params')).toEqual({});
  });

  it('should reject invalid JSON and non-objects', () => {
    expect(() => parseJsonOption('{column', 'params')).toThrow('--params must be valid JSON');
    expect(() => parseJsonOption('[1, 2]', 'params')).toThrow('--params must be a JSON object');
    expect(() => parseJsonOption('null', 'params')).toThrow(ValidationError);
  });
});

describe('loadWorkflowFile', () => {
  it('should read a task array', () => {
    expect(loadWorkflowFile('workflow.json', fixtures)).toEqual([
      { type: 'load_data', parameters: { file_path: 'sales.csv' }, critical: true },
      { type: 'explore_data' },
    ]);
  });

  it('should read an object with tasks', () => {
    expect(loadWorkflowFile('workflow-object.json', fixtures)).toEqual([
      { type: 'load_data', parameters: { file_path: 'sales.csv' } },
    ]);
  });

  it('should reject other shapes and missing files', () => {
    expect(() => loadWorkflowFile('not-a-workflow.json', fixtures)).toThrow(
      'Workflow file not-a-workflow.json must contain a task array or { "tasks": [...] }'
    );
    expect(() => loadWorkflowFile('missing.json', fixtures)).toThrow('Cannot read workflow file missing.json');
  });
});
