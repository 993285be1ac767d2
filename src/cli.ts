#!/usr/bin/env node
/**
 * CLI Tool
 * Command-line interface for the analysis pipeline orchestrator
 */

import { startServer } from './api/server.js';
import { bootstrap } from './bootstrap.js';
import { parseCommandLine, parseJsonOption, loadWorkflowFile, type CLIOptions, type OptionValue } from './cli/options.js';
import { OrchestratorError, WorkflowError } from './errors.js';
import type { Orchestrator } from './orchestrator/Orchestrator.js';
import { EventType } from './state/EventBus.js';
import type { Workflow } from './state/models.js';

/**
 * Main CLI entry point
 */
async function main() {
  const cli = parseCommandLine(process.argv.slice(2));

  try {
    await executeCommand(cli);
  } catch (error) {
    if (error instanceof WorkflowError) {
      printWorkflow(error.workflow);
    }
    const message = error instanceof Error ? error.message : String(error);
    const code = error instanceof OrchestratorError ? ` [${error.code}]` : '';
    console.error(`Error${code}: ${message}`);
    process.exit(1);
  }
}

function moduleList(value: OptionValue | undefined): string[] {
  return typeof value === 'string' ? value.split(',').map((entry) => entry.trim()).filter(Boolean) : [];
}

/**
 * Execute CLI command
 */
async function executeCommand(cli: CLIOptions): Promise<void> {
  switch (cli.command) {
    case 'run':
      await cmdRun(cli);
      break;

    case 'task':
      await cmdTask(cli);
      break;

    case 'status':
      await cmdStatus(cli);
      break;

    case 'serve':
      await cmdServe(cli);
      break;

    case 'help':
    case '--help':
    case '-h':
      showHelp();
      break;

    default:
      console.error(`Unknown command: ${cli.command}`);
      showHelp();
      process.exit(1);
  }
}

function watchProgress(orchestrator: Orchestrator): void {
  const events = orchestrator.context.events;
  events.subscribe(EventType.TASK_COMPLETED, ({ task }) => {
    console.log(`  ✓ ${task.stage ?? task.type} (${task.durationMs}ms)`);
  });
  events.subscribe(EventType.TASK_FAILED, ({ task, error }) => {
    console.log(`  ✗ ${task.stage ?? task.type}: ${error}`);
  });
  events.subscribe(EventType.TASK_RETRYING, ({ type, attempt, delayMs }) => {
    console.log(`  ↻ ${type}: retrying after attempt ${attempt} in ${delayMs}ms`);
  });
}

function printWorkflow(workflow: Workflow): void {
  console.log(`\nWorkflow ${workflow.id}: ${workflow.status}`);
  console.log(`  Tasks: ${workflow.completedTasks}/${workflow.totalTasks} completed, ${workflow.failedTasks} failed, ${workflow.skippedTasks} skipped`);
  console.log(`  Quality: ${workflow.qualityScore}`);
  for (const entry of workflow.errors) {
    console.log(`  Task ${entry.taskIndex} (${entry.taskType}): ${entry.error}`);
  }
}

/**
 * Run a workflow file, optionally followed by a narrative
 */
async function cmdRun(cli: CLIOptions): Promise<void> {
  const [file] = cli.args;
  if (!file) {
    console.error('Usage: run <workflow.json> [--narrative] [--agents <module,...>]');
    process.exit(1);
  }

  const tasks = loadWorkflowFile(file);
  const orchestrator = await bootstrap(moduleList(cli.options.agents));
  watchProgress(orchestrator);

  console.log(`\nRunning ${tasks.length} task(s) from ${file}\n`);

  if (cli.options.narrative === true) {
    const result = await orchestrator.executeWorkflowWithNarrative(tasks);
    printWorkflow(result.workflow);
    console.log(`\n=== Narrative (confidence ${result.summary.confidence}) ===\n`);
    console.log(result.summary.headline);
    for (const item of result.summary.actionItems) {
      console.log(`  - ${item}`);
    }
  } else {
    const workflow = await orchestrator.executeWorkflow(tasks);
    printWorkflow(workflow);
  }

  const status = orchestrator.getStatus();
  console.log(`\nHealth: ${status.healthScore} | Quality: ${status.qualityScore}`);
  orchestrator.shutdown();
}

/**
 * Run a single task
 */
async function cmdTask(cli: CLIOptions): Promise<void> {
  const [type] = cli.args;
  if (!type) {
    console.error('Usage: task <type> [--params <json>] [--critical] [--agents <module,...>]');
    process.exit(1);
  }

  const orchestrator = await bootstrap(moduleList(cli.options.agents));
  watchProgress(orchestrator);

  const task = await orchestrator.executeTask({
    type,
    parameters: parseJsonOption(cli.options.params, 'params'),
    critical: cli.options.critical === true,
  });

  console.log(JSON.stringify({ id: task.id, stage: task.stage, status: task.status, result: task.result }, null, 2));
  orchestrator.shutdown();
}

async function cmdStatus(cli: CLIOptions): Promise<void> {
  const orchestrator = await bootstrap(moduleList(cli.options.agents));
  const status = orchestrator.getStatus();

  console.log(`\n=== ${status.name} v${status.version} ===\n`);
  console.log(`Status: ${status.status}`);
  console.log(`Health Score: ${status.healthScore}`);
  console.log(`Quality Score: ${status.qualityScore}`);
  console.log(`Agents Registered: ${status.agentsRegistered}`);
  for (const name of orchestrator.listAgents()) {
    console.log(`  - ${name}`);
  }
}

async function cmdServe(cli: CLIOptions): Promise<void> {
  const orchestrator = await bootstrap(moduleList(cli.options.agents));
  const port = typeof cli.options.port === 'string' ? parseInt(cli.options.port, 10) : undefined;
  const host = typeof cli.options.host === 'string' ? cli.options.host : undefined;
  await startServer(orchestrator, { host, port });
}

function showHelp(): void {
  console.log(`
Analysis pipeline orchestrator

Usage:
  pipeline-orchestrator <command> [options]

Commands:
  run <workflow.json>   Run a workflow file (array of tasks or { "tasks": [...] })
      --narrative       Generate a narrative over the workflow results
  task <type>           Run a single task
      --params <json>   Task parameters as a JSON object
      --critical        Mark the task critical
  status                Show orchestrator status and registered agents
  serve                 Start the HTTP API
      --host <host>     Override API_HOST
      --port <port>     Override API_PORT
  help                  Show this help

Common options:
  --agents <paths>      Extra agent modules (comma separated), added to AGENT_MODULES

Stages (in pipeline order):
  load_data, explore_data, aggregate_data, detect_anomalies, predict,
  get_recommendations, generate_narrative, visualize_data, generate_report
`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
