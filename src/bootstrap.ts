/**
 * Bootstrap
 * Orchestrator wired with the agent modules named in configuration
 */

import { loadConfig } from './config/index.js';
import { registerAgentModules } from './agents/modules.js';
import { createOrchestrator, type Orchestrator } from './orchestrator/Orchestrator.js';

export async function bootstrap(extraModules: readonly string[] = []): Promise<Orchestrator> {
  const settings = loadConfig();
  const orchestrator = createOrchestrator({ settings });
  const modules = [...settings.agents.modules, ...extraModules];

  if (modules.length > 0) {
    const names = await registerAgentModules(orchestrator, modules);
    orchestrator.context.logger.info({ agents: names }, 'Agent modules loaded');
  } else {
    orchestrator.context.logger.warn('No agent modules configured (AGENT_MODULES is empty)');
  }
  return orchestrator;
}
