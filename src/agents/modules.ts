/**
 * Agent Modules
 * Loads agent plug-ins from ES modules listed in configuration
 */

import { isAbsolute, resolve } from 'path';
import { pathToFileURL } from 'url';
import { InvalidAgentError } from '../errors.js';
import type { Orchestrator } from '../orchestrator/Orchestrator.js';
import { isAnalysisAgent, type AnalysisAgent } from './types.js';

/** Shape of a plug-in module's default export (or one element of it) */
export interface AgentModuleEntry {
  name: string;
  agent: AnalysisAgent;
}

export function isAgentModuleEntry(value: unknown): value is AgentModuleEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const name = Reflect.get(value, 'name');
  return typeof name === 'string' && name.length > 0 && isAnalysisAgent(Reflect.get(value, 'agent'));
}

/**
 * Import one module and return the agents it exports
 */
export async function loadAgentModule(modulePath: string, baseDir: string = process.cwd()): Promise<AgentModuleEntry[]> {
  const fullPath = isAbsolute(modulePath) ? modulePath : resolve(baseDir, modulePath);
  const loaded: unknown = await import(pathToFileURL(fullPath).href);
  const exported: unknown = typeof loaded === 'object' && loaded !== null ? Reflect.get(loaded, 'default') : undefined;
  const entries: unknown[] = Array.isArray(exported) ? exported : [exported];

  const invalid = entries.findIndex((entry) => !isAgentModuleEntry(entry));
  if (invalid !== -1 || entries.length === 0) {
    throw new InvalidAgentError(
      `Agent module ${modulePath} must default-export { name, agent } or an array of them`,
      { modulePath, entryIndex: invalid }
    );
  }

  return entries.filter(isAgentModuleEntry);
}

/**
 * Load every module and register its agents. Returns the registered names.
 */
export async function registerAgentModules(
  orchestrator: Orchestrator,
  modulePaths: readonly string[],
  baseDir?: string
): Promise<string[]> {
  const registered: string[] = [];
  for (const modulePath of modulePaths) {
    const entries = await loadAgentModule(modulePath, baseDir);
    for (const entry of entries) {
      orchestrator.registerAgent(entry.name, entry.agent);
      registered.push(entry.name);
    }
  }
  return registered;
}
