/**
 * Agent Registry
 * Named agent handles with duplicate protection
 */

import { AgentNotFoundError, DuplicateAgentError, InvalidAgentError } from '../errors.js';
import { childLogger, type Logger } from '../monitoring/logger.js';
import { isAnalysisAgent, type AnalysisAgent } from '../agents/types.js';
import type { OrchestratorContext } from './context.js';
import { EventType } from '../state/EventBus.js';

export interface RegistrySummary {
  totalAgents: number;
  agentNames: string[];
}

export class AgentRegistry {
  private agents: Map<string, AnalysisAgent> = new Map();
  private logger: Logger;

  constructor(private readonly context: OrchestratorContext) {
    this.logger = childLogger(context.logger, { component: 'AgentRegistry' });
  }

  /**
   * Register an agent under a name. Fails without side effects on a
   * duplicate name or an agent without a `name`.
   */
  register(name: string, agent: unknown): void {
    try {
      if (!name || !name.trim()) {
        throw new InvalidAgentError('Agent name must be a non-empty string');
      }
      if (this.agents.has(name)) {
        throw new DuplicateAgentError(name);
      }
      if (!isAnalysisAgent(agent)) {
        throw new InvalidAgentError(`Agent '${name}' must expose a non-empty string 'name'`, { agentName: name });
      }

      this.agents.set(name, agent);
    } catch (error) {
      this.context.errors.recordError(error, { workerName: 'AgentRegistry', context: { agentName: name } });
      throw error;
    }

    this.context.errors.trackSuccess('AgentRegistry', 'register', { agentName: name });
    this.context.events.publish(EventType.AGENT_REGISTERED, { name });
    this.logger.info({ agentName: name, total: this.agents.size }, 'Agent registered');
  }

  /**
   * Agent handle, or undefined when nothing is registered under the name
   */
  get(name: string): AnalysisAgent | undefined {
    return this.agents.get(name);
  }

  getOrFail(name: string): AnalysisAgent {
    const agent = this.agents.get(name);
    if (!agent) {
      throw new AgentNotFoundError(name);
    }
    return agent;
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  /** Names in registration order */
  list(): string[] {
    return Array.from(this.agents.keys());
  }

  count(): number {
    return this.agents.size;
  }

  getSummary(): RegistrySummary {
    return {
      totalAgents: this.agents.size,
      agentNames: this.list(),
    };
  }
}
