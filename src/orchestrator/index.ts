/**
 * Orchestrator Module Exports
 */

export {
  Orchestrator,
  createOrchestrator,
  ORCHESTRATOR_NAME,
  ORCHESTRATOR_VERSION,
  type HealthReport,
  type OrchestratorOptions,
  type OrchestratorStatus,
  type PipelineResult,
  type ResetOptions,
  type ResetResult,
  type ShutdownResult,
} from './Orchestrator.js';
export { AgentRegistry } from './AgentRegistry.js';
export { DataManager, type DataSource, type DatasetLoader, type ResolvedData } from './DataManager.js';
export { TaskRouter, type TaskExecution } from './TaskRouter.js';
export { WorkflowExecutor, validateWorkflow, workflowQuality, type WorkflowRun } from './WorkflowExecutor.js';
export {
  NarrativeIntegrator,
  buildNarrativeInput,
  calculateConfidence,
  parseNarrative,
  summarizeNarrative,
  validateNarrative,
  type EnrichedNarrative,
  type Narrative,
} from './NarrativeIntegrator.js';
export { createContext, type OrchestratorContext } from './context.js';
export {
  STAGES,
  STAGE_AGENTS,
  DEFAULT_DATA_KEY,
  assertPipelineOrder,
  parseStage,
  type AgentName,
  type Stage,
} from './pipeline.js';
export * from '../errors.js';
export * from '../agents/types.js';
export { BaseAgent } from '../agents/BaseAgent.js';
export { registerAgentModules, loadAgentModule } from '../agents/modules.js';
export { EventBus, EventType } from '../state/EventBus.js';
export * from '../state/models.js';
