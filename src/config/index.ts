/**
 * Configuration Management
 * Loads orchestrator settings from environment variables
 */

import dotenv from 'dotenv';

// Load .env file
dotenv.config();

export interface RetryConfig {
  taskAttempts: number;
  workflowTaskAttempts: number;
  narrativeAttempts: number;
  backoffFactor: number;
  initialDelayMs: number;
}

export interface APIConfig {
  host: string;
  port: number;
}

export interface MonitoringConfig {
  logLevel: string;
  logPretty: boolean;
  errorHistoryLimit: number;
}

export interface AgentsConfig {
  modules: string[];
}

export interface Config {
  retry: RetryConfig;
  api: APIConfig;
  monitoring: MonitoringConfig;
  agents: AgentsConfig;
}

function readInt(name: string, fallback: number, min: number): number {
  const parsed = parseInt(process.env[name] || String(fallback), 10);
  return Number.isNaN(parsed) ? fallback : Math.max(parsed, min);
}

function readFloat(name: string, fallback: number, min: number): number {
  const parsed = parseFloat(process.env[name] || String(fallback));
  return Number.isNaN(parsed) ? fallback : Math.max(parsed, min);
}

/**
 * Get configuration from environment variables
 */
export function getConfig(): Config {
  return {
    retry: {
      taskAttempts: readInt('RETRY_TASK_ATTEMPTS', 3, 1),
      workflowTaskAttempts: readInt('RETRY_WORKFLOW_TASK_ATTEMPTS', 2, 1),
      narrativeAttempts: readInt('RETRY_NARRATIVE_ATTEMPTS', 2, 1),
      backoffFactor: readFloat('RETRY_BACKOFF_FACTOR', 2, 1),
      initialDelayMs: readInt('RETRY_INITIAL_DELAY_MS', 1000, 0),
    },
    api: {
      host: process.env.API_HOST || '0.0.0.0',
      port: readInt('API_PORT', 3000, 0),
    },
    monitoring: {
      logLevel: process.env.LOG_LEVEL || 'info',
      logPretty: process.env.LOG_PRETTY !== 'false',
      errorHistoryLimit: readInt('ERROR_HISTORY_LIMIT', 1000, 1),
    },
    agents: {
      modules: (process.env.AGENT_MODULES || '')
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0),
    },
  };
}

// Singleton instance
let config: Config | null = null;

export function loadConfig(): Config {
  if (!config) {
    config = getConfig();
  }
  return config;
}
