/**
 * Orchestrator Context
 * Settings and shared trackers passed to every component
 */

import { loadConfig, type Config } from '../config/index.js';
import { createLogger, type Logger } from '../monitoring/logger.js';
import { ErrorIntelligence } from '../monitoring/ErrorIntelligence.js';
import { QualityTracker } from '../monitoring/QualityTracker.js';
import { EventBus } from '../state/EventBus.js';
import { childLogger } from '../monitoring/logger.js';

export interface OrchestratorContext {
  settings: Config;
  logger: Logger;
  errors: ErrorIntelligence;
  quality: QualityTracker;
  events: EventBus;
}

export interface ContextOptions {
  settings?: Config;
  logger?: Logger;
}

export function createContext(options: ContextOptions = {}): OrchestratorContext {
  const settings = options.settings ?? loadConfig();
  const logger =
    options.logger ??
    createLogger('orchestrator', {
      level: settings.monitoring.logLevel,
      pretty: settings.monitoring.logPretty,
    });

  return {
    settings,
    logger,
    errors: new ErrorIntelligence(childLogger(logger, { component: 'ErrorIntelligence' }), settings.monitoring.errorHistoryLimit),
    quality: new QualityTracker(),
    events: new EventBus(childLogger(logger, { component: 'EventBus' })),
  };
}
