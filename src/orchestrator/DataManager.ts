/**
 * Data Manager
 * Key-value cache shared by pipeline stages, and dataset resolution for tasks
 */

import { DataUnavailableError } from '../errors.js';
import { childLogger, type Logger } from '../monitoring/logger.js';
import { isNonEmptyDataset, type Dataset } from '../state/models.js';
import { DEFAULT_DATA_KEY } from './pipeline.js';
import type { OrchestratorContext } from './context.js';

export type DataSource = 'inline' | 'data_key' | 'default' | 'file';

export interface ResolvedData {
  data: Dataset;
  source: DataSource;
  key?: string;
}

/** Loads a dataset from a file path; used as the last resolution step */
export type DatasetLoader = (filePath: string) => Promise<unknown>;

export interface DataSummary {
  totalItems: number;
  keys: string[];
  dataTypes: Record<string, string>;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export class DataManager {
  private cache: Map<string, unknown> = new Map();
  private logger: Logger;

  constructor(context: OrchestratorContext) {
    this.logger = childLogger(context.logger, { component: 'DataManager' });
  }

  set(key: string, value: unknown): void {
    this.cache.set(key, value);
    this.logger.debug({ key, type: describeType(value) }, 'Data cached');
  }

  get(key: string): unknown {
    return this.cache.get(key);
  }

  getOrDefault(key: string, fallback: unknown): unknown {
    return this.cache.has(key) ? this.cache.get(key) : fallback;
  }

  has(key: string): boolean {
    return this.cache.has(key);
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    const count = this.cache.size;
    this.cache.clear();
    this.logger.debug({ count }, 'Cache cleared');
  }

  /** Keys in insertion order */
  listKeys(): string[] {
    return Array.from(this.cache.keys());
  }

  count(): number {
    return this.cache.size;
  }

  /**
   * Cached value as a dataset, or undefined when absent or not tabular
   */
  getDataset(key: string): Dataset | undefined {
    const value = this.cache.get(key);
    return isNonEmptyDataset(value) ? value : undefined;
  }

  getSummary(): DataSummary {
    const dataTypes: Record<string, string> = {};
    for (const [key, value] of this.cache) {
      dataTypes[key] = describeType(value);
    }
    return {
      totalItems: this.cache.size,
      keys: this.listKeys(),
      dataTypes,
    };
  }

  /**
   * Resolve the working dataset for a task. Tried in order:
   * inline `data`, cache entry named by `data_key`, the default key,
   * then `file_path` through the loader (result cached under the default key).
   * First non-empty dataset wins.
   */
  async resolveForTask(params: Record<string, unknown>, loader?: DatasetLoader): Promise<ResolvedData> {
    const inline = params.data;
    if (isNonEmptyDataset(inline)) {
      return { data: inline, source: 'inline' };
    }

    const dataKey = params.data_key;
    if (typeof dataKey === 'string' && dataKey.length > 0) {
      const keyed = this.getDataset(dataKey);
      if (keyed) {
        return { data: keyed, source: 'data_key', key: dataKey };
      }
    }

    const cached = this.getDataset(DEFAULT_DATA_KEY);
    if (cached) {
      return { data: cached, source: 'default', key: DEFAULT_DATA_KEY };
    }

    const filePath = params.file_path;
    let loadError: unknown;
    if (typeof filePath === 'string' && filePath.length > 0 && loader) {
      try {
        const loaded = await loader(filePath);
        if (isNonEmptyDataset(loaded)) {
          this.set(DEFAULT_DATA_KEY, loaded);
          return { data: loaded, source: 'file', key: DEFAULT_DATA_KEY };
        }
      } catch (error) {
        loadError = error;
        this.logger.warn({ filePath, err: error }, 'Loading data for task failed');
      }
    }

    throw new DataUnavailableError(
      {
        hasInlineData: inline !== undefined,
        dataKey: typeof dataKey === 'string' ? dataKey : undefined,
        filePath: typeof filePath === 'string' ? filePath : undefined,
      },
      loadError
    );
  }

  /**
   * Like resolveForTask, but yields undefined instead of throwing
   */
  async findForTask(params: Record<string, unknown>, loader?: DatasetLoader): Promise<ResolvedData | undefined> {
    try {
      return await this.resolveForTask(params, loader);
    } catch (error) {
      if (error instanceof DataUnavailableError) {
        return undefined;
      }
      throw error;
    }
  }
}
