/**
 * Quality Tracker
 * Success / partial / failure counters and the derived quality and health scores
 */

export type HealthStatus = 'healthy' | 'degraded' | 'critical';

export interface QualitySummary {
  qualityScore: number;
  tasks: {
    successful: number;
    partial: number;
    failed: number;
    total: number;
  };
  errors: {
    byType: Record<string, number>;
    total: number;
  };
}

const ERROR_PENALTY = 5;
const MAX_ERROR_PENALTY = 30;

function round(value: number, digits: number): number {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
}

/**
 * Health on a 0-100 scale: quality minus 5 points per error, capped at 30
 */
export function computeHealthScore(qualityScore: number, errorCount: number): number {
  const penalty = Math.min(Math.max(errorCount, 0) * ERROR_PENALTY, MAX_ERROR_PENALTY);
  const raw = qualityScore * 100 - penalty;
  return round(Math.min(100, Math.max(0, raw)), 2);
}

export function healthStatus(healthScore: number): HealthStatus {
  if (healthScore >= 80) return 'healthy';
  if (healthScore >= 50) return 'degraded';
  return 'critical';
}

export class QualityTracker {
  private successful = 0;
  private partial = 0;
  private failed = 0;
  private errorTypes: Map<string, number> = new Map();

  recordSuccess(): void {
    this.successful++;
  }

  recordPartial(): void {
    this.partial++;
  }

  recordFailure(): void {
    this.failed++;
  }

  recordErrorType(type: string): void {
    this.errorTypes.set(type, (this.errorTypes.get(type) ?? 0) + 1);
  }

  get total(): number {
    return this.successful + this.partial + this.failed;
  }

  /**
   * (successful + 0.5 * partial) / total, 1.0 before anything is recorded
   */
  score(): number {
    const total = this.total;
    if (total === 0) {
      return 1.0;
    }
    return round((this.successful + 0.5 * this.partial) / total, 3);
  }

  healthScore(errorCount: number): number {
    return computeHealthScore(this.score(), errorCount);
  }

  getSummary(): QualitySummary {
    const byType = Object.fromEntries(this.errorTypes);
    let errorTotal = 0;
    for (const count of this.errorTypes.values()) {
      errorTotal += count;
    }

    return {
      qualityScore: this.score(),
      tasks: {
        successful: this.successful,
        partial: this.partial,
        failed: this.failed,
        total: this.total,
      },
      errors: {
        byType,
        total: errorTotal,
      },
    };
  }

  reset(): void {
    this.successful = 0;
    this.partial = 0;
    this.failed = 0;
    this.errorTypes.clear();
  }
}
