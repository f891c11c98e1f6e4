import type { HubStatisticsSnapshot, IntelligenceCapability } from '../types/intelligence.js';

/**
 * Running counters for finished tasks
 */
export class HubStatistics {
  private completed = 0;
  private failed = 0;
  private cancelled = 0;
  private totalExecutionTimeMs = 0;
  private capabilityUsage: Map<IntelligenceCapability, number> = new Map();

  recordCompleted(capability: IntelligenceCapability, executionTimeMs: number): void {
    this.completed++;
    this.totalExecutionTimeMs += Math.max(0, executionTimeMs);
    this.capabilityUsage.set(capability, (this.capabilityUsage.get(capability) ?? 0) + 1);
  }

  recordFailed(): void {
    this.failed++;
  }

  recordCancelled(): void {
    this.cancelled++;
  }

  get completedTasks(): number {
    return this.completed;
  }

  get failedTasks(): number {
    return this.failed;
  }

  /**
   * completed / (completed + failed), or null before anything finished
   */
  successRate(): number | null {
    const finished = this.completed + this.failed;
    return finished === 0 ? null : this.completed / finished;
  }

  /**
   * Capability with the highest usage count. Ties go to the one used first.
   */
  mostUsedCapability(): { capability: IntelligenceCapability; count: number } | undefined {
    let best: { capability: IntelligenceCapability; count: number } | undefined;
    for (const [capability, count] of this.capabilityUsage) {
      if (!best || count > best.count) {
        best = { capability, count };
      }
    }
    return best;
  }

  snapshot(): HubStatisticsSnapshot {
    return {
      completedTasks: this.completed,
      failedTasks: this.failed,
      cancelledTasks: this.cancelled,
      totalExecutionTimeMs: this.totalExecutionTimeMs,
      averageExecutionTimeMs: this.completed === 0 ? 0 : this.totalExecutionTimeMs / this.completed,
      successRate: this.successRate(),
      capabilityUsage: Object.fromEntries(this.capabilityUsage),
    };
  }

  reset(): void {
    this.completed = 0;
    this.failed = 0;
    this.cancelled = 0;
    this.totalExecutionTimeMs = 0;
    this.capabilityUsage.clear();
  }
}
