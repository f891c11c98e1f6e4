/**
 * Insight Generator
 *
 * Applies the insight rules and keeps a bounded list of what they emit. Past
 * capacity the oldest insight (by generatedAt) is evicted. Every stored
 * insight is pushed to subscribers.
 */

import type {
  InsightDraft,
  InsightListener,
  IntelligenceCapability,
  IntelligenceInsight,
  IntelligenceTask,
} from '../types/intelligence.js';
import { logger } from '../utils/logger.js';
import type { HubStatistics } from './hub-statistics.js';
import { insightsForStatistics, insightsForTask } from './insight-rules.js';
import { ListenerSet } from './listener-set.js';

const log = logger.insights;

export const DEFAULT_INSIGHT_CAPACITY = 50;

export interface InsightGeneratorOptions {
  capacity?: number;
  now?: () => number;
}

export class InsightGenerator {
  private insights: IntelligenceInsight[] = [];
  private readonly listeners = new ListenerSet<IntelligenceInsight>(log, 'Insight');
  private readonly capacity: number;
  private readonly now: () => number;

  constructor(options: InsightGeneratorOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_INSIGHT_CAPACITY);
    this.now = options.now ?? Date.now;
  }

  /**
   * Apply the per-capability rule to a completed task
   */
  fromTask(task: IntelligenceTask): IntelligenceInsight[] {
    if (task.status !== 'completed') {
      return [];
    }
    return this.addAll(insightsForTask(task));
  }

  /**
   * Apply the aggregate rules to the hub's statistics
   */
  fromStatistics(statistics: HubStatistics): IntelligenceInsight[] {
    return this.addAll(insightsForStatistics(statistics));
  }

  add(draft: InsightDraft): IntelligenceInsight {
    const generatedAt = this.now();
    const insight: IntelligenceInsight = {
      ...draft,
      id: `${draft.category}_${generatedAt}_${Math.random().toString(36).substring(2, 11)}`,
      generatedAt,
    };

    if (this.insights.length >= this.capacity) {
      this.evictOldest();
    }
    this.insights.push(insight);
    log.info('Insight generated', {
      insightId: insight.id,
      category: insight.category,
      confidence: insight.confidence,
    });
    this.listeners.emit(insight);
    return insight;
  }

  /**
   * Stored insights in insertion order
   */
  list(category?: IntelligenceCapability): IntelligenceInsight[] {
    return category === undefined
      ? [...this.insights]
      : this.insights.filter((insight) => insight.category === category);
  }

  get size(): number {
    return this.insights.length;
  }

  subscribe(listener: InsightListener): () => void {
    return this.listeners.subscribe(listener);
  }

  clear(): void {
    this.insights = [];
  }

  /**
   * Drop subscribers as well as stored insights
   */
  dispose(): void {
    this.clear();
    this.listeners.clear();
  }

  private addAll(drafts: InsightDraft[]): IntelligenceInsight[] {
    return drafts.map((draft) => this.add(draft));
  }

  private evictOldest(): void {
    let oldest = 0;
    for (let i = 1; i < this.insights.length; i++) {
      if (this.insights[i].generatedAt < this.insights[oldest].generatedAt) {
        oldest = i;
      }
    }
    const [evicted] = this.insights.splice(oldest, 1);
    log.debug('Insight evicted', { insightId: evicted?.id });
  }
}
