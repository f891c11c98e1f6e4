/**
 * Insight Rules
 *
 * Pure functions turning a completed task, or the hub's running statistics,
 * into insight drafts. Per-task rules are keyed by capability; a capability
 * without a rule yields nothing.
 */

import {
  isTaskData,
  type InsightDraft,
  type IntelligenceCapability,
  type IntelligenceTask,
  type TaskData,
} from '../types/intelligence.js';
import type { HubStatistics } from './hub-statistics.js';

export type TaskInsightRule = (task: IntelligenceTask) => InsightDraft[];

// ============================================
// THRESHOLDS
// ============================================

export const PERFORMANCE_SCORE_THRESHOLD = 0.7;
export const THREAT_SCORE_THRESHOLD = 50;
export const ACCESSIBILITY_SCORE_THRESHOLD = 0.8;
export const USAGE_TREND_THRESHOLD = 10;
export const SUCCESS_RATE_MIN_COMPLETED = 20;
export const SUCCESS_RATE_THRESHOLD = 0.8;

function finiteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

// ============================================
// PER-TASK RULES
// ============================================

export function performanceRule(task: IntelligenceTask): InsightDraft[] {
  const score = finiteNumber(task.result.coreWebVitalsScore);
  if (score === undefined || score >= PERFORMANCE_SCORE_THRESHOLD) {
    return [];
  }
  return [
    {
      title: 'Performance Optimization Opportunity',
      description: `Page performance is below optimal levels (${Math.trunc(score * 100)}%)`,
      category: 'performance',
      confidence: 0.9,
      data: { ...task.result },
      recommendations: [
        'Enable performance mode',
        'Optimize images and resources',
        'Reduce JavaScript execution time',
        'Improve server response time',
      ],
      actionable: true,
    },
  ];
}

export function securityRule(task: IntelligenceTask): InsightDraft[] {
  const threatScore = finiteNumber(task.result.threatScore);
  if (threatScore === undefined || threatScore <= THREAT_SCORE_THRESHOLD) {
    return [];
  }
  return [
    {
      title: 'Security Threats Detected',
      description: `Potential security threats found on this page (threat score ${threatScore})`,
      category: 'security',
      confidence: 0.95,
      data: { ...task.result },
      recommendations: [
        'Enable strict security mode',
        'Block suspicious scripts',
        'Use HTTPS-only mode',
        'Enable tracking protection',
      ],
      actionable: true,
    },
  ];
}

/**
 * Page data of a web analysis: the nested pageIntelligence block when the
 * handler returned one, otherwise the whole result
 */
export function pageDataOf(result: Readonly<TaskData>): Readonly<TaskData> {
  const nested = result.pageIntelligence;
  return isTaskData(nested) ? nested : result;
}

export function webAnalysisRule(task: IntelligenceTask): InsightDraft[] {
  const page = pageDataOf(task.result);
  const drafts: InsightDraft[] = [];

  const forms = page.forms;
  if (Array.isArray(forms) && forms.length > 0) {
    drafts.push({
      title: 'Forms Detected',
      description: `Found ${forms.length} form(s) that can be automated`,
      category: 'automation',
      confidence: 0.8,
      data: { forms },
      recommendations: [
        'Enable smart autofill',
        'Create automation shortcuts',
        'Save form templates',
      ],
      actionable: true,
    });
  }

  const accessibility = page.accessibility;
  const score = isTaskData(accessibility) ? (finiteNumber(accessibility.score) ?? 1.0) : 1.0;
  if (score < ACCESSIBILITY_SCORE_THRESHOLD) {
    drafts.push({
      title: 'Accessibility Issues Found',
      description: `Page accessibility score is ${Math.trunc(score * 100)}%`,
      category: 'accessibility',
      confidence: 0.85,
      data: isTaskData(accessibility) ? { ...accessibility } : {},
      recommendations: [
        'Enable accessibility mode',
        'Add missing alt text',
        'Improve keyboard navigation',
        'Increase color contrast',
      ],
      actionable: true,
    });
  }

  return drafts;
}

export const TASK_INSIGHT_RULES: Partial<Record<IntelligenceCapability, TaskInsightRule>> = {
  performance: performanceRule,
  security: securityRule,
  webAnalysis: webAnalysisRule,
};

export function insightsForTask(task: IntelligenceTask): InsightDraft[] {
  const rule = TASK_INSIGHT_RULES[task.capability];
  return rule ? rule(task) : [];
}

// ============================================
// AGGREGATE RULES
// ============================================

export function usageTrendRule(statistics: HubStatistics): InsightDraft[] {
  const top = statistics.mostUsedCapability();
  if (!top || top.count <= USAGE_TREND_THRESHOLD) {
    return [];
  }
  return [
    {
      title: 'High Usage Pattern Detected',
      description: `${top.capability} has been used ${top.count} times`,
      category: top.capability,
      confidence: 0.8,
      data: { capability: top.capability, count: top.count },
      recommendations: [
        'Create shortcuts for common tasks',
        'Enable auto-optimization for this feature',
        'Consider upgrading to premium features',
      ],
      actionable: true,
    },
  ];
}

export function successRateRule(statistics: HubStatistics): InsightDraft[] {
  const completed = statistics.completedTasks;
  const rate = statistics.successRate();
  if (completed <= SUCCESS_RATE_MIN_COMPLETED || rate === null || rate >= SUCCESS_RATE_THRESHOLD) {
    return [];
  }
  return [
    {
      title: 'Task Success Rate Below Optimal',
      description: `Only ${Math.trunc(rate * 100)}% of tasks are completing successfully`,
      category: 'learning',
      confidence: 0.7,
      data: {
        successRate: rate,
        completedTasks: completed,
        failedTasks: statistics.failedTasks,
      },
      recommendations: [
        'Check network connectivity',
        'Update browser engine',
        'Reset AI models',
        'Contact support if issues persist',
      ],
      actionable: true,
    },
  ];
}

export const AGGREGATE_INSIGHT_RULES: ReadonlyArray<(statistics: HubStatistics) => InsightDraft[]> = [
  usageTrendRule,
  successRateRule,
];

export function insightsForStatistics(statistics: HubStatistics): InsightDraft[] {
  return AGGREGATE_INSIGHT_RULES.flatMap((rule) => rule(statistics));
}
