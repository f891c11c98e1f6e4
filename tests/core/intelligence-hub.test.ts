/**
 * Tests for IntelligenceHub
 *
 * Tests cover:
 * - Task admission, execution and completion
 * - Concurrency cap and dispatch order
 * - Stuck-task reaping
 * - Insight generation
 * - Tab registration and cleanup
 * - Free-text commands
 * - Settings persistence
 * - Shutdown
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { IntelligenceHub, type IntelligenceHubOptions } from '../../src/core/intelligence-hub.js';
import {
  CapabilityDisabledError,
  DuplicateTaskError,
  HubShutdownError,
  TaskValidationError,
} from '../../src/types/errors.js';
import type {
  CapabilityHandler,
  CapabilityHandlerContext,
  IntelligenceTask,
  TaskData,
  TaskPriority,
} from '../../src/types/intelligence.js';
import { ConfigValidationError, DEFAULT_HUB_SETTINGS } from '../../src/utils/config-schemas.js';
import { InMemorySettingsStore } from '../../src/utils/settings-store.js';

const NO_DELAYS: Record<TaskPriority, number> = {
  critical: 0,
  high: 0,
  medium: 0,
  low: 0,
  idle: 0,
};

/** Keeps the tasks queued by registerTab pending */
const HOLD_INITIAL_TASKS = { startDelays: { ...NO_DELAYS, high: 60_000, medium: 60_000 } };

const hubs: IntelligenceHub[] = [];

function createHub(options: IntelligenceHubOptions = {}): IntelligenceHub {
  const hub = new IntelligenceHub({
    ...options,
    timing: { startDelays: NO_DELAYS, ...options.timing },
  });
  hubs.push(hub);
  return hub;
}

interface PendingCall {
  resolve: (result: TaskData) => void;
  reject: (error: Error) => void;
  context: CapabilityHandlerContext;
  parameters: Readonly<TaskData>;
}

/**
 * Handler whose calls stay open until the test settles them
 */
function deferredHandler() {
  const calls = new Map<string, PendingCall>();
  const handler: CapabilityHandler = (_tabId, parameters, context) =>
    new Promise<TaskData>((resolve, reject) => {
      calls.set(context.taskId, { resolve, reject, context, parameters });
    });
  return { handler, calls };
}

function expectTimestampsConsistent(task: IntelligenceTask): void {
  expect(task.startedAt !== undefined).toBe(task.status !== 'pending');
  expect(task.completedAt !== undefined).toBe(
    ['completed', 'failed', 'cancelled'].includes(task.status)
  );
  expect(task.progress).toBeGreaterThanOrEqual(0);
  expect(task.progress).toBeLessThanOrEqual(1);
}

afterEach(() => {
  for (const hub of hubs.splice(0)) {
    hub.shutdown();
  }
});

describe('IntelligenceHub', () => {
  // ============================================
  // EXECUTION
  // ============================================

  describe('task execution', () => {
    it('should run a critical task to completion', async () => {
      const hub = createHub();
      hub.registry.register('performance', async () => ({ coreWebVitalsScore: 0.95 }));

      const taskId = await hub.queueTask({
        tabId: 'tab-1',
        name: 'Performance Check',
        capability: 'performance',
        priority: 'critical',
      });

      expect(taskId).toMatch(/^tab-1_performance_/);
      await vi.waitFor(() => expect(hub.getTask(taskId)?.status).toBe('completed'));

      const task = hub.getTask(taskId);
      expect(task?.progress).toBe(1);
      expect(task?.result).toEqual({ coreWebVitalsScore: 0.95 });
      expect(task?.startedAt).toBeDefined();
      expect(task?.completedAt).toBeGreaterThanOrEqual(task?.startedAt ?? 0);
      expect(hub.getInsights()).toEqual([]);
    });

    it('should fill in defaults for optional request fields', async () => {
      const hub = createHub({ timing: { startDelays: { ...NO_DELAYS, medium: 60_000 } } });

      const taskId = await hub.queueTask({
        id: 'defaults',
        tabId: 'tab-1',
        name: 'Defaults',
        capability: 'webAnalysis',
      });

      expect(taskId).toBe('defaults');
      expect(hub.getTask('defaults')).toMatchObject({
        description: '',
        priority: 'medium',
        status: 'pending',
        parameters: {},
        progress: 0,
        result: {},
      });
    });

    it('should deliver pending, running, progress and completion updates in order', async () => {
      const hub = createHub();
      hub.registry.register('performance', async (_tabId, _parameters, context) => {
        context.reportProgress(0.5);
        return { coreWebVitalsScore: 0.9 };
      });
      const updates: IntelligenceTask[] = [];
      hub.subscribeToTab('tab-1', (task) => updates.push(task));
      const otherTab = vi.fn();
      hub.subscribeToTab('tab-2', otherTab);

      const taskId = await hub.queueTask({
        tabId: 'tab-1',
        name: 'Progress',
        capability: 'performance',
      });
      await vi.waitFor(() => expect(hub.getTask(taskId)?.status).toBe('completed'));

      expect(updates.map((t) => t.status)).toEqual(['pending', 'running', 'running', 'completed']);
      expect(updates.map((t) => t.progress)).toEqual([0, 0, 0.5, 1]);
      updates.forEach(expectTimestampsConsistent);
      expect(otherTab).not.toHaveBeenCalled();
    });

    it('should keep delivering when a subscriber throws', async () => {
      const hub = createHub();
      hub.registry.register('security', async () => ({ threatScore: 0 }));
      hub.subscribeToTab('tab-1', () => {
        throw new Error('subscriber failure');
      });
      const statuses: string[] = [];
      hub.subscribeToTab('tab-1', (task) => statuses.push(task.status));

      const taskId = await hub.queueTask({ tabId: 'tab-1', name: 'Scan', capability: 'security' });
      await vi.waitFor(() => expect(hub.getTask(taskId)?.status).toBe('completed'));

      expect(statuses).toEqual(['pending', 'running', 'completed']);
    });

    it('should stop delivering after unsubscribe', async () => {
      const hub = createHub();
      hub.registry.register('security', async () => ({}));
      const listener = vi.fn();
      const unsubscribe = hub.subscribeToTab('tab-1', listener);
      unsubscribe();

      const taskId = await hub.queueTask({ tabId: 'tab-1', name: 'Scan', capability: 'security' });
      await vi.waitFor(() => expect(hub.getTask(taskId)?.status).toBe('completed'));

      expect(listener).not.toHaveBeenCalled();
    });

    it('should fail a task whose capability has no handler', async () => {
      const hub = createHub();

      const taskId = await hub.queueTask({ tabId: 'tab-1', name: 'Scan', capability: 'security' });
      await vi.waitFor(() => expect(hub.getTask(taskId)?.status).toBe('failed'));

      expect(hub.getTask(taskId)?.error).toContain(
        'No handler registered for capability "security".'
      );
      expect(hub.getStats().failedTasks).toBe(1);
    });

    it('should record a handler rejection on the task', async () => {
      const hub = createHub();
      hub.registry.register('automation', async () => {
        throw new Error('boom');
      });

      const taskId = await hub.queueTask({ tabId: 'tab-1', name: 'Fill', capability: 'automation' });
      await vi.waitFor(() => expect(hub.getTask(taskId)?.status).toBe('failed'));

      expect(hub.getTask(taskId)?.error).toBe('boom');
      expect(hub.getStats()).toMatchObject({ failedTasks: 1, completedTasks: 0, successRate: 0 });
    });

    it('should keep finished tasks queryable by id after they leave the active list', async () => {
      const hub = createHub();
      hub.registry.register('security', async () => ({ threatScore: 10 }));

      const taskId = await hub.queueTask({
        tabId: 't',
        name: 'Scan',
        capability: 'security',
        priority: 'critical',
      });
      await vi.waitFor(() => expect(hub.getTask(taskId)?.status).toBe('completed'));

      expect(hub.getActiveTasks('t')).toEqual([]);
      expect(hub.getTask(taskId)).toMatchObject({ status: 'completed', result: { threatScore: 10 } });
    });

    it('should hand parameters to the handler', async () => {
      const hub = createHub();
      const handler = vi.fn<CapabilityHandler>(async () => ({}));
      hub.registry.register('webAnalysis', handler);

      const taskId = await hub.queueTask({
        tabId: 'tab-7',
        name: 'Analyze',
        capability: 'webAnalysis',
        parameters: { depth: 2 },
      });
      await vi.waitFor(() => expect(hub.getTask(taskId)?.status).toBe('completed'));

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler.mock.calls[0]?.[0]).toBe('tab-7');
      expect(handler.mock.calls[0]?.[1]).toEqual({ depth: 2 });
    });
  });

  // ============================================
  // ADMISSION
  // ============================================

  describe('admission', () => {
    it('should reject a disabled capability without storing anything', async () => {
      const hub = createHub();

      await expect(
        hub.queueTask({ tabId: 'tab-1', name: 'Learn', capability: 'learning' })
      ).rejects.toBeInstanceOf(CapabilityDisabledError);
      await expect(
        hub.queueTask({ tabId: 'tab-1', name: 'Learn', capability: 'learning' })
      ).rejects.toThrow('Capability learning is not enabled');

      expect(hub.getActiveTasks()).toEqual([]);
    });

    it('should validate the request', async () => {
      const hub = createHub();

      await expect(
        hub.queueTask({ tabId: '', name: 'Empty tab', capability: 'performance' })
      ).rejects.toBeInstanceOf(TaskValidationError);
      await expect(
        hub.queueTask({
          tabId: 'tab-1',
          name: 'Negative',
          capability: 'performance',
          estimatedDurationMs: -5,
        })
      ).rejects.toThrow('estimatedDurationMs');
    });

    it('should reject a second unfinished task with the same id', async () => {
      const hub = createHub({ timing: { startDelays: { ...NO_DELAYS, low: 60_000 } } });
      const request = {
        id: 'dup',
        tabId: 'tab-1',
        name: 'Duplicate',
        capability: 'performance' as const,
        priority: 'low' as const,
      };
      await hub.queueTask(request);

      await expect(hub.queueTask(request)).rejects.toBeInstanceOf(DuplicateTaskError);
    });

    it('should return identical results for repeated queries', async () => {
      const hub = createHub({ timing: { startDelays: { ...NO_DELAYS, low: 60_000 } } });
      await hub.queueTask({ tabId: 'tab-1', name: 'A', capability: 'performance', priority: 'low' });
      await hub.queueTask({ tabId: 'tab-2', name: 'B', capability: 'security', priority: 'low' });

      expect(hub.getActiveTasks()).toEqual(hub.getActiveTasks());
      expect(hub.getActiveTasks('tab-2').map((t) => t.name)).toEqual(['B']);
    });
  });

  // ============================================
  // CONCURRENCY
  // ============================================

  describe('concurrency', () => {
    it('should run at most five tasks with default settings', async () => {
      const hub = createHub();
      const { handler, calls } = deferredHandler();
      hub.registry.register('webAnalysis', handler);
      let maxRunning = 0;
      hub.subscribeToTab('tab-1', () => {
        const running = hub.getActiveTasks().filter((t) => t.status === 'running').length;
        maxRunning = Math.max(maxRunning, running);
      });

      for (let i = 0; i < 6; i++) {
        await hub.queueTask({
          id: `task-${i}`,
          tabId: 'tab-1',
          name: `Task ${i}`,
          capability: 'webAnalysis',
        });
      }

      await vi.waitFor(() => expect(calls.size).toBe(5));
      expect(hub.getTask('task-5')?.status).toBe('pending');
      expect(hub.getStats()).toMatchObject({ runningTasks: 5, queuedTasks: 1, activeTasks: 6 });

      calls.get('task-0')?.resolve({});
      await vi.waitFor(() => expect(hub.getTask('task-5')?.status).toBe('running'));

      expect(maxRunning).toBe(5);
    });

    it('should dispatch waiting tasks by priority', async () => {
      const hub = createHub({ settings: { maxConcurrentTasks: 1 } });
      const { handler, calls } = deferredHandler();
      hub.registry.register('webAnalysis', handler);
      const started: string[] = [];
      hub.subscribeToTab('tab-1', (task) => {
        if (task.status === 'running') started.push(task.id);
      });

      await hub.queueTask({ id: 'first', tabId: 'tab-1', name: 'First', capability: 'webAnalysis' });
      await vi.waitFor(() => expect(started).toEqual(['first']));
      await hub.queueTask({
        id: 'idle',
        tabId: 'tab-1',
        name: 'Idle',
        capability: 'webAnalysis',
        priority: 'idle',
      });
      await hub.queueTask({
        id: 'critical',
        tabId: 'tab-1',
        name: 'Critical',
        capability: 'webAnalysis',
        priority: 'critical',
      });
      // let both start delays elapse while the only slot is taken
      await new Promise((resolve) => setTimeout(resolve, 20));
      expect(hub.getStats().queuedTasks).toBe(2);

      calls.get('first')?.resolve({});
      await vi.waitFor(() => expect(started).toEqual(['first', 'critical']));
      calls.get('critical')?.resolve({});
      await vi.waitFor(() => expect(started).toEqual(['first', 'critical', 'idle']));
    });

    it('should start waiting tasks when the cap is raised', async () => {
      const hub = createHub({ settings: { maxConcurrentTasks: 1 } });
      const { handler } = deferredHandler();
      hub.registry.register('webAnalysis', handler);

      await hub.queueTask({ id: 'a', tabId: 'tab-1', name: 'A', capability: 'webAnalysis' });
      await hub.queueTask({ id: 'b', tabId: 'tab-1', name: 'B', capability: 'webAnalysis' });
      await vi.waitFor(() => expect(hub.getTask('a')?.status).toBe('running'));
      expect(hub.getTask('b')?.status).toBe('pending');

      await hub.configure({ maxConcurrentTasks: 2 });

      await vi.waitFor(() => expect(hub.getTask('b')?.status).toBe('running'));
    });
  });

  // ============================================
  // CANCELLATION
  // ============================================

  describe('cancelTask', () => {
    it('should cancel a task that has not started', async () => {
      const hub = createHub({ timing: { startDelays: { ...NO_DELAYS, medium: 60_000 } } });
      const handler = vi.fn<CapabilityHandler>(async () => ({}));
      hub.registry.register('performance', handler);
      await hub.queueTask({ id: 'later', tabId: 'tab-1', name: 'Later', capability: 'performance' });

      expect(hub.cancelTask('later')).toBe(true);
      expect(hub.cancelTask('later')).toBe(false);

      const task = hub.getTask('later');
      expect(task?.status).toBe('cancelled');
      expect(task?.startedAt).toBe(task?.completedAt);
      expect(handler).not.toHaveBeenCalled();
      expect(hub.getStats().cancelledTasks).toBe(1);
    });

    it('should not cancel a running task', async () => {
      const hub = createHub();
      const { handler } = deferredHandler();
      hub.registry.register('performance', handler);
      await hub.queueTask({ id: 'busy', tabId: 'tab-1', name: 'Busy', capability: 'performance' });
      await vi.waitFor(() => expect(hub.getTask('busy')?.status).toBe('running'));

      expect(hub.cancelTask('busy')).toBe(false);
      expect(hub.getTask('busy')?.status).toBe('running');
    });

    it('should return false for an unknown task', () => {
      const hub = createHub();
      expect(hub.cancelTask('missing')).toBe(false);
    });
  });

  // ============================================
  // STUCK TASKS
  // ============================================

  describe('stuck tasks', () => {
    it('should time out a task after twice its estimate and free its slot', async () => {
      const hub = createHub({
        settings: { maxConcurrentTasks: 1 },
        timing: { startDelays: NO_DELAYS, reaperIntervalMs: 20 },
      });
      const { handler, calls } = deferredHandler();
      hub.registry.register('webAnalysis', handler);
      await hub.initialize();

      await hub.queueTask({
        id: 'stuck',
        tabId: 'tab-1',
        name: 'Stuck',
        capability: 'webAnalysis',
        estimatedDurationMs: 30,
      });
      await hub.queueTask({
        id: 'next',
        tabId: 'tab-1',
        name: 'Next',
        capability: 'webAnalysis',
        estimatedDurationMs: 60_000,
      });

      await vi.waitFor(() => expect(hub.getTask('stuck')?.status).toBe('cancelled'), {
        timeout: 2000,
      });
      expect(hub.getTask('stuck')?.error).toBe('Task timeout');
      expect(calls.get('stuck')?.context.signal.aborted).toBe(true);

      await vi.waitFor(() => expect(hub.getTask('next')?.status).toBe('running'));

      calls.get('stuck')?.resolve({ late: true });
      calls.get('next')?.resolve({});
      await vi.waitFor(() => expect(hub.getTask('next')?.status).toBe('completed'));

      expect(hub.getTask('stuck')).toMatchObject({ status: 'cancelled', result: {} });
      expect(hub.getStats()).toMatchObject({ cancelledTasks: 1, completedTasks: 1 });
    });

    it('should reap on demand using the hub clock', async () => {
      let clock = 1000;
      const hub = createHub({ now: () => clock });
      const { handler, calls } = deferredHandler();
      hub.registry.register('security', handler);
      await hub.queueTask({
        id: 'slow',
        tabId: 'tab-1',
        name: 'Slow',
        capability: 'security',
        estimatedDurationMs: 100,
      });
      await vi.waitFor(() => expect(hub.getTask('slow')?.status).toBe('running'));

      clock = 1200;
      expect(hub.reapStuckTasks()).toEqual([]);

      clock = 1201;
      const reaped = hub.reapStuckTasks();

      expect(reaped.map((t) => t.id)).toEqual(['slow']);
      expect(reaped[0]).toMatchObject({ startedAt: 1000, completedAt: 1201, error: 'Task timeout' });
      expect(calls.get('slow')?.context.signal.aborted).toBe(true);
    });
  });

  // ============================================
  // INSIGHTS
  // ============================================

  describe('insights', () => {
    it('should turn a low performance score into an insight', async () => {
      const hub = createHub();
      hub.registry.register('performance', async () => ({ coreWebVitalsScore: 0.5 }));
      const pushed = vi.fn();
      hub.subscribeToInsights(pushed);

      await hub.queueTask({ tabId: 'tab-1', name: 'Perf', capability: 'performance' });
      await vi.waitFor(() => expect(hub.getInsights()).toHaveLength(1));

      const [insight] = hub.getInsights();
      expect(insight).toMatchObject({
        title: 'Performance Optimization Opportunity',
        description: 'Page performance is below optimal levels (50%)',
        category: 'performance',
        confidence: 0.9,
        actionable: true,
      });
      expect(pushed).toHaveBeenCalledWith(insight);
    });

    it('should keep insights below the configured confidence threshold', async () => {
      const hub = createHub({ settings: { confidenceThreshold: 0.95 } });
      hub.registry.register('performance', async () => ({ coreWebVitalsScore: 0.5 }));
      hub.registry.register('security', async () => ({ threatScore: 80 }));

      const perf = await hub.queueTask({
        tabId: 'tab-1',
        name: 'Perf',
        capability: 'performance',
        priority: 'critical',
      });
      const scan = await hub.queueTask({ tabId: 'tab-1', name: 'Scan', capability: 'security' });
      await vi.waitFor(() => {
        expect(hub.getTask(perf)?.status).toBe('completed');
        expect(hub.getTask(scan)?.status).toBe('completed');
      });

      expect(hub.getInsights('performance')).toEqual([
        expect.objectContaining({ category: 'performance', confidence: 0.9 }),
      ]);
      expect(hub.getInsights('security')).toEqual([
        expect.objectContaining({ category: 'security', confidence: 0.95 }),
      ]);
    });

    it('should derive form and accessibility insights from web analysis', async () => {
      const hub = createHub();
      hub.registry.register('webAnalysis', async () => ({
        pageIntelligence: { forms: [{ id: 'a' }, { id: 'b' }], accessibility: { score: 0.5 } },
      }));

      await hub.queueTask({ tabId: 'tab-1', name: 'Analyze', capability: 'webAnalysis' });
      await vi.waitFor(() => expect(hub.getInsights()).toHaveLength(2));

      expect(hub.getInsights().map((i) => i.description)).toEqual([
        'Found 2 form(s) that can be automated',
        'Page accessibility score is 50%',
      ]);
      expect(hub.getInsights('automation')).toHaveLength(1);
    });

    it('should cap stored insights', async () => {
      const hub = createHub({ insightCapacity: 2 });
      hub.registry.register('performance', async () => ({ coreWebVitalsScore: 0.1 }));

      for (let i = 0; i < 3; i++) {
        await hub.queueTask({ tabId: 'tab-1', name: `Perf ${i}`, capability: 'performance' });
      }
      await vi.waitFor(() => expect(hub.getStats().completedTasks).toBe(3));

      expect(hub.getInsights()).toHaveLength(2);
    });

    it('should generate aggregate insights from usage', async () => {
      const hub = createHub();
      hub.registry.register('performance', async () => ({}));

      for (let i = 0; i < 11; i++) {
        await hub.queueTask({ tabId: 'tab-1', name: `Perf ${i}`, capability: 'performance' });
      }
      await vi.waitFor(() => expect(hub.getStats().completedTasks).toBe(11));

      const generated = hub.generateAggregateInsights();

      expect(generated.map((i) => i.description)).toEqual(['performance has been used 11 times']);
      expect(hub.getStats().insights).toBe(1);
    });
  });

  // ============================================
  // TABS
  // ============================================

  describe('tabs', () => {
    it('should queue the initial tasks for a new tab', async () => {
      const hub = createHub({ timing: HOLD_INITIAL_TASKS });

      const ids = await hub.registerTab('tab-1');

      expect(ids).toEqual([
        'tab-1_initial_analysis',
        'tab-1_security_scan',
        'tab-1_performance_analysis',
      ]);
      expect(hub.getTask('tab-1_initial_analysis')).toMatchObject({
        name: 'Initial Page Analysis',
        capability: 'webAnalysis',
        priority: 'high',
        parameters: { analysisType: 'comprehensive' },
        estimatedDurationMs: 5000,
      });
      expect(hub.getTask('tab-1_security_scan')).toMatchObject({
        priority: 'high',
        parameters: { scanType: 'full' },
      });
      expect(hub.getTask('tab-1_performance_analysis')?.priority).toBe('medium');
      expect(hub.getRegisteredTabs()).toEqual(['tab-1']);
    });

    it('should queue nothing when a tab registers twice', async () => {
      const hub = createHub({ timing: HOLD_INITIAL_TASKS });
      await hub.registerTab('tab-1');

      expect(await hub.registerTab('tab-1')).toEqual([]);
      expect(hub.getActiveTasks('tab-1')).toHaveLength(3);
    });

    it('should skip initial tasks for disabled capabilities', async () => {
      const hub = createHub({
        settings: { enabledCapabilities: ['webAnalysis', 'performance'] },
        timing: HOLD_INITIAL_TASKS,
      });

      expect(await hub.registerTab('tab-1')).toEqual([
        'tab-1_initial_analysis',
        'tab-1_performance_analysis',
      ]);
    });

    it('should pass the render target to handlers', async () => {
      const hub = createHub({ settings: { enabledCapabilities: ['webAnalysis'] } });
      const targets: unknown[] = [];
      hub.registry.register('webAnalysis', async (_tabId, _parameters, context) => {
        targets.push(context.renderTarget);
        return {};
      });

      await hub.registerTab('tab-1', { frameId: 7 });

      await vi.waitFor(() => expect(targets).toEqual([{ frameId: 7 }]));
    });

    it('should cancel unfinished tasks and drop subscribers on cleanup', async () => {
      const hub = createHub({ timing: { startDelays: { ...NO_DELAYS, low: 60_000 } } });
      const { handler, calls } = deferredHandler();
      hub.registry.register('webAnalysis', handler);
      await hub.registerTab('tab-1');
      const listener = vi.fn();
      hub.subscribeToTab('tab-1', listener);

      await hub.queueTask({
        id: 'waiting',
        tabId: 'tab-1',
        name: 'Waiting',
        capability: 'webAnalysis',
        priority: 'low',
      });
      await vi.waitFor(() => expect(calls.has('tab-1_initial_analysis')).toBe(true));

      hub.cleanupTab('tab-1');

      expect(hub.getTask('tab-1_initial_analysis')).toMatchObject({
        status: 'cancelled',
        error: 'Tab closed',
      });
      expect(calls.get('tab-1_initial_analysis')?.context.signal.aborted).toBe(true);
      expect(hub.getTask('waiting')?.status).toBe('cancelled');
      expect(hub.getTask('waiting')?.error).toBeUndefined();
      expect(hub.getActiveTasks('tab-1')).toEqual([]);
      expect(hub.getRegisteredTabs()).toEqual([]);

      const deliveries = listener.mock.calls.length;
      await hub.queueTask({ tabId: 'tab-1', name: 'After', capability: 'webAnalysis', priority: 'low' });
      expect(listener.mock.calls.length).toBe(deliveries);
    });
  });

  // ============================================
  // COMMANDS
  // ============================================

  describe('processCommand', () => {
    it('should route a command to its capability and report success', async () => {
      const hub = createHub();
      const handler = vi.fn<CapabilityHandler>(async () => ({ message: 'Clicked the button' }));
      hub.registry.register('automation', handler);

      const outcome = await hub.processCommand('tab-1', 'Click the button');

      expect(outcome).toEqual({
        taskId: expect.stringMatching(/^tab-1_command_\d+-[a-z0-9]+$/),
        capability: 'automation',
        status: 'completed',
        message: 'Command executed successfully: Clicked the button',
      });
      expect(handler.mock.calls[0]?.[1]).toEqual({ instruction: 'Click the button' });
    });

    it('should run two commands for one tab issued in the same millisecond', async () => {
      const hub = createHub({ now: () => 1000 });
      hub.registry.register('aiInteraction', async (_tabId, parameters) => ({
        message: String(parameters.instruction),
      }));

      const [first, second] = await Promise.all([
        hub.processCommand('tab-1', 'hello'),
        hub.processCommand('tab-1', 'world'),
      ]);

      expect(first).toMatchObject({
        status: 'completed',
        message: 'Command executed successfully: hello',
      });
      expect(second).toMatchObject({
        status: 'completed',
        message: 'Command executed successfully: world',
      });
      expect(first.taskId).not.toBe(second.taskId);
    });

    it('should report Done when the handler returns no message', async () => {
      const hub = createHub();
      hub.registry.register('webAnalysis', async () => ({}));

      const outcome = await hub.processCommand('tab-1', 'analyze this page');

      expect(outcome.message).toBe('Command executed successfully: Done');
    });

    it('should report a failed command', async () => {
      const hub = createHub();
      hub.registry.register('aiInteraction', async () => {
        throw new Error('model offline');
      });

      const outcome = await hub.processCommand('tab-1', 'tell me a joke');

      expect(outcome).toMatchObject({
        capability: 'aiInteraction',
        status: 'failed',
        message: 'Command failed: model offline',
      });
    });

    it('should reject a command for a disabled capability', async () => {
      const hub = createHub({
        settings: { enabledCapabilities: ['webAnalysis', 'aiInteraction'] },
      });

      const outcome = await hub.processCommand('tab-1', 'make this page safe');

      expect(outcome).toEqual({
        capability: 'security',
        status: 'rejected',
        message: 'Capability security is not enabled',
      });
      expect(hub.getActiveTasks()).toEqual([]);
    });

    it('should resolve as cancelled when the hub shuts down', async () => {
      const hub = createHub();
      const { handler, calls } = deferredHandler();
      hub.registry.register('aiInteraction', handler);

      const pending = hub.processCommand('tab-1', 'hello there');
      await vi.waitFor(() => expect(calls.size).toBe(1));
      hub.shutdown();

      await expect(pending).resolves.toMatchObject({
        capability: 'aiInteraction',
        status: 'cancelled',
        message: 'Command cancelled: Intelligence hub has been shut down',
      });
    });
  });

  // ============================================
  // AUTO-OPTIMIZATION
  // ============================================

  describe('runAutoOptimization', () => {
    it('should queue a low-priority pass for every registered tab', async () => {
      const hub = createHub({
        now: () => 1234,
        settings: { enabledCapabilities: ['performance'] },
        timing: { startDelays: { ...NO_DELAYS, medium: 60_000, low: 60_000 } },
      });
      await hub.registerTab('tab-1');

      const ids = await hub.runAutoOptimization();

      expect(ids).toEqual([expect.stringMatching(/^tab-1_auto_optimization_1234-[a-z0-9]+$/)]);
      expect(hub.getTask(ids[0] ?? '')).toMatchObject({
        name: 'Auto Optimization',
        capability: 'performance',
        priority: 'low',
        parameters: { autoOptimize: true },
        estimatedDurationMs: 3000,
      });
    });

    it('should queue a fresh task on each pass within one millisecond', async () => {
      const hub = createHub({
        now: () => 1234,
        settings: { enabledCapabilities: ['performance'] },
        timing: { startDelays: { ...NO_DELAYS, medium: 60_000, low: 60_000 } },
      });
      await hub.registerTab('tab-1');

      const first = await hub.runAutoOptimization();
      const second = await hub.runAutoOptimization();

      expect(first).toHaveLength(1);
      expect(second).toHaveLength(1);
      expect(first[0]).not.toBe(second[0]);
      expect(hub.getActiveTasks('tab-1').filter((t) => t.name === 'Auto Optimization')).toHaveLength(2);
    });

    it('should do nothing when auto-optimization is off', async () => {
      const hub = createHub({
        settings: { autoOptimization: false },
        timing: HOLD_INITIAL_TASKS,
      });
      await hub.registerTab('tab-1');

      expect(await hub.runAutoOptimization()).toEqual([]);
    });
  });

  // ============================================
  // SETTINGS
  // ============================================

  describe('settings', () => {
    it('should clamp and persist configuration changes', async () => {
      const settingsStore = new InMemorySettingsStore();
      const hub = createHub({ settingsStore });

      const settings = await hub.configure({ maxConcurrentTasks: 50, confidenceThreshold: -1 });

      expect(settings.maxConcurrentTasks).toBe(20);
      expect(settings.confidenceThreshold).toBe(0);
      const stored = await settingsStore.get('intelligence_config');
      expect(JSON.parse(stored ?? 'null')).toEqual(hub.getSettings());
    });

    it('should load stored settings on initialize', async () => {
      const settingsStore = new InMemorySettingsStore({
        intelligence_config: JSON.stringify({ maxConcurrentTasks: 3, autoOptimization: false }),
      });
      const hub = createHub({ settingsStore });

      await hub.initialize();

      expect(hub.getSettings()).toEqual({
        ...DEFAULT_HUB_SETTINGS,
        enabledCapabilities: [...DEFAULT_HUB_SETTINGS.enabledCapabilities],
        maxConcurrentTasks: 3,
        autoOptimization: false,
      });
    });

    it('should let constructor overrides win over stored settings', async () => {
      const settingsStore = new InMemorySettingsStore({
        intelligence_config: JSON.stringify({ maxConcurrentTasks: 3, learningMode: false }),
      });
      const hub = createHub({ settingsStore, settings: { maxConcurrentTasks: 7 } });

      await hub.initialize();

      expect(hub.getSettings()).toMatchObject({ maxConcurrentTasks: 7, learningMode: false });
    });

    it.each([
      ['invalid JSON', 'not json'],
      ['a wrongly typed field', JSON.stringify({ maxConcurrentTasks: 'many' })],
    ])('should fall back to defaults when the stored block is %s', async (_label, raw) => {
      const hub = createHub({
        settingsStore: new InMemorySettingsStore({ intelligence_config: raw }),
      });

      await hub.initialize();

      expect(hub.getSettings().maxConcurrentTasks).toBe(5);
    });

    it('should reject a non-finite setting', async () => {
      const hub = createHub();
      await expect(hub.configure({ confidenceThreshold: Number.NaN })).rejects.toBeInstanceOf(
        ConfigValidationError
      );
      expect(hub.getSettings().confidenceThreshold).toBe(0.7);
    });

    it('should toggle single capabilities', async () => {
      const hub = createHub({ timing: { startDelays: { ...NO_DELAYS, medium: 60_000 } } });

      await hub.setCapabilityEnabled('learning', true);
      await hub.setCapabilityEnabled('performance', false);

      expect(hub.isCapabilityEnabled('learning')).toBe(true);
      await expect(
        hub.queueTask({ tabId: 'tab-1', name: 'Learn', capability: 'learning' })
      ).resolves.toBeDefined();
      await expect(
        hub.queueTask({ tabId: 'tab-1', name: 'Perf', capability: 'performance' })
      ).rejects.toBeInstanceOf(CapabilityDisabledError);
    });

    it('should hand out copies of the settings', () => {
      const hub = createHub();
      hub.getSettings().enabledCapabilities.push('learning');
      expect(hub.isCapabilityEnabled('learning')).toBe(false);
    });
  });

  // ============================================
  // STATS
  // ============================================

  it('should summarize activity in getStats', async () => {
    const hub = createHub();
    hub.registry.register('performance', async () => ({}));

    const taskId = await hub.queueTask({ tabId: 'tab-1', name: 'Perf', capability: 'performance' });
    await vi.waitFor(() => expect(hub.getTask(taskId)?.status).toBe('completed'));

    expect(hub.getStats()).toMatchObject({
      completedTasks: 1,
      failedTasks: 0,
      cancelledTasks: 0,
      successRate: 1,
      capabilityUsage: { performance: 1 },
      registeredTabs: 0,
      activeTasks: 0,
      runningTasks: 0,
      queuedTasks: 0,
      insights: 0,
      enabledCapabilities: [...DEFAULT_HUB_SETTINGS.enabledCapabilities],
      configuration: {
        autoOptimization: true,
        predictiveBrowsing: true,
        learningMode: true,
        confidenceThreshold: 0.7,
        maxConcurrentTasks: 5,
      },
    });
  });

  // ============================================
  // SHUTDOWN
  // ============================================

  describe('shutdown', () => {
    it('should abort running work and refuse new work', async () => {
      const hub = createHub();
      const { handler, calls } = deferredHandler();
      hub.registry.register('performance', handler);
      await hub.queueTask({ id: 'busy', tabId: 'tab-1', name: 'Busy', capability: 'performance' });
      await vi.waitFor(() => expect(calls.has('busy')).toBe(true));

      hub.shutdown();
      hub.shutdown();

      expect(hub.isShutDown).toBe(true);
      expect(calls.get('busy')?.context.signal.aborted).toBe(true);
      expect(hub.getActiveTasks()).toEqual([]);
      await expect(
        hub.queueTask({ tabId: 'tab-1', name: 'Late', capability: 'performance' })
      ).rejects.toBeInstanceOf(HubShutdownError);
      await expect(hub.registerTab('tab-2')).rejects.toBeInstanceOf(HubShutdownError);
      await expect(hub.initialize()).rejects.toBeInstanceOf(HubShutdownError);
    });

    it('should notify subscribers that unfinished tasks were cancelled', async () => {
      const hub = createHub({ timing: { startDelays: { ...NO_DELAYS, medium: 60_000 } } });
      const updates: IntelligenceTask[] = [];
      hub.subscribeToTab('tab-1', (task) => updates.push(task));
      await hub.queueTask({ id: 'queued', tabId: 'tab-1', name: 'Queued', capability: 'security' });

      hub.shutdown();

      expect(updates.map((t) => `${t.id}:${t.status}`)).toEqual([
        'queued:pending',
        'queued:cancelled',
      ]);
      expect(updates[1]?.error).toBe('Intelligence hub has been shut down');
    });
  });
});
