/**
 * Tests for the structured logger
 *
 * Tests cover:
 * - Component and service fields
 * - Secret redaction in task parameters
 * - Level filtering
 * - Error serialization
 * - Child loggers with context
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TaskUpdateNotifier } from '../../src/core/listener-set.js';
import { configureLogger, logger } from '../../src/utils/logger.js';

describe('Logger', () => {
  let output: string[];

  const entries = (): unknown[] =>
    output
      .join('')
      .split('\n')
      .filter((line) => line.length > 0)
      .map((line): unknown => JSON.parse(line));

  beforeEach(() => {
    output = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      output.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString());
      return true;
    });
    configureLogger({ level: 'debug', prettyPrint: false });
  });

  afterEach(() => {
    configureLogger({ level: 'silent' });
    vi.restoreAllMocks();
  });

  it('should write JSON lines tagged with component and service', () => {
    logger.hub.info('Task queued', { taskId: 'task-1', capability: 'performance' });

    expect(entries()).toEqual([
      expect.objectContaining({
        level: 'info',
        msg: 'Task queued',
        component: 'IntelligenceHub',
        service: 'tab-intelligence-hub',
        taskId: 'task-1',
        capability: 'performance',
      }),
    ]);
  });

  describe('redaction', () => {
    it('should redact credentials in task parameters', () => {
      logger.hub.info('Task queued', {
        parameters: { password: 'test-secret', url: 'https://example.com/login' },
      });

      const [entry] = entries();
      expect(entry).toMatchObject({
        parameters: { password: '[REDACTED]', url: 'https://example.com/login' },
      });
      expect(output.join('')).not.toContain('test-secret');
    });

    it('should redact tokens nested one level down', () => {
      logger.supervisor.debug('Handler context', {
        session: { token: 'test-token', cookie: 'sid=test-cookie' },
      });

      const [entry] = entries();
      expect(entry).toMatchObject({
        session: { token: '[REDACTED]', cookie: '[REDACTED]' },
      });
    });
  });

  it('should drop entries below the configured level', () => {
    configureLogger({ level: 'warn', prettyPrint: false });

    logger.scheduler.info('Task dispatched');
    logger.scheduler.warn('Schedule ignored after shutdown', { taskId: 'late' });

    expect(entries()).toEqual([
      expect.objectContaining({ level: 'warn', msg: 'Schedule ignored after shutdown' }),
    ]);
  });

  it('should serialize errors', () => {
    logger.server.error('Tool error', { error: new Error('boom') });

    expect(entries()).toEqual([
      expect.objectContaining({
        level: 'error',
        err: expect.objectContaining({ message: 'boom', name: 'Error' }),
      }),
    ]);
  });

  it('should serialize non-Error values passed as errors', () => {
    logger.server.error('Fatal error', { error: 'plain failure' });

    expect(entries()).toEqual([
      expect.objectContaining({ err: { message: 'plain failure' } }),
    ]);
  });

  it('should carry child context', () => {
    logger.hub.child({ tabId: 'tab-9' }).info('Tab registered');

    expect(entries()).toEqual([
      expect.objectContaining({ component: 'IntelligenceHub', tabId: 'tab-9' }),
    ]);
  });

  it('should create ad-hoc component loggers', () => {
    logger.create('ConfigLoader').debug('No config file found');

    expect(entries()).toEqual([
      expect.objectContaining({ level: 'debug', component: 'ConfigLoader' }),
    ]);
  });

  it('should log a throwing tab listener under the notifications component', () => {
    const notifier = new TaskUpdateNotifier<{ tabId: string }>(logger.notifications);
    const after = vi.fn();
    notifier.subscribe('tab-1', () => {
      throw new Error('listener broke');
    });
    notifier.subscribe('tab-1', after);

    notifier.publish({ tabId: 'tab-1' });

    expect(after).toHaveBeenCalledOnce();
    expect(entries()).toEqual([
      expect.objectContaining({
        level: 'error',
        component: 'Notifications',
        msg: 'Task update (tab-1) listener error',
        err: expect.objectContaining({ message: 'listener broke' }),
      }),
    ]);
  });
});
