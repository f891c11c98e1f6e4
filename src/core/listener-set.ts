import type { Logger } from '../utils/logger.js';

/**
 * Ordered set of listeners. Delivery follows registration order, and a
 * throwing listener is logged without stopping delivery to the rest.
 */
export class ListenerSet<T> {
  private listeners: Set<(event: T) => void> = new Set();

  constructor(
    private readonly log: Logger,
    private readonly label: string
  ) {}

  subscribe(listener: (event: T) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: T): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log.error(`${this.label} listener error`, { error });
      }
    }
  }

  get size(): number {
    return this.listeners.size;
  }

  clear(): void {
    this.listeners.clear();
  }
}

/**
 * Per-tab task update fan-out
 */
export class TaskUpdateNotifier<T extends { tabId: string }> {
  private tabs: Map<string, ListenerSet<T>> = new Map();

  constructor(private readonly log: Logger) {}

  subscribe(tabId: string, listener: (event: T) => void): () => void {
    let listeners = this.tabs.get(tabId);
    if (!listeners) {
      listeners = new ListenerSet<T>(this.log, `Task update (${tabId})`);
      this.tabs.set(tabId, listeners);
    }
    const unsubscribe = listeners.subscribe(listener);
    return () => {
      unsubscribe();
      const current = this.tabs.get(tabId);
      if (current && current.size === 0) {
        this.tabs.delete(tabId);
      }
    };
  }

  publish(event: T): void {
    this.tabs.get(event.tabId)?.emit(event);
  }

  /**
   * Drop every subscriber of one tab
   */
  closeTab(tabId: string): void {
    this.tabs.get(tabId)?.clear();
    this.tabs.delete(tabId);
  }

  clear(): void {
    for (const listeners of this.tabs.values()) {
      listeners.clear();
    }
    this.tabs.clear();
  }
}
