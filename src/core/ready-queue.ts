/**
 * Ready queue: a binary min-heap ordered by (priority rank, admission
 * sequence). Equal priorities leave in admission order.
 */

import { TASK_PRIORITIES, type TaskPriority } from '../types/intelligence.js';

export interface ReadyEntry {
  taskId: string;
  priority: TaskPriority;
  /** Monotonic admission counter assigned by the scheduler */
  sequence: number;
}

export function priorityRank(priority: TaskPriority): number {
  return TASK_PRIORITIES.indexOf(priority);
}

function before(a: ReadyEntry, b: ReadyEntry): boolean {
  const rankA = priorityRank(a.priority);
  const rankB = priorityRank(b.priority);
  if (rankA !== rankB) return rankA < rankB;
  return a.sequence < b.sequence;
}

export class ReadyQueue {
  private heap: ReadyEntry[] = [];

  get size(): number {
    return this.heap.length;
  }

  push(entry: ReadyEntry): void {
    this.heap.push(entry);
    this.siftUp(this.heap.length - 1);
  }

  peek(): ReadyEntry | undefined {
    return this.heap[0];
  }

  pop(): ReadyEntry | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) {
      return undefined;
    }
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  /**
   * Remove a queued task by id
   */
  remove(taskId: string): boolean {
    const index = this.heap.findIndex((entry) => entry.taskId === taskId);
    if (index === -1) {
      return false;
    }
    const last = this.heap.pop();
    if (last !== undefined && index < this.heap.length) {
      this.heap[index] = last;
      this.siftDown(index);
      this.siftUp(index);
    }
    return true;
  }

  clear(): void {
    this.heap = [];
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!before(this.heap[child], this.heap[parent])) break;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    const length = this.heap.length;
    let parent = index;
    for (;;) {
      const left = 2 * parent + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < length && before(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < length && before(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === parent) break;
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const tmp = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = tmp;
  }
}
