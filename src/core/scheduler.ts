/**
 * Low-level scheduler (runtime core).
 *
 * This module is independent from signals/effects to avoid circular
 * dependencies.
 *
 * What it provides:
 * - A RAF queue (`schedule`) for work that should be grouped per frame
 * - A microtask queue (`scheduleMicrotask`) for reactive follow-ups
 * - A batching mechanism (`batch` + `queueInBatch`) to coalesce notifications
 *
 * Invariants:
 * - Tasks are executed in FIFO order within each queue.
 * - Queues are drained fully (up to a hard iteration limit) per flush.
 */

type Task = () => void;

interface SchedulerConfig {
  /**
   * Maximum microtask drain waves before stopping (prevents infinite loops).
   * Default: 1000.
   */
  maxMicrotaskIterations: number;

  /**
   * Maximum RAF drain waves before stopping. Default: 100.
   */
  maxRafIterations: number;
}

const schedulerConfig: SchedulerConfig = {
  maxMicrotaskIterations: 1000,
  maxRafIterations: 100,
};

/**
 * Configure scheduler limits.
 *
 * Example:
 * ```ts
 * configureScheduler({ maxMicrotaskIterations: 2000 });
 * ```
 */
export function configureScheduler(config: Partial<SchedulerConfig>): void {
  Object.assign(schedulerConfig, config);
}

export function getSchedulerConfig(): Readonly<SchedulerConfig> {
  return { ...schedulerConfig };
}

let rafScheduled = false;
let microtaskScheduled = false;

let isFlushingRaf = false;
let isFlushingMicrotasks = false;

const rafQueue: Task[] = [];
const microtaskQueue: Task[] = [];

const rafImpl: (cb: () => void) => void =
  typeof globalThis.requestAnimationFrame === 'function'
    ? (cb) => globalThis.requestAnimationFrame(() => cb())
    : (cb) => setTimeout(cb, 0);

/**
 * Batching state.
 *
 * During `batch()`, producers enqueue notifications via `queueInBatch()`.
 * When the outermost batch exits, all queued tasks are flushed in a single RAF.
 */
let batchDepth = 0;

/** Batched tasks (FIFO) + identity dedupe set. */
const batchQueue: Task[] = [];
const batchQueueSet = new Set<Task>();

/**
 * Schedule work for the next animation frame.
 * (Outside a browser this falls back to `setTimeout(0)`.)
 */
export function schedule(task: Task): void {
  rafQueue.push(task);

  if (!rafScheduled) {
    rafScheduled = true;
    rafImpl(flushRaf);
  }
}

/** Schedule work in a microtask. */
export function scheduleMicrotask(task: Task): void {
  microtaskQueue.push(task);

  if (!microtaskScheduled) {
    microtaskScheduled = true;
    void Promise.resolve().then(flushMicrotasks);
  }
}

/** Returns true while inside a `batch()` call. */
export function isBatching(): boolean {
  return batchDepth > 0;
}

/**
 * Enqueue work to run at the end of the *outermost* batch.
 * The same Task identity runs at most once per batch flush.
 */
export function queueInBatch(task: Task): void {
  if (batchQueueSet.has(task)) return;
  batchQueue.push(task);
  batchQueueSet.add(task);
}

/**
 * Batch multiple updates so their resulting notifications are grouped.
 *
 * Contract:
 * - State updates inside the batch happen immediately.
 * - Notifications are deferred until the batch completes.
 * - Nested batches are supported: only the outermost batch triggers a flush.
 */
export function batch(fn: () => void): void {
  batchDepth++;
  try {
    fn();
  } finally {
    batchDepth--;
    if (batchDepth === 0) flushBatch();
  }
}

function flushBatch(): void {
  if (batchQueue.length === 0) return;

  const tasks = batchQueue.splice(0);
  batchQueueSet.clear();

  schedule(() => {
    for (const t of tasks) t();
  });
}

function drain(queue: Task[], maxIterations: number, label: string): void {
  let iterations = 0;

  while (queue.length > 0 && iterations < maxIterations) {
    iterations++;
    for (const task of queue.splice(0)) task();
  }

  if (iterations >= maxIterations && queue.length > 0) {
    console.error(
      `[Holdfast] Scheduler exceeded ${maxIterations} ${label} iterations. ` +
        `Possible infinite loop detected. Remaining ${queue.length} tasks discarded.`
    );
    queue.length = 0;
  }
}

function flushMicrotasks(): void {
  if (isFlushingMicrotasks) return;
  isFlushingMicrotasks = true;

  try {
    drain(microtaskQueue, schedulerConfig.maxMicrotaskIterations, 'microtask');
  } finally {
    isFlushingMicrotasks = false;
    microtaskScheduled = false;

    if (microtaskQueue.length > 0 && !microtaskScheduled) {
      microtaskScheduled = true;
      void Promise.resolve().then(flushMicrotasks);
    }
  }
}

function flushRaf(): void {
  if (isFlushingRaf) return;
  isFlushingRaf = true;

  try {
    drain(rafQueue, schedulerConfig.maxRafIterations, 'RAF');
  } finally {
    isFlushingRaf = false;
    rafScheduled = false;

    if (rafQueue.length > 0 && !rafScheduled) {
      rafScheduled = true;
      rafImpl(flushRaf);
    }
  }
}
