import { getCurrentScope, withScope, type Scope } from './scope.js';
import { scheduleMicrotask, isBatching, queueInBatch } from './scheduler.js';

/**
 * Optional global error handler for effect and observer execution.
 *
 * The reactive system stays alive even if an effect throws.
 * If no handler is set, errors are logged to the console.
 */
let effectErrorHandler: ((error: Error, source: string) => void) | null = null;

/**
 * Sets a global error handler for effects, computed invalidations and observers.
 *
 * @example
 * setEffectErrorHandler((err, src) => report(err, { source: src }));
 */
export function setEffectErrorHandler(handler: ((error: Error, source: string) => void) | null): void {
  effectErrorHandler = handler;
}

/** Normalizes unknown throws and routes them to the global handler (or console). */
export function reportEffectError(error: unknown, source: string): void {
  const err = error instanceof Error ? error : new Error(String(error));
  if (effectErrorHandler) effectErrorHandler(err, source);
  else console.error(`[Holdfast] Error in ${source}:`, err);
}

type EffectFn = (() => void) & {
  /**
   * Reverse dependency tracking:
   * the subscriber Set(s) this effect is registered in, so it can
   * unsubscribe on re-run (dynamic deps) and on dispose.
   */
  deps?: Set<Set<EffectFn>>;

  /** When true, this effect must never execute again. */
  disposed?: boolean;

  /**
   * Synchronous scheduling flag.
   * Used by computed invalidation and by `observe()`.
   */
  sync?: boolean;

  /** Label used when reporting errors. */
  label?: string;
};

/**
 * Currently executing effect (dependency collector).
 * Signals read while this is set will subscribe this effect.
 */
let activeEffect: EffectFn | null = null;

/**
 * Scope associated with the currently executing effect.
 * Subscriptions are only made when the current scope matches it.
 */
let activeScope: Scope | null = null;

/** Dedup set for scheduled effects. */
const pendingEffects = new Set<EffectFn>();

/** Stable runner per effect, so batch dedupe by identity works. */
const effectRunners = new WeakMap<EffectFn, () => void>();

/**
 * Schedules an effect respecting:
 * - sync effects (computed invalidation, observers) run immediately
 * - regular effects run in a microtask, deduped per tick
 * - during `batch()`, regular effects go to the batch queue
 */
function scheduleEffect(eff: EffectFn): void {
  if (eff.disposed) return;

  if (eff.sync) {
    try {
      eff();
    } catch (error) {
      reportEffectError(error, eff.label ?? 'computed');
    }
    return;
  }

  if (pendingEffects.has(eff)) return;
  pendingEffects.add(eff);

  let runEffect = effectRunners.get(eff);
  if (!runEffect) {
    runEffect = () => {
      pendingEffects.delete(eff);
      if (eff.disposed) return;

      try {
        eff();
      } catch (error) {
        reportEffectError(error, 'effect');
      }
    };
    effectRunners.set(eff, runEffect);
  }

  if (isBatching()) queueInBatch(runEffect);
  else scheduleMicrotask(runEffect);
}

function subscribeActiveEffect(subscribers: Set<EffectFn>): void {
  if (!activeEffect || activeEffect.disposed) return;
  const current = getCurrentScope();

  // Scope-aware subscription guard (best effort).
  if (!activeScope || activeScope === current) {
    if (!subscribers.has(activeEffect)) {
      subscribers.add(activeEffect);
      (activeEffect.deps ??= new Set()).add(subscribers);
    }
  }
}

function notifySubscribers(subscribers: Set<EffectFn>): void {
  // Snapshot: sync subscribers re-track (and re-add themselves) while we iterate.
  for (const eff of Array.from(subscribers)) scheduleEffect(eff);
}

function clearDeps(eff: EffectFn): void {
  if (!eff.deps) return;
  for (const depSet of eff.deps) depSet.delete(eff);
  eff.deps.clear();
}

export interface Signal<T> {
  (): T;
  set(value: T): void;
  update(fn: (v: T) => T): void;
}

/**
 * Creates a signal: a mutable value with automatic dependency tracking.
 *
 * Reads inside effects subscribe the effect.
 * Writes notify subscribers, with deferral when inside `batch()`.
 */
export function signal<T>(initialValue: T): Signal<T> {
  let value = initialValue;
  const subscribers = new Set<EffectFn>();
  const owningScope = getCurrentScope();

  const notify = () => notifySubscribers(subscribers);

  const read = (): T => {
    subscribeActiveEffect(subscribers);
    return value;
  };

  const set = (nextValue: T): void => {
    // No-op on identical values.
    if (Object.is(value, nextValue)) return;

    // State updates are immediate even inside `batch()`.
    value = nextValue;

    if (isBatching()) queueInBatch(notify);
    else notify();
  };

  const sig: Signal<T> = Object.assign(read, {
    set,
    update: (fn: (v: T) => T) => set(fn(value)),
  });

  // If the signal was created inside a scope, drop subscribers when the scope ends.
  if (owningScope) {
    owningScope.onCleanup(() => {
      subscribers.clear();
    });
  }

  return sig;
}

/**
 * Creates an effect: reruns `fn` whenever any tracked signal changes.
 *
 * Notes:
 * - First run is scheduled (microtask) to coalesce multiple writes.
 * - Dependency sets are cleared before each run (dynamic dependency tracking).
 * - If created inside a scope, the effect is disposed automatically on scope cleanup.
 */
export function effect(fn: () => void): () => void {
  const owningScope = getCurrentScope();

  const dispose = () => {
    if (run.disposed) return;
    run.disposed = true;
    clearDeps(run);
    pendingEffects.delete(run);
  };

  const run: EffectFn = () => {
    if (run.disposed) return;

    clearDeps(run);

    const prevEffect = activeEffect;
    const prevScope = activeScope;

    activeEffect = run;
    activeScope = owningScope ?? null;

    try {
      if (owningScope) withScope(owningScope, fn);
      else fn();
    } finally {
      activeEffect = prevEffect;
      activeScope = prevScope;
    }
  };

  scheduleEffect(run);
  if (owningScope) owningScope.onCleanup(dispose);

  return dispose;
}

/**
 * Synchronously observe a reactive read.
 *
 * `fn` is called immediately with the current value, then synchronously after
 * every change of a signal tracked by `read` (outside `batch()`). `fn` itself
 * runs untracked. Returns a function that stops observing.
 *
 * Unlike `effect()`, nothing is tied to the current scope: the caller owns the
 * returned disposer (see `foreach()`).
 */
export function observe<T>(read: () => T, fn: (value: T) => void): () => void {
  const dispose = () => {
    if (run.disposed) return;
    run.disposed = true;
    clearDeps(run);
  };

  const run: EffectFn = () => {
    if (run.disposed) return;

    clearDeps(run);

    const prevEffect = activeEffect;
    const prevScope = activeScope;

    activeEffect = run;
    activeScope = null;

    let value: T;
    try {
      value = read();
    } finally {
      activeEffect = prevEffect;
      activeScope = prevScope;
    }

    fn(value);
  };

  run.sync = true;
  run.label = 'observer';
  run();

  return dispose;
}

/**
 * Creates a computed signal.
 *
 * - Lazy: computes on first read.
 * - Cached: returns cached value until invalidated by a dependency change.
 * - Consistent: invalidation is synchronous, so immediate reads after writes
 *   recompute the latest value.
 *
 * Computed signals are read-only.
 */
export function computed<T>(fn: () => T): Signal<T> {
  let cache: { value: T } | null = null;
  let dirty = true;

  const subscribers = new Set<EffectFn>();
  const owningScope = getCurrentScope();

  // Track which deps we subscribed to so we can unsubscribe when re-tracking.
  let trackedDeps = new Set<Set<EffectFn>>();

  /** Synchronous invalidator: marks dirty and notifies subscribers. */
  const markDirty: EffectFn = () => {
    if (dirty) return;
    dirty = true;
    notifySubscribers(subscribers);
  };

  markDirty.disposed = false;
  markDirty.sync = true;

  const cleanupDeps = () => {
    for (const depSet of trackedDeps) depSet.delete(markDirty);
    trackedDeps.clear();
    if (markDirty.deps) markDirty.deps.clear();
  };

  const recompute = (): T => {
    cleanupDeps();

    const prevEffect = activeEffect;
    const prevScope = activeScope;

    activeEffect = markDirty;
    activeScope = owningScope ?? null;

    try {
      const next = fn();
      cache = { value: next };
      dirty = false;

      if (markDirty.deps) trackedDeps = new Set(markDirty.deps);
      return next;
    } finally {
      activeEffect = prevEffect;
      activeScope = prevScope;
    }
  };

  const read = (): T => {
    subscribeActiveEffect(subscribers);

    if (dirty || !cache) return recompute();
    return cache.value;
  };

  const sig: Signal<T> = Object.assign(read, {
    set: (): void => {
      throw new Error('Cannot set a computed signal directly. Computed signals are derived from other signals.');
    },
    update: (): void => {
      throw new Error('Cannot update a computed signal directly. Computed signals are derived from other signals.');
    },
  });

  if (owningScope) {
    owningScope.onCleanup(() => {
      markDirty.disposed = true;
      cleanupDeps();
      subscribers.clear();
    });
  }

  return sig;
}
