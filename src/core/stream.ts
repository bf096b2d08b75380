import { Subscription } from './owned.js';
import type { Scope } from './scope.js';
import { observe, reportEffectError, type Signal } from './signal.js';

/**
 * A push-based stream of values with no current value.
 *
 * Observers only see values emitted after they subscribed.
 */
export interface EventStream<T> {
  readonly kind: 'stream';
  emit(value: T): void;
  subscribe(fn: (value: T) => void): () => void;
}

/** Anything an element can read values from: a signal or a stream. */
export type Source<T> = Signal<T> | EventStream<T>;

/**
 * Creates an event stream.
 *
 * Example:
 * ```ts
 * const resets = createStream<string>();
 * resets.emit('');
 * ```
 */
export function createStream<T>(): EventStream<T> {
  const observers = new Set<(value: T) => void>();

  return {
    kind: 'stream',
    emit(value: T) {
      for (const fn of Array.from(observers)) {
        if (!observers.has(fn)) continue;
        fn(value);
      }
    },
    subscribe(fn: (value: T) => void) {
      observers.add(fn);
      return () => {
        observers.delete(fn);
      };
    },
  };
}

export function isStream<T>(source: Source<T>): source is EventStream<T> {
  return typeof source === 'object';
}

/**
 * Observe a source for as long as `owner` lives.
 *
 * - Signal: `onNext` runs immediately with the current value, then on every change.
 * - Stream: `onNext` runs on every emission.
 *
 * The returned subscription is registered with `owner` before observing
 * starts, so it is killed when the owner is disposed.
 */
export function foreach<T>(source: Source<T>, onNext: (value: T) => void, owner: Scope): Subscription {
  let stop: (() => void) | null = null;
  const subscription = new Subscription(owner, () => {
    stop?.();
    stop = null;
  });

  stop = isStream(source) ? source.subscribe(onNext) : observe(source, onNext);
  return subscription;
}

/**
 * Combine observers into one that calls each of them in order.
 *
 * Every observer runs even if an earlier one throws; the first error is
 * rethrown once all of them have run, later ones are reported.
 */
export function combineObservers<T>(...observers: Array<(value: T) => void>): (value: T) => void {
  return (value: T) => {
    let firstError: { error: unknown } | null = null;

    for (const observer of observers) {
      try {
        observer(value);
      } catch (error) {
        if (firstError) reportEffectError(error, 'observer');
        else firstError = { error };
      }
    }

    if (firstError) throw firstError.error;
  };
}
