import type { Owned } from "./owned.js";

/**
 * A Scope is the Owner of a lifecycle: typically the mounted state of an element.
 *
 * Leaky resources (signal subscriptions, DOM listener patches) register with a
 * scope when they are created, and the scope kills them when it is disposed.
 * Nothing relies on garbage collection to break the cycles of a reactive graph.
 *
 * Disposal order:
 * - child scopes are disposed first,
 * - then owned resources and `onCleanup` callbacks run in FIFO order
 *   (registration order).
 */
export interface Scope {
  /** Register a cleanup callback to run when the scope is disposed. */
  onCleanup(fn: () => void): void;

  /**
   * Track an owned resource. Called by the `Owned` constructor.
   * Throws when the scope is already disposed.
   */
  own(resource: Owned): void;

  /** Dispose the scope, killing every owned resource exactly once. */
  dispose(): void;

  /** Parent scope in the hierarchy. */
  readonly parent: Scope | null;

  /** Debug name, used in diagnostics. */
  readonly name: string | undefined;
}

export interface CreateScopeOptions {
  /** Optional debug name shown in diagnostics. */
  name?: string;
}

/** Tracks disposed scopes without mutating the public interface. */
const disposedScopes = new WeakSet<Scope>();

interface InternalScopeState {
  /** Cleanups and owned-resource disposers, in registration order. */
  entries: Set<() => void>;
  /** Handle from an owned resource to its entry, so an early kill can drop it. */
  ownedEntries: Map<Owned, () => void>;
  childDisposers: Array<() => void>;
}

const scopeState = new WeakMap<Scope, InternalScopeState>();

/** Returns true if the given scope has been disposed. */
export function isScopeDisposed(scope: Scope): boolean {
  return disposedScopes.has(scope);
}

function isScopeLike(value: unknown): value is Scope {
  if (!value || typeof value !== "object") return false;
  return (
    "onCleanup" in value &&
    typeof value.onCleanup === "function" &&
    "dispose" in value &&
    typeof value.dispose === "function" &&
    "parent" in value
  );
}

function normalizeScopeName(options: CreateScopeOptions | undefined): string | undefined {
  if (!options || typeof options.name !== "string") return undefined;
  const trimmed = options.name.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function getInternalScopeState(scope: Scope): InternalScopeState {
  const state = scopeState.get(scope);
  if (!state) {
    throw new Error('[Holdfast] Internal scope state missing.');
  }
  return state;
}

function describeScope(scope: Scope): string {
  return scope.name ? `scope "${scope.name}"` : 'scope';
}

function registerChildScope(parent: Scope, child: Scope): void {
  if (isScopeDisposed(parent)) {
    child.dispose();
    return;
  }
  const parentState = scopeState.get(parent);
  if (parentState) {
    parentState.childDisposers.push(() => child.dispose());
    return;
  }

  // External/mock Scope parent: fall back to the public Scope interface.
  // Child-first ordering cannot be guaranteed for interface-only parents.
  parent.onCleanup(() => child.dispose());
}

/**
 * Drop an owned resource from its scope without running it.
 * Called when a resource is killed before its owner is disposed.
 * @internal
 */
export function forgetOwned(scope: Scope, resource: Owned): void {
  const state = scopeState.get(scope);
  if (!state) return;
  const entry = state.ownedEntries.get(resource);
  if (!entry) return;
  state.ownedEntries.delete(resource);
  state.entries.delete(entry);
}

function resolveCreateScopeArgs(
  parentOrOptions?: Scope | null | CreateScopeOptions,
  maybeOptions?: CreateScopeOptions
): {
  parentOverride: Scope | null | undefined;
  options: CreateScopeOptions | undefined;
} {
  if (parentOrOptions === undefined || parentOrOptions === null || isScopeLike(parentOrOptions)) {
    return {
      parentOverride: parentOrOptions,
      options: maybeOptions,
    };
  }

  return {
    parentOverride: undefined,
    options: parentOrOptions,
  };
}

/**
 * Creates a new Scope instance.
 *
 * Notes:
 * - Parent is captured from the current scope context (set by withScope),
 *   unless passed explicitly (`null` creates a detached root scope).
 * - A child of a disposed parent is disposed immediately.
 */
export function createScope(): Scope;
export function createScope(parentOverride?: Scope | null): Scope;
export function createScope(options: CreateScopeOptions): Scope;
export function createScope(parentOverride: Scope | null | undefined, options?: CreateScopeOptions): Scope;
export function createScope(
  parentOrOptions?: Scope | null | CreateScopeOptions,
  maybeOptions?: CreateScopeOptions
): Scope {
  const { parentOverride, options } = resolveCreateScopeArgs(parentOrOptions, maybeOptions);
  const name = normalizeScopeName(options);
  const parent =
    parentOverride === undefined ? currentScope : parentOverride;

  const runCleanupSafely = (fn: () => void): unknown | undefined => {
    try {
      fn();
      return undefined;
    } catch (err) {
      return err;
    }
  };

  const scope: Scope = {
    onCleanup(fn: () => void) {
      if (isScopeDisposed(scope)) {
        const error = runCleanupSafely(fn);
        if (error) {
          console.error('[Holdfast] cleanup registered after dispose() threw:', error);
        }
        return;
      }
      getInternalScopeState(scope).entries.add(() => fn());
    },
    own(resource: Owned) {
      if (isScopeDisposed(scope)) {
        throw new Error(`[Holdfast] Cannot own a resource with a disposed ${describeScope(scope)}.`);
      }
      const state = getInternalScopeState(scope);
      if (state.ownedEntries.has(resource)) return;
      const entry = () => resource.kill();
      state.ownedEntries.set(resource, entry);
      state.entries.add(entry);
    },
    dispose() {
      if (isScopeDisposed(scope)) return;
      disposedScopes.add(scope);

      const state = getInternalScopeState(scope);
      const childSnapshot = state.childDisposers.splice(0);
      const entrySnapshot = Array.from(state.entries);
      state.entries.clear();
      state.ownedEntries.clear();
      const errors: unknown[] = [];

      for (const fn of childSnapshot) {
        const error = runCleanupSafely(fn);
        if (error) errors.push(error);
      }

      for (const fn of entrySnapshot) {
        const error = runCleanupSafely(fn);
        if (error) errors.push(error);
      }

      if (errors.length > 0) {
        console.error('[Holdfast] scope.dispose() had cleanup errors:', errors);
      }
    },
    parent,
    name,
  };

  scopeState.set(scope, {
    entries: new Set(),
    ownedEntries: new Map(),
    childDisposers: [],
  });

  if (parent) {
    registerChildScope(parent, scope);
  }

  return scope;
}

/**
 * The currently active scope for the running code path.
 * This is set by `withScope()` and read by reactive primitives.
 */
let currentScope: Scope | null = null;

/** Returns the current active scope (or null if none). */
export function getCurrentScope(): Scope | null {
  return currentScope;
}

/**
 * Runs a function with the given scope set as current, then restores the previous scope.
 */
export function withScope<T>(scope: Scope, fn: () => T): T {
  if (isScopeDisposed(scope)) {
    throw new Error('[Holdfast] withScope() cannot enter a disposed scope.');
  }
  const prevScope = currentScope;
  currentScope = scope;
  try {
    return fn();
  } finally {
    currentScope = prevScope;
  }
}
