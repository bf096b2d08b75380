import { forgetOwned, type Scope } from "./scope.js";

/**
 * A leaky resource such as a signal subscription or a DOM listener patch.
 *
 * Because of the circular references in a reactive graph, such resources leak
 * unless they are explicitly killed. An `Owned` therefore registers with its
 * owner before doing anything else, and the owner kills it when the lifecycle
 * it represents (e.g. an element's mounted state) ends.
 */
export abstract class Owned {
  private killed = false;

  protected constructor(protected readonly owner: Scope) {
    owner.own(this);
  }

  get isKilled(): boolean {
    return this.killed;
  }

  /**
   * Release the resource. Called by the owner on disposal.
   * Subsequent calls are no-ops.
   */
  kill(): void {
    if (this.killed) return;
    this.killed = true;
    forgetOwned(this.owner, this);
    this.onKill();
  }

  protected abstract onKill(): void;
}

/** An owned resource that runs a single cleanup callback when killed. */
export class Subscription extends Owned {
  private readonly cleanup: () => void;

  constructor(owner: Scope, cleanup: () => void) {
    super(owner);
    this.cleanup = cleanup;
  }

  protected onKill(): void {
    this.cleanup();
  }
}
