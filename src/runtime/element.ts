/**
 * Reactive elements: a DOM element plus everything bound to its lifetime.
 *
 * Modifiers are applied once, when the element is built. Dynamic bindings
 * (listeners, prop binders, controllers) are activated on every mount, each
 * time with a fresh owner scope, and killed together on unmount.
 *
 * @module holdfast/runtime
 */

import { createScope, isScopeDisposed, type Scope } from '../core/scope.js';
import * as DomApi from './dom-api.js';
import type { DomListener } from './dom-api.js';
import type { Tag } from './tags.js';

export interface Modifier {
  apply(element: ReactiveElement): void;
}

/** What the element tracks about an input controller. */
export interface ControllerSlot {
  readonly propDomName: string;
}

export interface AttachListenerOptions {
  /** Put the listener in front of every other listener of the element. */
  prepend?: boolean;
}

export class ReactiveElement implements Modifier {
  readonly ref: HTMLElement;

  private readonly activations: Array<(owner: Scope) => void> = [];
  /** Listeners currently registered on the DOM, in dispatch order. */
  private readonly listeners: DomListener[] = [];
  private readonly controllers: ControllerSlot[] = [];
  private readonly propBinders = new Set<string>();
  private readonly children: ReactiveElement[] = [];
  private parentElement: ReactiveElement | null = null;
  private mountScope: Scope | null = null;

  constructor(readonly tag: Tag, modifiers: readonly Modifier[] = []) {
    this.ref = DomApi.getDocument().createElement(tag.name);
    this.amend(...modifiers);
  }

  /** Apply more modifiers. Dynamic ones activate right away if mounted. */
  amend(...modifiers: Modifier[]): this {
    for (const modifier of modifiers) modifier.apply(this);
    return this;
  }

  /** Used as a modifier, an element appends itself to its parent. */
  apply(parent: ReactiveElement): void {
    parent.appendChild(this);
  }

  appendChild(child: ReactiveElement): void {
    if (child.parentElement) {
      throw new Error(
        `[Holdfast] ${DomApi.debugNodeDescription(child.ref)} already has a parent element.`
      );
    }
    child.parentElement = this;
    this.children.push(child);
    this.ref.appendChild(child.ref);
    if (this.mountScope && this.isMounted) child.mount(this.mountScope);
  }

  get isMounted(): boolean {
    return this.mountScope !== null && !isScopeDisposed(this.mountScope);
  }

  /** The owner of the current mount, or null when unmounted. */
  get owner(): Scope | null {
    return this.isMounted ? this.mountScope : null;
  }

  /**
   * Activate dynamic bindings, then mount children.
   *
   * An activation that throws aborts the mount. Bindings activated before it
   * stay live until `unmount()`.
   */
  mount(parentScope: Scope | null = null): void {
    if (this.isMounted) return;

    const scope = createScope(parentScope, { name: DomApi.debugNodeDescription(this.ref) });
    this.mountScope = scope;

    for (const activate of this.activations.slice()) activate(scope);
    for (const child of this.children.slice()) child.mount(scope);
  }

  /** Kill everything bound to the current mount (children first). */
  unmount(): void {
    const scope = this.mountScope;
    if (!scope) return;
    this.mountScope = null;
    scope.dispose();
  }

  /**
   * Register an activation to run on every mount with that mount's owner.
   * Runs immediately if the element is already mounted.
   */
  bindDynamic(activate: (owner: Scope) => void): void {
    this.activations.push(activate);
    const owner = this.owner;
    if (owner) activate(owner);
  }

  // --------------------------------------------------------------------------
  // Event listeners
  // --------------------------------------------------------------------------

  /**
   * Register a listener on the DOM and in the element's listener list.
   * Returns a function that removes it from both.
   * @internal
   */
  attachListener(listener: DomListener, options: AttachListenerOptions = {}): () => void {
    if (options.prepend) this.listeners.unshift(listener);
    else this.listeners.push(listener);
    DomApi.addEventListener(this.ref, listener);

    return () => {
      const index = this.listeners.indexOf(listener);
      if (index === -1) return;
      this.listeners.splice(index, 1);
      DomApi.removeEventListener(this.ref, listener);
    };
  }

  foreachEventListener(fn: (listener: DomListener) => void): void {
    for (const listener of this.listeners.slice()) fn(listener);
  }

  /** Listeners currently registered on the DOM, in dispatch order. */
  get eventListeners(): readonly DomListener[] {
    return this.listeners.slice();
  }

  // --------------------------------------------------------------------------
  // Controllers and one-way binders
  // --------------------------------------------------------------------------

  /** @internal */
  activateController(controller: ControllerSlot): void {
    if (!this.controllers.includes(controller)) this.controllers.push(controller);
  }

  /** @internal */
  deactivateController(controller: ControllerSlot): void {
    const index = this.controllers.indexOf(controller);
    if (index !== -1) this.controllers.splice(index, 1);
  }

  hasOtherControllerForSameProp(controller: ControllerSlot): boolean {
    return this.controllers.some(
      (other) => other !== controller && other.propDomName === controller.propDomName
    );
  }

  hasControllerForProp(propName: string): boolean {
    return this.controllers.some((controller) => controller.propDomName === propName);
  }

  /** @internal */
  registerPropBinder(propName: string): void {
    this.propBinders.add(propName);
  }

  hasBinderForControllableProp(propName: string): boolean {
    return this.propBinders.has(propName);
  }
}

/** Build an element from a tag and modifiers. */
export function el(tag: Tag, ...modifiers: Modifier[]): ReactiveElement {
  return new ReactiveElement(tag, modifiers);
}

export interface RootNode {
  readonly element: ReactiveElement;
  unmount(): void;
}

/**
 * Append `element` to `container` and mount it.
 *
 * @example
 * ```ts
 * const root = render(document.body, el(input, setAttr(typ, 'text')));
 * root.unmount();
 * ```
 */
export function render(container: Element, element: ReactiveElement): RootNode {
  container.appendChild(element.ref);
  element.mount(null);

  return {
    element,
    unmount() {
      element.unmount();
      element.ref.remove();
    },
  };
}
