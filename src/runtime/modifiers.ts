/**
 * Modifiers: what can be passed to `el()` / `amend()`.
 *
 * @module holdfast/runtime
 */

import { Subscription } from '../core/owned.js';
import type { Scope } from '../core/scope.js';
import { foreach, type Source } from '../core/stream.js';
import { controllerErrors } from './controller-errors.js';
import * as DomApi from './dom-api.js';
import type { DomListener } from './dom-api.js';
import type { Modifier, ReactiveElement } from './element.js';
import type { EventProcessor } from './event-processor.js';
import type { HtmlAttr, HtmlProp } from './keys.js';

/**
 * An event processor plus the callback receiving its values.
 *
 * The DOM callback is created once, so the same function can be removed from
 * and re-added to the element (see listener reordering in `InputController`).
 */
export class EventListener<Ev extends Event, Out> implements Modifier, DomListener {
  readonly domCallback: (ev: Event) => void;

  constructor(
    readonly eventProcessor: EventProcessor<Ev, Out>,
    readonly callback: (value: Out) => void
  ) {
    this.domCallback = (ev: Event) => {
      const result = eventProcessor.process(ev);
      if (result.accepted) callback(result.value);
    };
  }

  get eventName(): string {
    return this.eventProcessor.eventName;
  }

  get useCapture(): boolean {
    return this.eventProcessor.useCapture;
  }

  apply(element: ReactiveElement): void {
    element.bindDynamic((owner) => {
      new Subscription(owner, element.attachListener(this));
    });
  }
}

/**
 * Listen to DOM events of an element while it is mounted.
 *
 * @example
 * ```ts
 * el(input, listen(on(onInput).mapToValue(), (v) => text.set(v)));
 * ```
 */
export function listen<Ev extends Event, Out>(
  processor: EventProcessor<Ev, Out>,
  callback: (value: Out) => void
): EventListener<Ev, Out> {
  return new EventListener(processor, callback);
}

/** A prop key plus a way to observe the values meant for it. */
export interface ValueUpdater<V> {
  readonly key: HtmlProp<V>;
  foreachValue(onNext: (value: V) => void, owner: Scope): Subscription;
}

/**
 * One-way binding: writes every value of `values` into `key` while mounted.
 *
 * A prop that is bound one-way can not also be `controlled`, and vice versa.
 */
export class PropUpdater<V> implements Modifier, ValueUpdater<V> {
  constructor(
    readonly key: HtmlProp<V>,
    readonly values: Source<V>
  ) {}

  apply(element: ReactiveElement): void {
    element.registerPropBinder(this.key.name);
    element.bindDynamic((owner) => this.activate(element, owner));
  }

  private activate(element: ReactiveElement, owner: Scope): void {
    if (element.hasControllerForProp(this.key.name)) {
      throw controllerErrors.binderOnControlledProp(element.ref, this.key.name);
    }
    this.foreachValue((value) => DomApi.setHtmlProp(element.ref, this.key, value), owner);
  }

  foreachValue(onNext: (value: V) => void, owner: Scope): Subscription {
    return foreach(this.values, onNext, owner);
  }
}

export function bindProp<V>(key: HtmlProp<V>, values: Source<V>): PropUpdater<V> {
  return new PropUpdater(key, values);
}

/** A modifier running arbitrary code against the element when applied. */
export function binder(fn: (element: ReactiveElement) => void): Modifier {
  return { apply: fn };
}

/** Run `fn` on every mount, with that mount's owner. */
export function onMount(fn: (element: ReactiveElement, owner: Scope) => void): Modifier {
  return binder((element) => element.bindDynamic((owner) => fn(element, owner)));
}

export function setProp<V>(key: HtmlProp<V>, value: V): Modifier {
  return binder((element) => DomApi.setHtmlProp(element.ref, key, value));
}

export function setAttr(attr: HtmlAttr, value: string): Modifier {
  return binder((element) => DomApi.setHtmlAttribute(element.ref, attr, value));
}

export function text(content: string): Modifier {
  return binder((element) => {
    element.ref.appendChild(element.ref.ownerDocument.createTextNode(content));
  });
}
