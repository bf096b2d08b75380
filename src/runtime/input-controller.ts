/**
 * Input controller: keeps one controllable DOM property of one element in
 * sync with a reactive source, while user input flows out through a listener.
 *
 * Two paths feed the DOM property:
 * - upstream values (signal / stream) are written as they arrive;
 * - DOM events go through the listener's processor and callback, after
 *   which the property is reset to the authoritative value. If upstream logic
 *   rejects what the user typed, the input reverts instead of drifting.
 *
 * @module holdfast/runtime
 */

import { getConfig, warn } from '../core/dev.js';
import { Subscription } from '../core/owned.js';
import { isBatching, queueInBatch } from '../core/scheduler.js';
import { isScopeDisposed, type Scope } from '../core/scope.js';
import { combineObservers } from '../core/stream.js';
import { controllerErrors, type CompatibilityResult } from './controller-errors.js';
import * as DomApi from './dom-api.js';
import type { ControllerSlot, ReactiveElement } from './element.js';
import type { EventProcessor } from './event-processor.js';
import {
  allowedControllerConfigs,
  primaryEventName,
  type InputControllerConfig,
} from './input-config.js';
import { typ } from './keys.js';
import { EventListener, type ValueUpdater } from './modifiers.js';

export class InputController<A, Ev extends Event, B> implements ControllerSlot {
  // May differ from the element's `defaultValue` / `defaultChecked`.
  private prevValue: A;

  private readonly resetProcessor: EventProcessor<Ev, B>;

  constructor(
    private readonly config: InputControllerConfig<A>,
    readonly element: ReactiveElement,
    private readonly updater: ValueUpdater<A>,
    readonly listener: EventListener<Ev, B>
  ) {
    this.prevValue = config.initialValue;

    // Accepted values are handled by the reset observer. Filtered-out ones
    // never reach upstream, so the input is restored here.
    this.resetProcessor = listener.eventProcessor.orElseEval(() => {
      this.setValue(this.prevValue);
    });

    // Overrides `defaultValue`. A signal source replaces this on mount;
    // with a stream it stays in effect until the first emission.
    this.setValue(config.initialValue, true);
  }

  get propDomName(): string {
    return this.config.prop.name;
  }

  get eventName(): string {
    return this.listener.eventName;
  }

  private setValue(nextValue: A, force = false): void {
    // Skipping redundant writes keeps the caret in place in Safari.
    if (force || nextValue !== this.config.getDomValue(this.element.ref)) {
      this.config.setDomValue(this.element.ref, nextValue);
    }
    // Updated regardless, or filtered-out input would clear the field on the next reset.
    this.prevValue = nextValue;
  }

  private combinedObserver(owner: Scope): (value: B) => void {
    let latestSourceValue: { value: A } | null = null;

    // TODO: on remount, resync `latestSourceValue` from a stream source that
    // kept emitting to other observers while this element was unmounted.
    this.updater.foreachValue((sourceValue) => {
      latestSourceValue = { value: sourceValue };
      this.setValue(sourceValue);
    }, owner);

    const resetObserver = (): void => {
      const reset = () => {
        // A reset queued in `batch()` may flush after unmount.
        if (isScopeDisposed(owner)) return;
        this.setValue(latestSourceValue ? latestSourceValue.value : this.prevValue);
      };
      // Must run after the callback's updates have propagated. Inside `batch()`
      // those are queued, so queue behind them.
      if (isBatching()) queueInBatch(reset);
      else reset();
    };

    return combineObservers<B>(this.listener.callback, resetObserver);
  }

  /** Register this controller's activation with the element. */
  bind(): void {
    this.element.bindDynamic((owner) => this.activate(owner));
  }

  private activate(owner: Scope): void {
    // On mount, the element's `type` is as final as it gets.
    const compatibility = checkControllerCompatibility(this.element, this);
    if (!compatibility.ok) throw compatibility.error;

    warnIfUntyped(this.element);

    const ref = this.element.ref;
    const observer = this.combinedObserver(owner);
    const controllerListener = new EventListener(this.resetProcessor, observer);

    // The controller must see events before any other listener of the element,
    // so take the others off the DOM, go first, then put them back in order.
    // The listeners themselves (and their subscriptions) are untouched.
    this.element.foreachEventListener((listener) => DomApi.removeEventListener(ref, listener));
    const detach = this.element.attachListener(controllerListener, { prepend: true });
    this.element.foreachEventListener((listener) => {
      if (listener !== controllerListener) DomApi.addEventListener(ref, listener);
    });

    this.element.activateController(this);

    // Undoing the patch on unmount only takes removing the controller listener.
    new Subscription(owner, () => {
      detach();
      this.element.deactivateController(this);
    });
  }
}

/**
 * Check that `controller` may be activated on `element` in its current state.
 */
export function checkControllerCompatibility(
  element: ReactiveElement,
  controller: ControllerSlot & { readonly eventName: string }
): CompatibilityResult {
  const ref = element.ref;
  const prop = controller.propDomName;

  if (element.hasOtherControllerForSameProp(controller)) {
    return { ok: false, error: controllerErrors.duplicateController(ref, prop) };
  }

  if (element.hasBinderForControllableProp(prop)) {
    return { ok: false, error: controllerErrors.conflictingBinder(ref, prop) };
  }

  const configs = allowedControllerConfigs(element);
  const first = configs[0];
  if (!first) {
    return { ok: false, error: controllerErrors.unsupportedElement(ref, prop) };
  }

  const config = configs.find((candidate) => candidate.prop.name === prop);
  if (!config) {
    return { ok: false, error: controllerErrors.propMismatch(ref, prop, first.prop.name) };
  }

  if (!config.eventProps.some((eventProp) => eventProp.name === controller.eventName)) {
    return {
      ok: false,
      error: controllerErrors.eventMismatch(ref, prop, primaryEventName(config), controller.eventName),
    };
  }

  return { ok: true };
}

function warnIfUntyped(element: ReactiveElement): void {
  if (!getConfig().warnOnUntypedInput) return;
  if (!DomApi.isInput(element.ref)) return;
  if (DomApi.getHtmlAttributeRaw(element.ref, typ) !== undefined) return;
  warn(`Controlled input has no \`type\` attribute at mount, treating it as a text input: ${DomApi.debugNodeDescription(element.ref)}`);
}
