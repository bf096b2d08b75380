/**
 * Which property of which kind of element may be `controlled`, and how.
 *
 * @module holdfast/runtime
 */

import * as DomApi from './dom-api.js';
import type { ReactiveElement } from './element.js';
import { checked, onChange, onClick, onInput, value, type EventProp, type HtmlProp } from './keys.js';
import type { CustomHtmlTag } from './tags.js';

/**
 * Policy for one controllable property of one kind of element.
 *
 * The first entry of `eventProps` is the event `controlled` listeners are
 * expected to use; it is the one suggested in error messages.
 */
export interface InputControllerConfig<A> {
  readonly initialValue: A;
  readonly prop: HtmlProp<A>;
  readonly eventProps: ReadonlyArray<EventProp<Event>>;
  getDomValue(ref: HTMLElement): A;
  setDomValue(ref: HTMLElement, value: A): void;
}

export interface InputControllerConfigOptions<A> {
  initialValue: A;
  prop: HtmlProp<A>;
  eventProps: ReadonlyArray<EventProp<Event>>;
  getDomValue: (ref: HTMLElement) => A;
  setDomValue: (ref: HTMLElement, value: A) => void;
}

/**
 * Declare a controller config. Used for the built-in element kinds and by
 * custom element tags (see `customHtmlTag`).
 */
export function inputControllerConfig<A>(options: InputControllerConfigOptions<A>): InputControllerConfig<A> {
  if (options.eventProps.length === 0) {
    throw new Error(`[Holdfast] inputControllerConfig: \`${options.prop.name}\` needs at least one event.`);
  }
  return Object.freeze({
    initialValue: options.initialValue,
    prop: options.prop,
    eventProps: Object.freeze([...options.eventProps]),
    getDomValue: options.getDomValue,
    setDomValue: options.setDomValue,
  });
}

export const textValueConfig: InputControllerConfig<string> = inputControllerConfig({
  initialValue: '',
  prop: value,
  eventProps: [onInput],
  getDomValue: (ref) => DomApi.getValue(ref) ?? '',
  setDomValue: DomApi.setValue,
});

// `change` only fires when the selection actually changes, unlike `input` on text fields.
export const selectValueConfig: InputControllerConfig<string> = inputControllerConfig({
  initialValue: '',
  prop: value,
  eventProps: [onChange],
  getDomValue: (ref) => DomApi.getValue(ref) ?? '',
  setDomValue: DomApi.setValue,
});

// Browsers disagree on `input` for checkboxes, so `click` is watched too.
export const checkedConfig: InputControllerConfig<boolean> = inputControllerConfig({
  initialValue: false,
  prop: checked,
  eventProps: [onClick, onInput],
  getDomValue: (ref) => DomApi.getChecked(ref) ?? false,
  setDomValue: DomApi.setChecked,
});

/** Standard HTML properties that can be `controlled`. */
export const htmlControllableProps: readonly string[] = Object.freeze(['value', 'checked']);

/** The kinds of element the controller knows about. */
export type ControllableKind =
  | { kind: 'input'; inputType: string }
  | { kind: 'textarea' }
  | { kind: 'select' }
  | { kind: 'custom'; tag: CustomHtmlTag | null }
  | { kind: 'other' };

export function resolveElementKind(element: ReactiveElement): ControllableKind {
  const ref = element.ref;
  if (DomApi.isInput(ref)) return { kind: 'input', inputType: ref.type };
  if (DomApi.isTextArea(ref)) return { kind: 'textarea' };
  if (DomApi.isSelect(ref)) return { kind: 'select' };
  if (DomApi.isCustomElement(ref)) {
    return { kind: 'custom', tag: element.tag.kind === 'custom' ? element.tag : null };
  }
  return { kind: 'other' };
}

/**
 * Controller configs usable with this element in its current state.
 * Empty when the element can not be controlled (file inputs, plain divs,
 * custom elements without declared configs).
 *
 * Depends on the `type` of inputs, so call it once `type` is final.
 */
export function allowedControllerConfigs(element: ReactiveElement): ReadonlyArray<InputControllerConfig<unknown>> {
  const kind = resolveElementKind(element);
  switch (kind.kind) {
    case 'input':
      switch (kind.inputType) {
        case 'text':
          return [textValueConfig];
        case 'checkbox':
        case 'radio':
          return [checkedConfig];
        case 'file':
          return [];
        default:
          // All the other input types: email, color, date, etc.
          return [textValueConfig];
      }
    case 'textarea':
      return [textValueConfig];
    case 'select':
      return [selectValueConfig];
    case 'custom':
      return kind.tag ? kind.tag.controllerConfigs(element.ref) : [];
    case 'other':
      return [];
  }
}

export interface ControlKey {
  readonly prop: string;
  readonly event: string;
}

/** The (prop, event) pairs `controlled` may be used with on this element. */
export function allowedControlKeys(element: ReactiveElement): readonly ControlKey[] {
  return allowedControllerConfigs(element).map((config) => ({
    prop: config.prop.name,
    event: primaryEventName(config),
  }));
}

export function primaryEventName(config: InputControllerConfig<unknown>): string {
  return config.eventProps[0]?.name ?? '';
}

/**
 * Props of this element that may be `controlled`, independent of input `type`
 * (which may not be final yet). Undefined when none.
 */
export function controllableProps(element: ReactiveElement): readonly string[] | undefined {
  const kind = resolveElementKind(element);
  switch (kind.kind) {
    case 'input':
      return htmlControllableProps;
    case 'textarea':
    case 'select':
      return ['value'];
    case 'custom': {
      const names = kind.tag ? kind.tag.controllerConfigs(element.ref).map((config) => config.prop.name) : [];
      return names.length > 0 ? names : undefined;
    }
    case 'other':
      return undefined;
  }
}
