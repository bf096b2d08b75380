/**
 * Thin adapter over the DOM.
 *
 * Everything that touches `element.value` / `element.checked`, attributes or
 * native listener registration goes through here, so the rest of the runtime
 * never pokes at DOM objects directly.
 */

import type { HtmlAttr, HtmlProp } from './keys.js';

/** What the runtime needs to (re)register a native listener. */
export interface DomListener {
  readonly eventName: string;
  readonly useCapture: boolean;
  /** Stable function identity, so the same listener can be removed and re-added. */
  readonly domCallback: (ev: Event) => void;
}

export function getDocument(): Document {
  if (typeof document === 'undefined') {
    throw new Error('[Holdfast] No global `document` available to create elements.');
  }
  return document;
}

export function isHtmlElement(target: EventTarget | null): target is HTMLElement {
  return target !== null && 'tagName' in target && 'getAttribute' in target;
}

export function isInput(ref: HTMLElement): ref is HTMLInputElement {
  return ref.tagName === 'INPUT';
}

export function isTextArea(ref: HTMLElement): ref is HTMLTextAreaElement {
  return ref.tagName === 'TEXTAREA';
}

export function isSelect(ref: HTMLElement): ref is HTMLSelectElement {
  return ref.tagName === 'SELECT';
}

/** Custom elements must have a hyphen in their tag name. */
export function isCustomElement(ref: HTMLElement): boolean {
  return ref.tagName.includes('-');
}

/** Reads `ref.value`, or undefined when the element has no string `value`. */
export function getValue(ref: HTMLElement): string | undefined {
  if ('value' in ref && typeof ref.value === 'string') {
    return ref.value;
  }
  return undefined;
}

export function setValue(ref: HTMLElement, value: string): void {
  if ('value' in ref) {
    ref.value = value;
  } else {
    Reflect.set(ref, 'value', value);
  }
}

/** Reads `ref.checked`, or undefined when the element has no boolean `checked`. */
export function getChecked(ref: HTMLElement): boolean | undefined {
  if ('checked' in ref && typeof ref.checked === 'boolean') {
    return ref.checked;
  }
  return undefined;
}

export function setChecked(ref: HTMLElement, checked: boolean): void {
  if ('checked' in ref) {
    ref.checked = checked;
  } else {
    Reflect.set(ref, 'checked', checked);
  }
}

export function setHtmlProp<V>(ref: HTMLElement, prop: HtmlProp<V>, value: V): void {
  Reflect.set(ref, prop.name, value);
}

export function getHtmlAttributeRaw(ref: HTMLElement, attr: HtmlAttr): string | undefined {
  return ref.getAttribute(attr.name) ?? undefined;
}

export function setHtmlAttribute(ref: HTMLElement, attr: HtmlAttr, value: string | null): void {
  if (value === null) ref.removeAttribute(attr.name);
  else ref.setAttribute(attr.name, value);
}

export function addEventListener(ref: HTMLElement, listener: DomListener): void {
  ref.addEventListener(listener.eventName, listener.domCallback, listener.useCapture);
}

export function removeEventListener(ref: HTMLElement, listener: DomListener): void {
  ref.removeEventListener(listener.eventName, listener.domCallback, listener.useCapture);
}

/**
 * Short human-readable description of an element for error messages,
 * e.g. `input#email.wide`.
 */
export function debugNodeDescription(ref: HTMLElement): string {
  const id = ref.id ? `#${ref.id}` : '';
  const classes = ref.className && typeof ref.className === 'string'
    ? ref.className.trim().split(/\s+/).map((c) => `.${c}`).join('')
    : '';
  return `${ref.tagName.toLowerCase()}${id}${classes}`;
}
