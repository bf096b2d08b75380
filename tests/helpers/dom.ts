import { JSDOM } from 'jsdom';

import { getChecked, getValue, setValue } from '../../src/runtime/dom-api.js';

export const tick = (ms = 0) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Spin up a fresh JSDOM for the duration of one test.
 * Sets the `document` global and tears it down afterwards.
 */
export async function withDom(fn: (dom: JSDOM) => void | Promise<void>): Promise<void> {
  const dom = new JSDOM('<!doctype html><html><body></body></html>', {
    url: 'http://localhost/',
  });

  globalThis.document = dom.window.document;

  try {
    await fn(dom);
  } finally {
    Reflect.deleteProperty(globalThis, 'document');
    dom.window.close();
  }
}

/** Simulate typing: set the value, then fire a bubbling `input` event. */
export function typeInto(dom: JSDOM, ref: HTMLElement, text: string): void {
  setValue(ref, text);
  ref.dispatchEvent(new dom.window.Event('input', { bubbles: true }));
}

export function fire(dom: JSDOM, ref: HTMLElement, type: string): void {
  ref.dispatchEvent(new dom.window.Event(type, { bubbles: true }));
}

export function valueOf(ref: HTMLElement): string | undefined {
  return getValue(ref);
}

export function checkedOf(ref: HTMLElement): boolean | undefined {
  return getChecked(ref);
}

/** Capture console output of one kind for the duration of `fn`. */
export async function captureConsole(
  kind: 'warn' | 'error',
  fn: () => void | Promise<void>
): Promise<string[]> {
  const original = console[kind];
  const lines: string[] = [];
  console[kind] = (...args: unknown[]) => {
    lines.push(args.map(String).join(' '));
  };
  try {
    await fn();
  } finally {
    console[kind] = original;
  }
  return lines;
}
