import type { InputControllerConfig } from './input-config.js';

export interface HtmlTag {
  readonly kind: 'html';
  readonly name: string;
}

/**
 * Tag of a custom element / web component.
 *
 * `controllerConfigs` declares which properties of the element may be
 * `controlled`, and how to read and write them. Most components declare at
 * most one; components wrapping several independent fields may declare more.
 */
export interface CustomHtmlTag {
  readonly kind: 'custom';
  readonly name: string;
  controllerConfigs(ref: HTMLElement): ReadonlyArray<InputControllerConfig<unknown>>;
}

export type Tag = HtmlTag | CustomHtmlTag;

export interface CustomHtmlTagOptions {
  controllerConfigs?: (ref: HTMLElement) => ReadonlyArray<InputControllerConfig<unknown>>;
}

export function htmlTag(name: string): HtmlTag {
  return { kind: 'html', name };
}

export function customHtmlTag(name: string, options: CustomHtmlTagOptions = {}): CustomHtmlTag {
  if (!name.includes('-')) {
    throw new Error(`[Holdfast] customHtmlTag: tag "${name}" must contain a hyphen.`);
  }
  const controllerConfigs = options.controllerConfigs ?? (() => []);
  return { kind: 'custom', name, controllerConfigs };
}

export const div = htmlTag('div');
export const span = htmlTag('span');
export const form = htmlTag('form');
export const input = htmlTag('input');
export const textArea = htmlTag('textarea');
export const select = htmlTag('select');
export const option = htmlTag('option');
