/**
 * Configuration errors raised when binding input controllers.
 *
 * They indicate a mistake in the UI declaration, never a transient
 * condition: they are thrown synchronously and never retried.
 */

import * as DomApi from './dom-api.js';
import { typ } from './keys.js';

export type ControllerErrorKind =
  /** A second controller for a prop that already has one. */
  | 'duplicate-controller'
  /** A one-way binder and a controller targeting the same prop. */
  | 'conflicting-binder'
  /** The element kind has no controllable prop (file input, div, ...). */
  | 'unsupported-element'
  /** The prop or event does not match what the element kind expects. */
  | 'property-mismatch'
  /** The prop is not controllable on this element. */
  | 'unknown-property';

export interface ControllerErrorDetails {
  /** Element description, e.g. `input [type=checkbox]`. */
  element: string;
  prop: string;
  /** Correct prop or event name, when one can be suggested. */
  suggestion?: string;
}

export class ControllerError extends Error {
  readonly kind: ControllerErrorKind;
  readonly element: string;
  readonly prop: string;
  readonly suggestion: string | undefined;

  constructor(message: string, kind: ControllerErrorKind, details: ControllerErrorDetails) {
    super(message);
    this.name = 'ControllerError';
    this.kind = kind;
    this.element = details.element;
    this.prop = details.prop;
    this.suggestion = details.suggestion;
  }
}

export function isControllerError(error: unknown): error is ControllerError {
  return error instanceof ControllerError;
}

export type CompatibilityResult =
  | { ok: true }
  | { ok: false; error: ControllerError };

/** Element description including its `type` attribute, e.g. `input#age [type=number]`. */
export function nodeDescription(ref: HTMLElement): string {
  const maybeType = DomApi.getHtmlAttributeRaw(ref, typ);
  const typeSuffix = maybeType !== undefined ? ` [type=${maybeType}]` : '';
  return `${DomApi.debugNodeDescription(ref)}${typeSuffix}`;
}

function fail(
  kind: ControllerErrorKind,
  ref: HTMLElement,
  prop: string,
  message: (element: string) => string,
  suggestion?: string
): ControllerError {
  const element = nodeDescription(ref);
  return new ControllerError(`[Holdfast] ${message(element)}`, kind, { element, prop, suggestion });
}

export const controllerErrors = {
  duplicateController(ref: HTMLElement, prop: string): ControllerError {
    return fail('duplicate-controller', ref, prop, (element) =>
      `Can not add another \`${prop}\` controller to an element that already has one: ${element}`
    );
  },

  conflictingBinder(ref: HTMLElement, prop: string): ControllerError {
    return fail('conflicting-binder', ref, prop, (element) =>
      `Can not add \`${prop}\` controller to an element that already has a one-way \`${prop}\` binder: ${element}`
    );
  },

  binderOnControlledProp(ref: HTMLElement, prop: string): ControllerError {
    return fail('conflicting-binder', ref, prop, (element) =>
      `Can not add a one-way \`${prop}\` binder to an element that already has a \`${prop}\` controller: ${element}`
    );
  },

  unsupportedElement(ref: HTMLElement, prop: string): ControllerError {
    return fail('unsupported-element', ref, prop, (element) =>
      `Can not add \`${prop}\` controller to unsupported kind of element: ${element}`
    );
  },

  propMismatch(ref: HTMLElement, prop: string, expectedProp: string): ControllerError {
    return fail('property-mismatch', ref, prop, (element) =>
      `Can not add \`${prop}\` controller to this element: ${element}: Use \`${expectedProp}\` prop instead of \`${prop}\` prop.`,
      expectedProp
    );
  },

  eventMismatch(ref: HTMLElement, prop: string, expectedEvent: string, actualEvent: string): ControllerError {
    return fail('property-mismatch', ref, prop, (element) =>
      `Can not add \`${prop}\` controller to this element: ${element}: Use \`${expectedEvent}\` event instead of \`${actualEvent}\` event.`,
      expectedEvent
    );
  },

  notControllable(ref: HTMLElement, prop: string): ControllerError {
    return fail('unsupported-element', ref, prop, (element) =>
      `Can not add a controller for property \`${prop}\` to ${element}: this element type is not configured to allow controlled inputs.`
    );
  },

  unknownProperty(ref: HTMLElement, prop: string, controllableProps: readonly string[]): ControllerError {
    return fail('unknown-property', ref, prop, (element) =>
      `Can not add a controller for property \`${prop}\` to ${element}: on this element type, only the following props can be controlled this way: \`${controllableProps.join('`, `')}\`.`,
      controllableProps[0]
    );
  },
};
