/**
 * Holdfast Runtime Module
 *
 * Reactive elements, modifiers and controlled inputs.
 *
 * @module holdfast/runtime
 */

export { ReactiveElement, el, render } from './element.js';
export type { Modifier, ControllerSlot, AttachListenerOptions, RootNode } from './element.js';

export {
  htmlTag,
  customHtmlTag,
  div,
  span,
  form,
  input,
  textArea,
  select,
  option,
} from './tags.js';
export type { HtmlTag, CustomHtmlTag, CustomHtmlTagOptions, Tag } from './tags.js';

export {
  htmlProp,
  htmlAttr,
  eventProp,
  plainEventProp,
  customEventProp,
  value,
  checked,
  disabled,
  typ,
  idAttr,
  valueAttr,
  onInput,
  onChange,
  onClick,
} from './keys.js';
export type { HtmlProp, HtmlAttr, EventProp } from './keys.js';

export { EventProcessor, on } from './event-processor.js';
export type { Processed } from './event-processor.js';

export {
  EventListener,
  PropUpdater,
  listen,
  bindProp,
  binder,
  onMount,
  setProp,
  setAttr,
  text,
} from './modifiers.js';
export type { ValueUpdater } from './modifiers.js';

export {
  inputControllerConfig,
  textValueConfig,
  selectValueConfig,
  checkedConfig,
  htmlControllableProps,
  allowedControllerConfigs,
  allowedControlKeys,
  controllableProps,
} from './input-config.js';
export type { InputControllerConfig, InputControllerConfigOptions, ControlKey, ControllableKind } from './input-config.js';

export { InputController, checkControllerCompatibility } from './input-controller.js';
export { controlled } from './controlled.js';

export { ControllerError, isControllerError, nodeDescription } from './controller-errors.js';
export type { ControllerErrorKind, ControllerErrorDetails, CompatibilityResult } from './controller-errors.js';

export { debugNodeDescription } from './dom-api.js';
export type { DomListener } from './dom-api.js';
