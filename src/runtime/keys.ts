/**
 * Typed keys for element properties, attributes and DOM events.
 *
 * @module holdfast/runtime
 */

/** A DOM property such as `value` or `checked`, read as `V`. */
export interface HtmlProp<V> {
  readonly kind: 'prop';
  readonly name: string;
  /** Converts a raw DOM property value into `V`. */
  decode(raw: unknown): V;
}

/** An HTML attribute such as `type`. */
export interface HtmlAttr {
  readonly kind: 'attr';
  readonly name: string;
}

/** A DOM event name, with a guard narrowing dispatched events to `Ev`. */
export interface EventProp<Ev extends Event> {
  readonly kind: 'event';
  readonly name: string;
  matches(ev: Event): ev is Ev;
}

export function htmlProp<V>(name: string, decode: (raw: unknown) => V): HtmlProp<V> {
  return { kind: 'prop', name, decode };
}

export function htmlAttr(name: string): HtmlAttr {
  return { kind: 'attr', name };
}

export function eventProp<Ev extends Event>(name: string, matches: (ev: Event) => ev is Ev): EventProp<Ev> {
  return { kind: 'event', name, matches };
}

const anyEvent = (ev: Event): ev is Event => typeof ev.type === 'string';

/** An event with no particular payload shape. */
export function plainEventProp(name: string): EventProp<Event> {
  return eventProp(name, anyEvent);
}

/** A custom event carrying a `detail` payload (web components). */
export function customEventProp(name: string): EventProp<CustomEvent<unknown>> {
  return eventProp(name, (ev): ev is CustomEvent<unknown> => 'detail' in ev);
}

// ----------------------------------------------------------------------------
// Properties
// ----------------------------------------------------------------------------

export const value = htmlProp('value', (raw) => (raw == null ? '' : String(raw)));
export const checked = htmlProp('checked', (raw) => raw === true);
export const disabled = htmlProp('disabled', (raw) => raw === true);

// ----------------------------------------------------------------------------
// Attributes
// ----------------------------------------------------------------------------

export const typ = htmlAttr('type');
export const idAttr = htmlAttr('id');
export const valueAttr = htmlAttr('value');

// ----------------------------------------------------------------------------
// Events
// ----------------------------------------------------------------------------

export const onInput = plainEventProp('input');
export const onChange = plainEventProp('change');
export const onClick = eventProp('click', (ev): ev is MouseEvent => 'button' in ev);
