import { getChecked, getValue, isHtmlElement } from './dom-api.js';
import type { EventProp } from './keys.js';

/** Outcome of running an event through a processor. */
export type Processed<V> =
  | { accepted: true; value: V }
  | { accepted: false };

const REJECTED: Processed<never> = { accepted: false };

function accept<V>(value: V): Processed<V> {
  return { accepted: true, value };
}

/**
 * Turns a DOM event into a value, or filters it out.
 *
 * Processors are immutable: every operator returns a new processor.
 *
 * @example
 * ```ts
 * const digits = on(onInput).mapToValue().filter((v) => /^\d*$/.test(v));
 * ```
 */
export class EventProcessor<Ev extends Event, V> {
  constructor(
    readonly eventProp: EventProp<Ev>,
    private readonly run: (ev: Ev) => Processed<V>,
    readonly useCapture: boolean = false,
    // Events of the right name that fail the `eventProp` guard never reach `run`.
    private readonly onMismatch: ReadonlyArray<(ev: Event) => void> = []
  ) {}

  get eventName(): string {
    return this.eventProp.name;
  }

  /** Runs the processor on a dispatched DOM event. */
  process(ev: Event): Processed<V> {
    if (!this.eventProp.matches(ev)) {
      for (const fn of this.onMismatch) fn(ev);
      return REJECTED;
    }
    return this.run(ev);
  }

  private derive<U>(run: (ev: Ev) => Processed<U>): EventProcessor<Ev, U> {
    return new EventProcessor(this.eventProp, run, this.useCapture, this.onMismatch);
  }

  filter(predicate: (value: V) => boolean): EventProcessor<Ev, V> {
    return this.derive((ev) => {
      const result = this.run(ev);
      return result.accepted && predicate(result.value) ? result : REJECTED;
    });
  }

  map<U>(project: (value: V) => U): EventProcessor<Ev, U> {
    return this.derive((ev) => {
      const result = this.run(ev);
      return result.accepted ? accept(project(result.value)) : REJECTED;
    });
  }

  mapTo<U>(value: U): EventProcessor<Ev, U> {
    return this.map(() => value);
  }

  /** Reads `value` from the event target (empty string when it has none). */
  mapToValue(): EventProcessor<Ev, string> {
    return this.derive((ev) => {
      const result = this.run(ev);
      if (!result.accepted) return REJECTED;
      const target = isHtmlElement(ev.target) ? ev.target : null;
      return accept(target ? getValue(target) ?? '' : '');
    });
  }

  /** Reads `checked` from the event target (false when it has none). */
  mapToChecked(): EventProcessor<Ev, boolean> {
    return this.derive((ev) => {
      const result = this.run(ev);
      if (!result.accepted) return REJECTED;
      const target = isHtmlElement(ev.target) ? ev.target : null;
      return accept(target ? getChecked(target) ?? false : false);
    });
  }

  preventDefault(): EventProcessor<Ev, V> {
    return this.derive((ev) => {
      ev.preventDefault();
      return this.run(ev);
    });
  }

  /**
   * Runs `fn` with the event whenever this processor filters it out,
   * including events that do not match the event prop's guard.
   */
  orElseEval(fn: (ev: Event) => void): EventProcessor<Ev, V> {
    const run = (ev: Ev): Processed<V> => {
      const result = this.run(ev);
      if (!result.accepted) fn(ev);
      return result;
    };
    return new EventProcessor(this.eventProp, run, this.useCapture, [...this.onMismatch, fn]);
  }

  /** Same processor, registered in the capture phase. */
  capture(): EventProcessor<Ev, V> {
    return new EventProcessor(this.eventProp, this.run, true, this.onMismatch);
  }
}

/** Start processing events of the given kind. */
export function on<Ev extends Event>(eventProp: EventProp<Ev>): EventProcessor<Ev, Ev> {
  return new EventProcessor(eventProp, (ev) => accept(ev));
}
