import { test } from 'node:test';
import assert from 'node:assert/strict';

import { isScopeDisposed, type Scope } from '../src/core/scope.js';
import { signal } from '../src/core/signal.js';
import type { DomListener } from '../src/runtime/dom-api.js';
import { el, render } from '../src/runtime/element.js';
import { on } from '../src/runtime/event-processor.js';
import { disabled, idAttr, onInput, typ, value } from '../src/runtime/keys.js';
import { bindProp, listen, onMount, setAttr, setProp, text } from '../src/runtime/modifiers.js';
import { div, input, span } from '../src/runtime/tags.js';
import { typeInto, valueOf, withDom } from './helpers/dom.js';

test('every mount gets a fresh owner, killed on unmount', async () => {
  await withDom(() => {
    const owners: Scope[] = [];
    const element = el(div, setAttr(idAttr, 'main'), onMount((_, owner) => owners.push(owner)));

    element.mount();
    assert.equal(element.owner?.name, 'div#main');
    element.unmount();
    element.mount();

    const [first, second] = owners;
    assert.equal(owners.length, 2);
    assert.notEqual(first, second);
    assert.equal(isScopeDisposed(first), true);
    assert.equal(element.isMounted, true);
    assert.equal(element.owner, second);
  });
});

test('children mount with their parent and are killed before it', async () => {
  await withDom((dom) => {
    const order: string[] = [];
    const child = el(span, onMount((_, owner) => owner.onCleanup(() => order.push('child'))));
    const parent = el(div, onMount((_, owner) => owner.onCleanup(() => order.push('parent'))), child);

    const root = render(dom.window.document.body, parent);
    assert.equal(child.isMounted, true);
    assert.equal(dom.window.document.body.innerHTML, '<div><span></span></div>');

    root.unmount();
    assert.deepEqual(order, ['child', 'parent']);
    assert.equal(child.isMounted, false);
    assert.equal(dom.window.document.body.innerHTML, '');
  });
});

test('a child appended to a mounted parent is mounted right away', async () => {
  await withDom((dom) => {
    const parent = el(div);
    render(dom.window.document.body, parent);

    let mounts = 0;
    parent.appendChild(el(span, onMount(() => mounts++)));

    assert.equal(mounts, 1);
  });
});

test('an element can only have one parent', async () => {
  await withDom(() => {
    const child = el(span);
    el(div, child);

    assert.throws(() => el(div, child), {
      message: '[Holdfast] span already has a parent element.',
    });
  });
});

test('listeners are only active while the element is mounted', async () => {
  await withDom((dom) => {
    const seen: string[] = [];
    const field = el(input, setAttr(typ, 'text'), listen(on(onInput).mapToValue(), (v) => seen.push(v)));

    typeInto(dom, field.ref, 'a');
    const root = render(dom.window.document.body, field);
    typeInto(dom, field.ref, 'b');
    root.unmount();
    typeInto(dom, field.ref, 'c');

    assert.deepEqual(seen, ['b']);
    assert.equal(field.eventListeners.length, 0);
  });
});

test('attachListener keeps the listener list in order and detaches', async () => {
  await withDom(() => {
    const element = el(input);
    const first: DomListener = { eventName: 'input', useCapture: false, domCallback: () => {} };
    const second: DomListener = { eventName: 'input', useCapture: false, domCallback: () => {} };

    const detachFirst = element.attachListener(first);
    element.attachListener(second, { prepend: true });
    assert.deepEqual(element.eventListeners, [second, first]);

    detachFirst();
    detachFirst();
    assert.deepEqual(element.eventListeners, [second]);
  });
});

test('bindProp writes values while mounted only', async () => {
  await withDom((dom) => {
    const name = signal('a');
    const field = el(input, setAttr(typ, 'text'), bindProp(value, name));

    const root = render(dom.window.document.body, field);
    assert.equal(valueOf(field.ref), 'a');

    name.set('b');
    assert.equal(valueOf(field.ref), 'b');

    root.unmount();
    name.set('c');
    assert.equal(valueOf(field.ref), 'b');
  });
});

test('setProp writes a property once, when the element is built', async () => {
  await withDom(() => {
    const field = el(input, setProp(disabled, true));
    assert.equal(Reflect.get(field.ref, 'disabled'), true);
  });
});

test('text appends a text node', async () => {
  await withDom(() => {
    const element = el(div, text('hello'), el(span, text('!')));
    assert.equal(element.ref.textContent, 'hello!');
  });
});
