import { test } from 'node:test';
import assert from 'node:assert/strict';

import { createScope, getCurrentScope, isScopeDisposed, withScope } from '../src/core/scope.js';
import { Subscription } from '../src/core/owned.js';
import { captureConsole } from './helpers/dom.js';

test('dispose kills child scopes first, then runs cleanups in registration order', () => {
  const parent = createScope(null);
  const child = createScope(parent);
  const order: string[] = [];

  parent.onCleanup(() => order.push('parent-a'));
  child.onCleanup(() => order.push('child'));
  parent.onCleanup(() => order.push('parent-b'));

  parent.dispose();

  assert.deepEqual(order, ['child', 'parent-a', 'parent-b']);
  assert.equal(isScopeDisposed(child), true);
});

test('owned resources and cleanups share one FIFO order', () => {
  const scope = createScope(null);
  const order: string[] = [];

  scope.onCleanup(() => order.push('cleanup-1'));
  new Subscription(scope, () => order.push('subscription'));
  scope.onCleanup(() => order.push('cleanup-2'));

  scope.dispose();

  assert.deepEqual(order, ['cleanup-1', 'subscription', 'cleanup-2']);
});

test('dispose is idempotent', () => {
  const scope = createScope(null);
  let runs = 0;
  scope.onCleanup(() => runs++);

  scope.dispose();
  scope.dispose();

  assert.equal(runs, 1);
});

test('owning a resource with a disposed scope throws', () => {
  const scope = createScope(null, { name: 'form' });
  scope.dispose();

  assert.throws(
    () => new Subscription(scope, () => {}),
    { message: '[Holdfast] Cannot own a resource with a disposed scope "form".' }
  );
});

test('dispose runs every cleanup even if one throws, and logs the errors', async () => {
  const scope = createScope(null);
  const ran: string[] = [];

  scope.onCleanup(() => ran.push('a'));
  scope.onCleanup(() => {
    throw new Error('boom');
  });
  scope.onCleanup(() => ran.push('c'));

  const errors = await captureConsole('error', () => {
    assert.doesNotThrow(() => scope.dispose());
  });

  assert.deepEqual(ran, ['a', 'c']);
  assert.equal(errors.length, 1);
  assert.ok(errors[0]?.startsWith('[Holdfast] scope.dispose() had cleanup errors:'));
});

test('onCleanup after dispose runs immediately', () => {
  const scope = createScope(null);
  scope.dispose();

  let ran = false;
  scope.onCleanup(() => {
    ran = true;
  });

  assert.equal(ran, true);
});

test('a child created under a disposed parent is disposed right away', () => {
  const parent = createScope(null);
  parent.dispose();

  const child = createScope(parent);

  assert.equal(isScopeDisposed(child), true);
});

test('withScope sets the current scope and restores the previous one', () => {
  const outer = createScope(null);

  const inner = withScope(outer, () => {
    assert.equal(getCurrentScope(), outer);
    return createScope();
  });

  assert.equal(getCurrentScope(), null);
  assert.equal(inner.parent, outer);
});

test('withScope throws when entering a disposed scope', () => {
  const scope = createScope(null);
  scope.dispose();

  assert.throws(() => withScope(scope, () => {}), /withScope\(\) cannot enter a disposed scope/);
});
