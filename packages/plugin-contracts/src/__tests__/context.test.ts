/**
 * @module @publishkit/plugin-contracts/__tests__/context
 */

import { describe, it, expect } from 'vitest';
import { Context, isContext } from '../context.js';
import { Instance } from '../instance.js';
import { InstanceError, PublishError } from '../errors.js';

function failOn(instance: Instance, plugin: string): InstanceError {
  const error = new InstanceError({
    instance,
    plugin,
    stage: 'validators',
    cause: new Error(`${plugin} failed`),
    trace: `trace:${plugin}`,
  });
  instance.addError(error);
  return error;
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('Context', () => {
  it('should start empty without errors', () => {
    const context = new Context();

    expect(context.length).toBe(0);
    expect(context.errors).toEqual([]);
    expect(context.hasErrors).toBe(false);
  });

  it('should keep instances in insertion order', () => {
    const context = new Context();
    const a = context.create('|a_GRP', { family: 'model' });
    const b = context.add(new Instance('|b_GRP', { family: 'rig' }));

    expect(context.length).toBe(2);
    expect([...context]).toEqual([a, b]);
    expect(context.at(0)).toBe(a);
    expect(context.at(1)).toBe(b);
    expect(context.at(2)).toBeUndefined();
  });

  it('should accept initial instances', () => {
    const a = new Instance('a');
    const b = new Instance('b');
    const context = new Context([a, b]);

    expect(context.instances).toEqual([a, b]);
    expect(a.context).toBe(context);
  });

  it('should return a snapshot from instances', () => {
    const context = new Context();
    const snapshot = context.instances;
    context.create('late');

    expect(snapshot).toHaveLength(0);
    expect(context.instances).toHaveLength(1);
  });

  it('should concatenate instance errors in context order', () => {
    const context = new Context();
    const a = context.create('a');
    const b = context.create('b');
    const c = context.create('c');

    const c1 = failOn(c, 'P3');
    const a1 = failOn(a, 'P1');
    const a2 = failOn(a, 'P2');

    expect(b.errors).toHaveLength(0);
    expect(context.errors).toEqual([a1, a2, c1]);
    expect(context.hasErrors).toBe(true);
  });

  it('should derive errors on every read', () => {
    const context = new Context();
    const a = context.create('a');
    expect(context.hasErrors).toBe(false);

    failOn(a, 'P1');

    expect(context.hasErrors).toBe(true);
    expect(context.errors).toHaveLength(1);
  });

  it('should reject an instance that belongs to another context', () => {
    const first = new Context();
    const shared = first.create('shared');
    const second = new Context();

    const error = catchError(() => second.add(shared));

    expect(error).toBeInstanceOf(PublishError);
    expect(error).toMatchObject({ code: 'INSTANCE_ALREADY_OWNED' });
    expect(second.length).toBe(0);
    expect(shared.context).toBe(first);
  });

  it('should reject adding the same instance twice', () => {
    const context = new Context();
    const instance = context.create('once');

    expect(() => context.add(instance)).toThrow('already belongs to a context');
    expect(context.length).toBe(1);
  });

  it('isContext should recognize contexts only', () => {
    expect(isContext(new Context())).toBe(true);
    expect(isContext([])).toBe(false);
    expect(isContext({ errors: [], hasErrors: false })).toBe(false);
    expect(isContext(null)).toBe(false);
  });
});
