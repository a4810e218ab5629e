/**
 * @module @publishkit/plugin-contracts/context
 * Instances selected from the currently active scene
 */

import type { InstanceError } from './errors.js';
import { Instance, type InstanceConfig } from './instance.js';

/**
 * Ordered collection of instances for one publish run.
 *
 * Instances are only ever appended. Errors are not stored here:
 * `errors` and `hasErrors` are derived from the instances on every read.
 */
export class Context implements Iterable<Instance> {
  private readonly _instances: Instance[] = [];

  constructor(instances: Iterable<Instance> = []) {
    for (const instance of instances) {
      this.add(instance);
    }
  }

  get length(): number {
    return this._instances.length;
  }

  get instances(): readonly Instance[] {
    return [...this._instances];
  }

  /**
   * Errors of every instance, concatenated in context order.
   */
  get errors(): InstanceError[] {
    const errors: InstanceError[] = [];
    for (const instance of this._instances) {
      errors.push(...instance.errors);
    }
    return errors;
  }

  get hasErrors(): boolean {
    return this._instances.some((instance) => instance.errors.length > 0);
  }

  /**
   * Append an instance. Throws INSTANCE_ALREADY_OWNED if it is
   * already part of this or another context.
   */
  add(instance: Instance): Instance {
    instance.attach(this);
    this._instances.push(instance);
    return instance;
  }

  /**
   * Create an instance and append it.
   *
   * @example
   * ```typescript
   * context.create('|char_GRP', { family: 'model' });
   * ```
   */
  create(path: string, config: InstanceConfig = {}): Instance {
    return this.add(new Instance(path, config));
  }

  at(index: number): Instance | undefined {
    return this._instances.at(index);
  }

  [Symbol.iterator](): Iterator<Instance> {
    return this._instances[Symbol.iterator]();
  }
}

/**
 * Type guard for Context.
 */
export function isContext(value: unknown): value is Context {
  return value instanceof Context;
}
