/**
 * @module @publishkit/plugin-contracts/instance
 * An individually publishable unit within a scene (a rig, a model, ...)
 */

import type { Context } from './context.js';
import { PublishError, type InstanceError } from './errors.js';

/**
 * Instance configuration as recorded by the selector that created it.
 * `family` is the key stage plugins are filtered on.
 */
export type InstanceConfig = Record<string, unknown>;

export class Instance {
  /** Path of the underlying unit, as supplied by the host */
  readonly path: string;

  /** Mutable by plugins; the core only reads `family` */
  readonly config: InstanceConfig;

  private readonly _errors: InstanceError[] = [];
  private _context: Context | undefined;

  constructor(path: string, config: InstanceConfig = {}) {
    this.path = path;
    this.config = config;
  }

  /**
   * Family label, or undefined when `config.family` is absent or not a string.
   */
  get family(): string | undefined {
    const family = this.config['family'];
    return typeof family === 'string' ? family : undefined;
  }

  /**
   * Errors recorded while processing stages, in the order they occurred.
   */
  get errors(): readonly InstanceError[] {
    return this._errors;
  }

  get context(): Context | undefined {
    return this._context;
  }

  /**
   * Append a stage failure. The error must point back at this instance.
   */
  addError(error: InstanceError): void {
    if (error.instance !== this) {
      throw new PublishError(
        `Error for "${error.instance.path}" cannot be recorded on "${this.path}"`,
        'INVALID_CONTEXT',
        { expected: this.path, actual: error.instance.path }
      );
    }
    this._errors.push(error);
  }

  /**
   * Bind this instance to its owning context.
   * @internal called by Context.add
   */
  attach(context: Context): void {
    if (this._context !== undefined) {
      throw new PublishError(
        `Instance "${this.path}" already belongs to a context`,
        'INSTANCE_ALREADY_OWNED',
        { path: this.path }
      );
    }
    this._context = context;
  }

  toString(): string {
    return this.path;
  }
}
