/**
 * Error types for the publish pipeline
 *
 * Standardized errors with codes, so hosts can branch on `code`
 * instead of matching messages.
 */

import type { Instance } from './instance.js';

/**
 * All error codes raised by the pipeline packages.
 */
export type PublishErrorCode =
  | 'HOST_UNDETERMINED'
  | 'INVALID_CONTEXT'
  | 'INSTANCE_ALREADY_OWNED'
  | 'INVALID_DESCRIPTOR'
  | 'PLUGIN_CONTRACT_ERROR'
  | 'PLUGIN_FAILED'
  | 'CONFIG_ERROR'
  | 'UNKNOWN_ERROR';

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<PublishErrorCode>([
  'HOST_UNDETERMINED',
  'INVALID_CONTEXT',
  'INSTANCE_ALREADY_OWNED',
  'INVALID_DESCRIPTOR',
  'PLUGIN_CONTRACT_ERROR',
  'PLUGIN_FAILED',
  'CONFIG_ERROR',
  'UNKNOWN_ERROR',
]);

/**
 * Type guard for PublishErrorCode.
 */
export function isKnownErrorCode(code: unknown): code is PublishErrorCode {
  return typeof code === 'string' && KNOWN_ERROR_CODES.has(code);
}

/**
 * JSON-serializable error shape
 */
export interface SerializedError {
  name: string;
  message: string;
  code: PublishErrorCode;
  details?: Record<string, unknown>;
  stack?: string;
}

/**
 * Base publish error class
 */
export class PublishError extends Error {
  /**
   * Error code for programmatic handling
   */
  public readonly code: PublishErrorCode;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: PublishErrorCode = 'UNKNOWN_ERROR',
    details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'PublishError';
    this.code = code;
    this.details = details;

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * Type guard for PublishError.
 */
export function isPublishError(error: unknown): error is PublishError {
  return error instanceof PublishError;
}

/**
 * The running authoring application could not be identified.
 */
export class HostUndeterminedError extends PublishError {
  constructor(message = 'Could not determine host', details?: Record<string, unknown>) {
    super(message, 'HOST_UNDETERMINED', details);
    this.name = 'HostUndeterminedError';
  }
}

/**
 * A runner was called with something that is not a Context.
 * Programming error: never caught by the runners.
 */
export class InvalidContextError extends PublishError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_CONTEXT', details);
    this.name = 'InvalidContextError';
  }
}

/**
 * Plugin descriptor failed schema validation on registration.
 */
export class PluginDescriptorError extends PublishError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_DESCRIPTOR', details);
    this.name = 'PluginDescriptorError';
  }
}

/**
 * Plugin behavior invoked with an invocation it cannot handle.
 */
export class PluginContractError extends PublishError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PLUGIN_CONTRACT_ERROR', details);
    this.name = 'PluginContractError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends PublishError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * Serialized form of an InstanceError. The instance is replaced by its path.
 */
export interface SerializedInstanceError extends SerializedError {
  plugin: string;
  stage: string;
  instancePath: string;
  trace: string;
}

export interface InstanceErrorInit {
  instance: Instance;
  plugin: string;
  stage: string;
  cause: unknown;
  trace: string;
}

/**
 * Failure of a stage plugin on one instance.
 *
 * Recorded on `instance.errors` by the stage runner, never thrown by it.
 */
export class InstanceError extends PublishError {
  /** Instance the plugin was processing when it failed */
  readonly instance: Instance;
  readonly plugin: string;
  readonly stage: string;
  /** Diagnostic trace captured at the failure site */
  readonly trace: string;

  constructor(init: InstanceErrorInit) {
    super(
      init.cause instanceof Error ? init.cause.message : String(init.cause),
      'PLUGIN_FAILED',
      { plugin: init.plugin, stage: init.stage, instancePath: init.instance.path },
      { cause: init.cause }
    );
    this.name = 'InstanceError';
    this.instance = init.instance;
    this.plugin = init.plugin;
    this.stage = init.stage;
    this.trace = init.trace;
  }

  override toJSON(): SerializedInstanceError {
    return {
      ...super.toJSON(),
      plugin: this.plugin,
      stage: this.stage,
      instancePath: this.instance.path,
      trace: this.trace,
    };
  }
}

/**
 * Normalize any thrown value into a serializable shape.
 *
 * - PublishError: uses toJSON()
 * - Error: message/stack, code clamped to a known code
 * - anything else: String(value)
 */
export function normalizeError(error: unknown): Omit<SerializedError, 'name'> & { name?: string } {
  if (isPublishError(error)) {
    return error.toJSON();
  }

  if (error instanceof Error) {
    const rawCode: unknown = 'code' in error ? error.code : undefined;
    const rawDetails: unknown = 'details' in error ? error.details : undefined;

    return {
      name: error.name,
      message: error.message,
      code: isKnownErrorCode(rawCode) ? rawCode : 'UNKNOWN_ERROR',
      stack: error.stack,
      details: isRecord(rawDetails) ? rawDetails : undefined,
    };
  }

  return {
    message: String(error),
    code: 'UNKNOWN_ERROR',
  };
}

/**
 * Best-effort diagnostic trace for a thrown value.
 */
export function captureTrace(error: unknown): string {
  if (error instanceof Error && error.stack) {
    return error.stack;
  }
  return new Error(String(error)).stack ?? String(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
