/**
 * @module @publishkit/plugin-contracts
 * Data model and plugin contracts for the publish pipeline
 */

// Data model
export { Instance, type InstanceConfig } from './instance.js';
export { Context, isContext } from './context.js';

// Plugins
export {
  SELECTORS,
  defineSelector,
  defineStagePlugin,
  type PluginDescriptor,
  type PluginBehavior,
  type PluginDiscovery,
  type PluginInvocation,
  type SelectorInvocation,
  type StageInvocation,
  type SelectorDefinition,
  type StagePluginDefinition,
} from './descriptor.js';
export type { PluginResult, PluginSuccess, PluginFailure } from './result.js';

// Host
export type { HostId, HostResolver } from './host.js';

// Logging
export { noopLogger, type Logger, type LogLevel } from './logger.js';

// Errors
export {
  PublishError,
  HostUndeterminedError,
  InvalidContextError,
  PluginDescriptorError,
  PluginContractError,
  ConfigError,
  InstanceError,
  isPublishError,
  isKnownErrorCode,
  normalizeError,
  captureTrace,
  type PublishErrorCode,
  type SerializedError,
  type SerializedInstanceError,
  type InstanceErrorInit,
} from './errors.js';
