/**
 * @module @publishkit/plugin-runtime
 * Plugin discovery, host resolution and the selector/stage runners
 */

// Runners
export {
  select,
  processStage,
  invokePlugin,
  lazyHost,
  type RunnerDeps,
} from './runner/index.js';

// Pipeline facade
export {
  PublishPipeline,
  createPublishPipeline,
  type PublishPipelineOptions,
  type RunOptions,
  type PublishRunReport,
} from './pipeline.js';

// Discovery
export { PluginRegistry } from './registry.js';
export {
  pluginDescriptorSchema,
  pluginTypeSchema,
  assertPluginDescriptor,
  type DescriptorIssue,
} from './validation.js';

// Host resolution
export {
  staticHostResolver,
  executableHostResolver,
  createHostResolver,
  DEFAULT_HOST_EXECUTABLES,
  type HostExecutableTable,
  type ExecutableHostResolverOptions,
  type HostResolverConfig,
} from './host/index.js';

// Configuration
export {
  loadPublishConfig,
  publishConfigSchema,
  DEFAULT_STAGES,
  type PublishConfig,
  type PublishConfigInput,
  type LoadPublishConfigOptions,
} from './config.js';

// Logging
export {
  createConsoleLogger,
  formatLogLine,
  type ConsoleLoggerOptions,
  type LoggerLevel,
  type LogSink,
} from './logging.js';
