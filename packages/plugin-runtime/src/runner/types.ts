/**
 * @module @publishkit/plugin-runtime/runner/types
 */

import type { HostResolver, Logger, PluginDiscovery } from '@publishkit/plugin-contracts';

/**
 * Collaborators shared by the selector and stage runners.
 */
export interface RunnerDeps {
  discovery: PluginDiscovery;
  hostResolver: HostResolver;
  /** Default: noopLogger */
  logger?: Logger;
}
