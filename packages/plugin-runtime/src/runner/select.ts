/**
 * @module @publishkit/plugin-runtime/runner/select
 * Selector runner: build a Context from the active scene
 */

import {
  Context,
  InvalidContextError,
  SELECTORS,
  isContext,
  noopLogger,
  normalizeError,
} from '@publishkit/plugin-contracts';
import { invokePlugin, lazyHost } from './invoke.js';
import type { RunnerDeps } from './types.js';

/**
 * Run every selector that supports the current host against `context`
 * (a new Context when omitted) and return it.
 *
 * Selection is best-effort: a failing selector is logged and the next one
 * still runs. Selector failures are not recorded anywhere else.
 *
 * @throws HostUndeterminedError if there are selectors but the host cannot be resolved
 */
export async function select(context: Context | undefined, deps: RunnerDeps): Promise<Context> {
  if (context !== undefined && !isContext(context)) {
    throw new InvalidContextError('select() expects a Context or undefined', {
      received: typeof context,
    });
  }

  const target = context ?? new Context();
  const logger = deps.logger ?? noopLogger;
  const plugins = await deps.discovery.discover(SELECTORS);
  const currentHost = lazyHost(deps.hostResolver);

  for (const plugin of plugins) {
    const host = currentHost();
    if (!plugin.hosts.includes(host)) {
      logger.debug(`Skipping ${plugin.name}: host "${host}" not supported`, {
        plugin: plugin.name,
        hosts: [...plugin.hosts],
      });
      continue;
    }

    logger.info(`Selecting with ${plugin.name}`, { plugin: plugin.name });

    const result = await invokePlugin(plugin, target, {
      kind: 'selector',
      stage: SELECTORS,
      host,
      context: target,
      logger: logger.child({ plugin: plugin.name }),
    });

    if (!result.ok) {
      logger.error(`An exception occurred during the execution of plugin: ${plugin.name}`, {
        plugin: plugin.name,
        stage: SELECTORS,
        error: normalizeError(result.error).message,
        trace: result.trace,
      });
    }
  }

  return target;
}
