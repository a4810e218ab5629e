/**
 * @module @publishkit/plugin-runtime/runner/process-stage
 * Stage runner: apply one processing stage to every instance
 */

import {
  InstanceError,
  InvalidContextError,
  isContext,
  noopLogger,
  normalizeError,
  type Context,
} from '@publishkit/plugin-contracts';
import { pluginTypeSchema } from '../validation.js';
import { invokePlugin, lazyHost } from './invoke.js';
import type { RunnerDeps } from './types.js';

/**
 * Run the plugins registered under `stage` against each instance of
 * `context` whose family they declare, and return the same context.
 *
 * A plugin failure is logged and appended to `instance.errors`; it never
 * stops other plugins, other instances or later stages. Whether to go on
 * after a stage with errors is up to the caller (`context.hasErrors`).
 *
 * @example
 * ```typescript
 * const context = await select(undefined, deps);
 * await processStage('validators', context, deps);
 * if (!context.hasErrors) {
 *   await processStage('extractors', context, deps);
 * }
 * ```
 *
 * @throws InvalidContextError if `context` is not a Context or `stage` is blank
 * @throws HostUndeterminedError if a plugin needs a host check and the host cannot be resolved
 */
export async function processStage(stage: string, context: Context, deps: RunnerDeps): Promise<Context> {
  if (!isContext(context)) {
    throw new InvalidContextError(`processStage() expects a Context, received ${describeValue(context)}`, {
      stage,
    });
  }
  if (!pluginTypeSchema.safeParse(stage).success) {
    throw new InvalidContextError('Stage name must be a non-empty string', { stage });
  }

  const logger = deps.logger ?? noopLogger;
  const plugins = await deps.discovery.discover(stage);
  const currentHost = lazyHost(deps.hostResolver);

  for (const instance of context) {
    const family = instance.family;

    logger.info(`Processing ${instance.path} (${family ?? 'no family'})`, {
      stage,
      instance: instance.path,
      family,
    });

    for (const plugin of plugins) {
      const host = currentHost();
      if (!plugin.hosts.includes(host)) {
        logger.debug(`Skipping ${plugin.name}: host "${host}" not supported`, {
          plugin: plugin.name,
          stage,
        });
        continue;
      }
      if (family === undefined || !plugin.families.includes(family)) {
        continue;
      }

      logger.info(`${stage} ${instance.path} with ${plugin.name}`, {
        plugin: plugin.name,
        stage,
        instance: instance.path,
      });

      const result = await invokePlugin(plugin, context, {
        kind: 'stage',
        stage,
        host,
        context,
        instance,
        logger: logger.child({ plugin: plugin.name, instance: instance.path }),
      });

      if (result.ok) {
        continue;
      }

      logger.error(`An exception occurred during the execution of plugin: ${plugin.name}`, {
        plugin: plugin.name,
        stage,
        instance: instance.path,
        error: normalizeError(result.error).message,
        trace: result.trace,
      });

      instance.addError(
        new InstanceError({
          instance,
          plugin: plugin.name,
          stage,
          cause: result.error,
          trace: result.trace,
        })
      );
    }
  }

  return context;
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}
