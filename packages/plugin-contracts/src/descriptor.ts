/**
 * Plugin descriptors for the publish pipeline
 *
 * A descriptor is what discovery returns: static metadata used for
 * host/family filtering, plus a factory for the behavior the runners invoke.
 */

import type { Context } from './context.js';
import { PluginContractError } from './errors.js';
import type { HostId } from './host.js';
import type { Instance } from './instance.js';
import type { Logger } from './logger.js';

/**
 * Plugin type keyword under which selectors are registered.
 */
export const SELECTORS = 'selectors';

interface InvocationBase {
  /** Plugin type being run (`selectors`, `validators`, ...) */
  readonly stage: string;
  /** Host the run resolved */
  readonly host: HostId;
  readonly context: Context;
  /** Logger bound to the plugin name (and instance, for stages) */
  readonly logger: Logger;
}

/**
 * Passed to a selector: may append instances to `context`.
 */
export interface SelectorInvocation extends InvocationBase {
  readonly kind: 'selector';
}

/**
 * Passed to a stage plugin: operates on `instance`.
 */
export interface StageInvocation extends InvocationBase {
  readonly kind: 'stage';
  readonly instance: Instance;
}

export type PluginInvocation = SelectorInvocation | StageInvocation;

/**
 * Executable part of a plugin. Constructed fresh for every invocation.
 */
export interface PluginBehavior {
  process(invocation: PluginInvocation): void | Promise<void>;
}

/**
 * Plugin descriptor.
 */
export interface PluginDescriptor {
  /** Used for logging and error tagging only */
  readonly name: string;
  readonly hosts: readonly HostId[];
  /** Families the plugin applies to; ignored for selectors */
  readonly families: readonly string[];
  /**
   * Construct a behavior bound to `context`. Called once per selector run,
   * and once per (plugin, instance) pair in a stage.
   */
  create(context: Context): PluginBehavior;
}

/**
 * Discovery collaborator: returns the plugins registered under a type,
 * in invocation order.
 */
export interface PluginDiscovery {
  discover(type: string): readonly PluginDescriptor[] | Promise<readonly PluginDescriptor[]>;
}

export interface SelectorDefinition {
  name: string;
  hosts: readonly HostId[];
  process(context: Context, invocation: SelectorInvocation): void | Promise<void>;
}

export interface StagePluginDefinition {
  name: string;
  hosts: readonly HostId[];
  families: readonly string[];
  process(instance: Instance, invocation: StageInvocation): void | Promise<void>;
}

/**
 * Define a selector plugin.
 *
 * @example
 * ```typescript
 * export const selectObjectSets = defineSelector({
 *   name: 'SelectObjectSets',
 *   hosts: ['maya'],
 *   process(context) {
 *     for (const set of scene.objectSets()) {
 *       context.create(set.path, set.attributes);
 *     }
 *   },
 * });
 * ```
 */
export function defineSelector(definition: SelectorDefinition): PluginDescriptor {
  return {
    name: definition.name,
    hosts: [...definition.hosts],
    families: [],
    create: (context) => ({
      process(invocation) {
        if (invocation.kind !== 'selector') {
          throw new PluginContractError(
            `Selector "${definition.name}" cannot run in stage "${invocation.stage}"`,
            { plugin: definition.name, stage: invocation.stage }
          );
        }
        return definition.process(context, invocation);
      },
    }),
  };
}

/**
 * Define a stage plugin (validator, extractor, ...).
 *
 * @example
 * ```typescript
 * export const validateNaming = defineStagePlugin({
 *   name: 'ValidateNaming',
 *   hosts: ['maya'],
 *   families: ['model'],
 *   process(instance) {
 *     if (!instance.path.endsWith('_GRP')) {
 *       throw new Error(`${instance.path} must end with _GRP`);
 *     }
 *   },
 * });
 * ```
 */
export function defineStagePlugin(definition: StagePluginDefinition): PluginDescriptor {
  return {
    name: definition.name,
    hosts: [...definition.hosts],
    families: [...definition.families],
    create: () => ({
      process(invocation) {
        if (invocation.kind !== 'stage') {
          throw new PluginContractError(
            `Stage plugin "${definition.name}" cannot run as a selector`,
            { plugin: definition.name, stage: invocation.stage }
          );
        }
        return definition.process(invocation.instance, invocation);
      },
    }),
  };
}
