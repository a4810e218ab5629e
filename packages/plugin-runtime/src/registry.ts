/**
 * @module @publishkit/plugin-runtime/registry
 * In-memory plugin registry used as the discovery collaborator
 */

import {
  PluginDescriptorError,
  type PluginDescriptor,
  type PluginDiscovery,
} from '@publishkit/plugin-contracts';
import { assertPluginDescriptor, pluginTypeSchema } from './validation.js';

/**
 * Plugin registry keyed by plugin type (`selectors`, `validators`, ...).
 *
 * `discover()` returns descriptors in registration order; the runners
 * invoke them in exactly that order.
 */
export class PluginRegistry implements PluginDiscovery {
  private readonly byType = new Map<string, PluginDescriptor[]>();

  /**
   * Register a plugin under a type.
   * @throws PluginDescriptorError if the descriptor is malformed
   */
  register(type: string, descriptor: PluginDescriptor): this {
    if (!pluginTypeSchema.safeParse(type).success) {
      throw new PluginDescriptorError('Plugin type must be a non-empty string', {
        type,
        plugin: descriptor.name,
      });
    }
    assertPluginDescriptor(type, descriptor);

    const list = this.byType.get(type);
    if (list) {
      list.push(descriptor);
    } else {
      this.byType.set(type, [descriptor]);
    }
    return this;
  }

  registerAll(type: string, descriptors: Iterable<PluginDescriptor>): this {
    for (const descriptor of descriptors) {
      this.register(type, descriptor);
    }
    return this;
  }

  /**
   * Plugins registered under `type`, in registration order.
   * Unknown types yield an empty list.
   */
  discover(type: string): readonly PluginDescriptor[] {
    return [...(this.byType.get(type) ?? [])];
  }

  /**
   * Types with at least one registered plugin, in first-registration order.
   */
  types(): string[] {
    return [...this.byType.keys()];
  }
}
