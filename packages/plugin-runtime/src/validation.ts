/**
 * @module @publishkit/plugin-runtime/validation
 * Zod validation for plugin descriptors
 */

import { z } from 'zod';
import { PluginDescriptorError, type PluginDescriptor } from '@publishkit/plugin-contracts';

/**
 * Shape every registered descriptor must have. Only static metadata and the
 * presence of `create` are checked; behavior is opaque.
 */
export const pluginDescriptorSchema = z.object({
  name: z.string().min(1, 'Plugin name must not be empty'),
  hosts: z.array(z.string().min(1)),
  families: z.array(z.string().min(1)),
  create: z.custom<PluginDescriptor['create']>(
    (value) => typeof value === 'function',
    { message: 'create must be a function' }
  ),
});

/**
 * Plugin type keyword (`selectors`, `validators`, ...)
 */
export const pluginTypeSchema = z.string().regex(/\S/, 'Plugin type must not be blank');

export interface DescriptorIssue {
  path: string;
  message: string;
}

/**
 * Validate a descriptor, throwing PluginDescriptorError with the issues.
 * Returns the descriptor itself (not a parsed copy) so class-based
 * descriptors keep their prototype.
 */
export function assertPluginDescriptor<T extends PluginDescriptor>(type: string, descriptor: T): T {
  const result = pluginDescriptorSchema.safeParse(descriptor);
  if (!result.success) {
    const issues: DescriptorIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new PluginDescriptorError(
      `Invalid plugin descriptor for "${type}": ${issues.map((i) => `${i.path || '<root>'}: ${i.message}`).join('; ')}`,
      { type, issues }
    );
  }
  return descriptor;
}
