/**
 * @module @publishkit/plugin-runtime/runner/invoke
 * Invoke a single plugin and turn the outcome into a PluginResult
 */

import {
  captureTrace,
  type Context,
  type HostId,
  type HostResolver,
  type PluginDescriptor,
  type PluginInvocation,
  type PluginResult,
} from '@publishkit/plugin-contracts';

/**
 * Construct a fresh behavior for `descriptor` and run it once.
 *
 * Never throws: a failure while constructing or processing (sync throw or
 * rejected promise) comes back as `{ ok: false }` with a captured trace.
 */
export async function invokePlugin(
  descriptor: PluginDescriptor,
  context: Context,
  invocation: PluginInvocation
): Promise<PluginResult> {
  const start = performance.now();

  try {
    const behavior = descriptor.create(context);
    await behavior.process(invocation);
    return {
      ok: true,
      plugin: descriptor.name,
      durationMs: performance.now() - start,
    };
  } catch (error) {
    return {
      ok: false,
      plugin: descriptor.name,
      durationMs: performance.now() - start,
      error,
      trace: captureTrace(error),
    };
  }
}

/**
 * Resolve the host at most once per runner call, on first use.
 * A HostUndeterminedError from the resolver propagates to the caller.
 */
export function lazyHost(resolver: HostResolver): () => HostId {
  let host: HostId | undefined;
  return () => {
    if (host === undefined) {
      host = resolver.currentHost();
    }
    return host;
  };
}
