/**
 * @module @publishkit/plugin-runtime/__tests__/invoke
 */

import { describe, it, expect, vi } from 'vitest';
import { Context, noopLogger, type PluginDescriptor } from '@publishkit/plugin-contracts';
import { invokePlugin, lazyHost } from '../runner/invoke.js';

function descriptor(process: () => void | Promise<void>): PluginDescriptor {
  return {
    name: 'P1',
    hosts: ['maya'],
    families: [],
    create: () => ({ process }),
  };
}

describe('invokePlugin', () => {
  const context = new Context();
  const invocation = { kind: 'selector', stage: 'selectors', host: 'maya', context, logger: noopLogger } as const;

  it('should report success', async () => {
    const result = await invokePlugin(descriptor(() => {}), context, invocation);

    expect(result).toEqual({ ok: true, plugin: 'P1', durationMs: expect.any(Number) });
  });

  it('should turn a thrown error into a failure result', async () => {
    const error = new Error('boom');

    const result = await invokePlugin(
      descriptor(() => {
        throw error;
      }),
      context,
      invocation
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe(error);
      expect(result.trace).toBe(error.stack);
      expect(result.plugin).toBe('P1');
    }
  });

  it('should turn a rejection into a failure result', async () => {
    const result = await invokePlugin(descriptor(() => Promise.reject(new Error('later'))), context, invocation);

    expect(result).toMatchObject({ ok: false, plugin: 'P1' });
  });
});

describe('lazyHost', () => {
  it('should not resolve until asked, then only once', () => {
    const currentHost = vi.fn(() => 'maya');
    const host = lazyHost({ currentHost });

    expect(currentHost).not.toHaveBeenCalled();
    expect(host()).toBe('maya');
    expect(host()).toBe('maya');
    expect(currentHost).toHaveBeenCalledTimes(1);
  });

  it('should retry resolution after a failure', () => {
    const currentHost = vi
      .fn<() => string>()
      .mockImplementationOnce(() => {
        throw new Error('not yet');
      })
      .mockReturnValue('maya');
    const host = lazyHost({ currentHost });

    expect(() => host()).toThrow('not yet');
    expect(host()).toBe('maya');
  });
});
