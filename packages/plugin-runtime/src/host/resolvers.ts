/**
 * @module @publishkit/plugin-runtime/host/resolvers
 * Host resolvers: which authoring application is running this process
 */

import * as path from 'node:path';
import {
  HostUndeterminedError,
  type HostId,
  type HostResolver,
} from '@publishkit/plugin-contracts';

/**
 * Executable-name markers per host. A host matches when one of its markers
 * occurs in the basename of the running executable.
 */
export type HostExecutableTable = Record<HostId, readonly string[]>;

/**
 * Maya is recognized by its interpreter executable: `maya`, `maya.exe`,
 * `mayapy`, `mayapy.exe`.
 */
export const DEFAULT_HOST_EXECUTABLES: HostExecutableTable = {
  maya: ['maya'],
};

/**
 * Resolver that always reports the same host.
 */
export function staticHostResolver(host: HostId): HostResolver {
  return {
    currentHost: () => host,
  };
}

export interface ExecutableHostResolverOptions {
  executables?: HostExecutableTable;
  /** Defaults to `process.execPath` */
  execPath?: string;
}

/**
 * Resolver that inspects the running executable's name.
 * Hosts are tried in table order; the first match wins.
 */
export function executableHostResolver(options: ExecutableHostResolverOptions = {}): HostResolver {
  const table = options.executables ?? DEFAULT_HOST_EXECUTABLES;

  return {
    currentHost() {
      const execPath = options.execPath ?? process.execPath;
      // Handle Windows paths on posix too
      const executable = path.win32.basename(execPath).toLowerCase();

      for (const [host, markers] of Object.entries(table)) {
        if (markers.some((marker) => executable.includes(marker.toLowerCase()))) {
          return host;
        }
      }

      throw new HostUndeterminedError('Could not determine host', {
        executable,
        knownHosts: Object.keys(table),
      });
    },
  };
}

export interface HostResolverConfig {
  /** Explicit host; skips executable detection */
  host?: HostId;
  hostExecutables?: HostExecutableTable;
}

/**
 * Resolver from configuration: an explicit `host` wins, otherwise the
 * executable is inspected.
 */
export function createHostResolver(config: HostResolverConfig = {}): HostResolver {
  if (config.host !== undefined) {
    return staticHostResolver(config.host);
  }
  return executableHostResolver({ executables: config.hostExecutables });
}
