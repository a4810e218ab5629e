/**
 * Host identification
 *
 * A host is the authoring application the pipeline runs inside
 * (`maya`, `houdini`, ...). Plugins declare the hosts they support.
 */

export type HostId = string;

/**
 * Resolves the currently running host.
 *
 * Implementations throw HostUndeterminedError when no known host
 * can be identified. Repeated calls within one process are expected
 * to be cheap and to return the same value.
 */
export interface HostResolver {
  currentHost(): HostId;
}
