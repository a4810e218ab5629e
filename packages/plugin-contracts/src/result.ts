/**
 * Outcome of a single plugin invocation.
 *
 * Runners branch on `ok`; a failed invocation never escapes as an exception.
 */
export type PluginResult = PluginSuccess | PluginFailure;

export interface PluginSuccess {
  ok: true;
  plugin: string;
  durationMs: number;
}

export interface PluginFailure {
  ok: false;
  plugin: string;
  durationMs: number;
  /** Value thrown (or rejected) by the plugin */
  error: unknown;
  /** Diagnostic trace captured when the failure was caught */
  trace: string;
}
