export { select } from './select.js';
export { processStage } from './process-stage.js';
export { invokePlugin, lazyHost } from './invoke.js';
export type { RunnerDeps } from './types.js';
