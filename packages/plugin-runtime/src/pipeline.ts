/**
 * @module @publishkit/plugin-runtime/pipeline
 * PublishPipeline - selection and stages bound to one set of collaborators
 */

import type {
  Context,
  HostResolver,
  Logger,
  PluginDiscovery,
} from '@publishkit/plugin-contracts';
import { loadPublishConfig, type PublishConfig } from './config.js';
import { createHostResolver } from './host/resolvers.js';
import { createConsoleLogger } from './logging.js';
import { processStage, select, type RunnerDeps } from './runner/index.js';

export interface PublishPipelineOptions {
  discovery: PluginDiscovery;
  /** Default: built from `config` (explicit host, else executable detection) */
  hostResolver?: HostResolver;
  /** Default: console logger at `config.logLevel` */
  logger?: Logger;
  /** Default: loadPublishConfig() */
  config?: PublishConfig;
}

export interface RunOptions {
  /** Existing context to select into */
  context?: Context;
  /** Default: config.stages */
  stages?: readonly string[];
  /** Default: config.haltOnError */
  haltOnError?: boolean;
}

export interface PublishRunReport {
  context: Context;
  /** Stages that were run, in order (including the one that halted) */
  completedStages: string[];
  /** Stage after which the run stopped because of errors */
  haltedAt?: string;
  /** True when no instance carries an error */
  ok: boolean;
}

export class PublishPipeline {
  readonly config: PublishConfig;
  private readonly deps: Required<RunnerDeps>;

  constructor(options: PublishPipelineOptions) {
    this.config = options.config ?? loadPublishConfig();
    this.deps = {
      discovery: options.discovery,
      hostResolver: options.hostResolver ?? createHostResolver(this.config),
      logger: options.logger ?? createConsoleLogger({ level: this.config.logLevel }),
    };
  }

  get logger(): Logger {
    return this.deps.logger;
  }

  /**
   * Run the selectors. See {@link select}.
   */
  select(context?: Context): Promise<Context> {
    return select(context, this.deps);
  }

  /**
   * Run one stage. See {@link processStage}.
   */
  process(stage: string, context: Context): Promise<Context> {
    return processStage(stage, context, this.deps);
  }

  /**
   * Select, then run stages in order. With `haltOnError`, the run stops
   * after the first stage that leaves errors on any instance.
   */
  async run(options: RunOptions = {}): Promise<PublishRunReport> {
    const stages = options.stages ?? this.config.stages;
    const haltOnError = options.haltOnError ?? this.config.haltOnError;

    const context = await this.select(options.context);
    const completedStages: string[] = [];
    let haltedAt: string | undefined;

    for (const stage of stages) {
      await this.process(stage, context);
      completedStages.push(stage);

      if (haltOnError && context.hasErrors) {
        haltedAt = stage;
        this.deps.logger.warn(`Halting after ${stage}: ${context.errors.length} error(s)`, {
          stage,
          errors: context.errors.map((error) => ({
            plugin: error.plugin,
            instance: error.instance.path,
            message: error.message,
          })),
        });
        break;
      }
    }

    return {
      context,
      completedStages,
      haltedAt,
      ok: !context.hasErrors,
    };
  }
}

export function createPublishPipeline(options: PublishPipelineOptions): PublishPipeline {
  return new PublishPipeline(options);
}
