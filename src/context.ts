/**
 * Execution context: the run-wide parameters, built once from the parsed
 * arguments and the validated configuration.
 */

import { resolveTimeRange, type Args } from './args.js';
import { collectDataSources, sortDataSources, type DataSource } from './datasources/base.js';
import type { Config } from './models/config.js';
import type { DateTimeRange } from './models/prompt-data.js';
import { resolveTimeZone } from './time.js';

export interface OpenAiSettings {
  readonly apiKey?: string;
  readonly model: string;
  readonly maxTokens: number;
}

export interface ExecutionContext {
  /** AWS credentials profile */
  readonly profile: string;
  readonly range: DateTimeRange;
  /** Sorted by order number */
  readonly dataSources: readonly DataSource[];
  readonly openAi: OpenAiSettings;
  readonly printPromptData: boolean;
  readonly dryRun: boolean;
}

export function buildContext(args: Args, config: Config, now: number = Date.now()): ExecutionContext {
  const timeZone = resolveTimeZone(config.general.time_zone);
  const { startTime, endTime } = resolveTimeRange(args, timeZone, now);

  return Object.freeze({
    profile: config.general.profile,
    range: Object.freeze({ startTime, endTime, timeZone }),
    dataSources: Object.freeze(sortDataSources(collectDataSources(config))),
    openAi: Object.freeze({
      apiKey: config.open_ai.api_key,
      model: config.open_ai.model,
      maxTokens: config.open_ai.max_token,
    }),
    printPromptData: args.printPromptData,
    dryRun: args.dryRun,
  });
}
