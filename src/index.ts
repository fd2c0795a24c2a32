/**
 * autodiag - AWS resource diagnosis with an LLM
 *
 * Library usage:
 *
 *   import { buildContext, buildPromptData, createServiceClients, loadConfig } from 'autodiag';
 *
 *   const config = await loadConfig('diagnose.toml');
 *   const context = buildContext({ file: 'diagnose.toml', duration: 3600, printPromptData: false, dryRun: true }, config);
 *   const clients = createServiceClients(context.profile);
 *   const prompt = await buildPromptData(context, clients);
 *   clients.destroy();
 *
 * Fetchers take their AWS capabilities as interfaces (Ec2Client, RdsClient,
 * CloudwatchClient, LogInsightClient), so any of them can be replaced with a
 * fake.
 */

export type {
  Config,
  GeneralConfig,
  OpenAiConfig,
  AppDescriptionConfig,
  Ec2Config,
  RdsConfig,
  CloudwatchMetricConfig,
  CloudwatchLogInsightConfig,
} from './models/config.js';
export { configSchema } from './models/config.js';
export type { PromptData, DateTimeRange } from './models/prompt-data.js';
export { NO_DATA_SENTINEL } from './models/prompt-data.js';

export * from './datasources/index.js';

export { parseArgs, resolveTimeRange, helpText, DEFAULT_DURATION_SECONDS } from './args.js';
export type { Args, CliCommand } from './args.js';
export { loadConfig, parseConfig } from './config.js';
export { buildContext } from './context.js';
export type { ExecutionContext, OpenAiSettings } from './context.js';
export { createServiceClients } from './clients.js';
export type { ManagedServiceClients } from './clients.js';
export { buildPromptData, renderPromptData, INSTRUCTION } from './prompt.js';
export type { BuildPromptOptions, FetchProgress } from './prompt.js';
export {
  createChatStreamClient,
  resolveApiKey,
  sendRequest,
  OPENAI_API_KEY,
} from './openai.js';
export type {
  ChatStreamClient,
  ChatCompletionChunk,
  ChatCompletionStreamParams,
  OpenAiChatInput,
  TextSink,
} from './openai.js';
export { run } from './cli.js';
export type { RunDependencies } from './cli.js';

export {
  DiagnosticError,
  UsageError,
  ConfigError,
  NotFoundError,
  MissingFieldError,
  UnexpectedStatusError,
  ColumnMismatchError,
  MissingApiKeyError,
} from './errors.js';

export { formatTimestamp, parseLocalDateTime, resolveTimeZone } from './time.js';

// Tracer utilities (for inspecting fetch timings)
export {
  initTracer,
  getTracer,
  getFinishedSpans,
  summarizeSpans,
  resetTracer,
  isInitialized,
} from './tracer.js';

export { VERSION } from './version.js';
