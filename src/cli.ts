/**
 * Command-line entry: arguments → config → context → prompt → diagnosis.
 */

import { helpText, parseArgs } from './args.js';
import { createServiceClients, type ManagedServiceClients } from './clients.js';
import { loadConfig } from './config.js';
import { buildContext, type OpenAiSettings } from './context.js';
import { DiagnosticError, UsageError, errorMessage } from './errors.js';
import { createLogger, isDebugEnabled } from './logger.js';
import { createChatStreamClient, sendRequest, type ChatStreamClient, type TextSink } from './openai.js';
import { INSTRUCTION, buildPromptData, type FetchProgress } from './prompt.js';
import { initTracer, summarizeSpans } from './tracer.js';
import { VERSION } from './version.js';

const logger = createLogger();

const BANNER = `
  __ _ _   _| |_ ___   __| (_) __ _  __ _
 / _\` | | | | __/ _ \\ / _\` | |/ _\` |/ _\` |
| (_| | |_| | || (_) | (_| | | (_| | (_| |
 \\__,_|\\__,_|\\__\\___/ \\__,_|_|\\__,_|\\__, |
                                    |___/
- AWS auto-diagnostic {version} -`;

export function banner(): string {
  return BANNER.replace('{version}', VERSION);
}

export interface RunDependencies {
  createClients?: (profile: string) => ManagedServiceClients;
  createChatClient?: (settings: OpenAiSettings) => ChatStreamClient;
  stdout?: TextSink;
  now?: () => number;
}

function reportProgress({ name, completed, total }: FetchProgress): void {
  logger.info(`[${completed}/${total}] Fetched ${name}`);
}

/**
 * Run the tool with the given arguments.
 *
 * @returns The process exit code.
 */
export async function run(argv: readonly string[], deps: RunDependencies = {}): Promise<number> {
  const {
    createClients = createServiceClients,
    createChatClient = createChatStreamClient,
    stdout = process.stdout,
    now = Date.now,
  } = deps;

  try {
    const command = parseArgs(argv);
    if (command.kind === 'help') {
      stdout.write(helpText());
      return 0;
    }
    if (command.kind === 'version') {
      stdout.write(`autodiag ${VERSION}\n`);
      return 0;
    }

    const config = await loadConfig(command.args.file);
    const context = buildContext(command.args, config, now());

    initTracer();
    stdout.write(`${banner()}\n`);

    // API key first: no AWS call is made without one.
    const chatClient = context.dryRun ? null : createChatClient(context.openAi);

    const clients = createClients(context.profile);
    let promptData: string;
    try {
      promptData = await buildPromptData(context, clients, { onProgress: reportProgress });
    } finally {
      clients.destroy();
    }
    logger.info('Fetched data sources');

    if (context.printPromptData) {
      stdout.write(`\n${promptData}\n`);
    }

    if (chatClient) {
      await sendRequest(
        chatClient,
        {
          model: context.openAi.model,
          maxTokens: context.openAi.maxTokens,
          systemPrompt: INSTRUCTION,
          userPrompt: promptData,
        },
        stdout
      );
      stdout.write('\n');
    }

    if (isDebugEnabled()) {
      for (const line of summarizeSpans()) {
        logger.debug(line);
      }
    }
    return 0;
  } catch (e) {
    if (e instanceof UsageError) {
      logger.error(e.message);
      logger.info('Run with --help for usage');
      return 2;
    }
    if (e instanceof DiagnosticError) {
      logger.error(e.message);
      return 1;
    }
    logger.error(e instanceof Error && e.stack ? e.stack : errorMessage(e));
    return 1;
  }
}
