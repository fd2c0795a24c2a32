/**
 * Build the diagnosis prompt for a config file and print it, without calling
 * OpenAI.
 *
 * Usage:
 *   AWS_PROFILE=default npx tsx example/prompt-preview/index.ts example/diagnose.toml
 */

import {
  buildContext,
  buildPromptData,
  createServiceClients,
  getFinishedSpans,
  initTracer,
  loadConfig,
  summarizeSpans,
} from '../../src/index.js';

async function main(): Promise<void> {
  const file = process.argv[2] ?? 'example/diagnose.toml';

  const config = await loadConfig(file);
  const context = buildContext({ file, duration: 900, printPromptData: true, dryRun: true }, config);

  initTracer();
  const clients = createServiceClients(context.profile);
  try {
    const prompt = await buildPromptData(context, clients, {
      onProgress: ({ name, completed, total }) => console.error(`[${completed}/${total}] ${name}`),
    });
    console.log(prompt);
  } finally {
    clients.destroy();
  }

  // Where the time went
  for (const line of summarizeSpans(getFinishedSpans())) {
    console.error(line);
  }
}

main().catch(console.error);
