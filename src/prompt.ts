/**
 * Prompt assembly: walks the sorted data sources and serializes every
 * PromptData into one `<data>`-delimited buffer.
 */

import { displayName, orderNo } from './datasources/base.js';
import { fetchDataSource, type FetchOptions, type ServiceClients } from './datasources/index.js';
import type { ExecutionContext } from './context.js';
import type { PromptData } from './models/prompt-data.js';
import { traced } from './tracer.js';

export const INSTRUCTION = [
  'You are an AWS diagnostic assistant.',
  'You will be given pieces of information surrounded by `<data></data>` tags',
  'Use this information to perform a diagnosis.',
  'Base your diagnosis from the provided information only.',
  'Use all of the information provided in your diagnosis.',
  'Structure your diagnosis per information, then provide a summary at the end',
  'Format your response using Markdown.',
  'Listed below are the information you will use:',
  '',
].join('\n');

export interface FetchProgress {
  /** Display name of the source just fetched */
  name: string;
  completed: number;
  total: number;
}

export interface BuildPromptOptions extends FetchOptions {
  onProgress?: (progress: FetchProgress) => void;
}

/**
 * Serialize one PromptData as a delimited block, blank line included.
 */
export function renderPromptData(promptData: PromptData): string {
  let block = '<data>\n';
  block += promptData.description.join('\n');
  block += '\n';
  if (promptData.data !== undefined) {
    block += 'Data:\n';
    block += '```\n';
    block += promptData.data;
    block += '```\n';
  }
  block += '</data>\n';
  block += '\n';
  return block;
}

/**
 * Fetch every data source in order and build the user prompt.
 *
 * Sources are fetched one at a time; the first failure aborts the whole
 * build.
 */
export async function buildPromptData(
  context: Pick<ExecutionContext, 'dataSources' | 'range'>,
  clients: ServiceClients,
  options: BuildPromptOptions = {}
): Promise<string> {
  const { onProgress, ...fetchOptions } = options;
  const total = context.dataSources.length;
  let prompt = '';
  let completed = 0;

  for (const source of context.dataSources) {
    const name = displayName(source);
    const entries = await traced(
      'datasource.fetch',
      {
        'datasource.type': source.type,
        'datasource.name': name,
        'datasource.order_no': orderNo(source),
      },
      async (setAttributes) => {
        const result = await fetchDataSource(source, clients, context.range, fetchOptions);
        setAttributes({ 'datasource.entries': result.length });
        return result;
      }
    );

    for (const entry of entries) {
      prompt += renderPromptData(entry);
    }

    completed++;
    onProgress?.({ name, completed, total });
  }

  return prompt;
}
