/**
 * CloudWatch Logs Insights data source.
 *
 * Starts a query, polls it once a second until it completes, and lays the
 * result rows out under the configured columns.
 */

import { setTimeout as delay } from 'timers/promises';
import {
  GetQueryResultsCommand,
  StartQueryCommand,
  type CloudWatchLogsClient,
  type GetQueryResultsResponse,
  type ResultField,
  type StartQueryResponse,
} from '@aws-sdk/client-cloudwatch-logs';
import { CsvWriter } from '../csv.js';
import { ColumnMismatchError, UnexpectedStatusError, requireField } from '../errors.js';
import { createLogger } from '../logger.js';
import type { CloudwatchLogInsightConfig } from '../models/config.js';
import { NO_DATA_SENTINEL, type DateTimeRange, type PromptData } from '../models/prompt-data.js';

const logger = createLogger('log-insight');

/** Row pointer the query engine adds to every result row. */
export const POINTER_FIELD = '@ptr';

export const DEFAULT_POLL_INTERVAL_MS = 1000;

export interface StartQueryParams {
  logGroupName: string;
  queryString: string;
  /** Epoch seconds */
  startTime: number;
  /** Epoch seconds */
  endTime: number;
}

export interface LogInsightClient {
  startQuery(params: StartQueryParams): Promise<StartQueryResponse>;
  getQueryResults(queryId: string): Promise<GetQueryResultsResponse>;
}

/**
 * LogInsightClient backed by the AWS SDK.
 */
export class AwsLogInsightClient implements LogInsightClient {
  constructor(private readonly client: CloudWatchLogsClient) {}

  startQuery(params: StartQueryParams): Promise<StartQueryResponse> {
    return this.client.send(new StartQueryCommand(params));
  }

  getQueryResults(queryId: string): Promise<GetQueryResultsResponse> {
    return this.client.send(new GetQueryResultsCommand({ queryId }));
  }
}

export interface PollOptions {
  /** Wait between polls (default: 1000) */
  pollIntervalMs?: number;
  /** Replaces the timer, mainly for tests */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

/**
 * Poll until the query completes.
 *
 * Scheduled and Running are retried without limit; every other status ends
 * the run.
 *
 * @throws UnexpectedStatusError for Failed, Cancelled, Timeout, Unknown or an
 * unrecognized status.
 */
export async function pollQueryResults(
  client: LogInsightClient,
  queryId: string,
  options: PollOptions = {}
): Promise<GetQueryResultsResponse> {
  const { pollIntervalMs = DEFAULT_POLL_INTERVAL_MS, sleep = defaultSleep } = options;

  while (true) {
    const resp = await client.getQueryResults(queryId);
    const status = requireField(resp.status, 'status', 'GetQueryResults');

    switch (status) {
      case 'Complete':
        return resp;
      case 'Scheduled':
      case 'Running':
        logger.debug(`query ${queryId} is ${status}, waiting ${pollIntervalMs}ms`);
        await sleep(pollIntervalMs);
        break;
      default:
        throw new UnexpectedStatusError(status);
    }
  }
}

/**
 * Render result rows as CSV under `columns`.
 *
 * Fields are matched in order against the column list, which cycles across
 * the whole result. `@ptr` fields are skipped wherever they appear.
 *
 * @throws ColumnMismatchError when a field is not the expected column.
 */
export function extractLogCsv(
  results: readonly (readonly ResultField[])[] | undefined,
  columns: readonly string[]
): string {
  const writer = new CsvWriter();
  writer.writeRecord(columns);
  let rows = 0;
  let position = 0;

  for (const row of results ?? []) {
    const values: string[] = [];

    for (const resultField of row) {
      const field = requireField(resultField.field, 'field', 'GetQueryResults');
      if (field === POINTER_FIELD) {
        continue;
      }

      const expected = columns[position % columns.length];
      if (field !== expected) {
        throw new ColumnMismatchError(expected, field);
      }

      values.push(requireField(resultField.value, 'value', 'GetQueryResults'));
      position++;
    }

    writer.writeRecord(values);
    rows++;
  }

  if (rows === 0) {
    return NO_DATA_SENTINEL;
  }
  return writer.toString();
}

export function buildLogInsightDescription(config: CloudwatchLogInsightConfig): string[] {
  return [
    'Information: [Cloudwatch Log Insights]',
    `Description: [${config.description}]`,
    `Log Group: [\`${config.log_group_name}\`]`,
  ];
}

export async function fetchCloudwatchLogInsight(
  client: LogInsightClient,
  config: CloudwatchLogInsightConfig,
  range: DateTimeRange,
  options: PollOptions = {}
): Promise<PromptData> {
  const started = await client.startQuery({
    logGroupName: config.log_group_name,
    queryString: config.query,
    startTime: Math.floor(range.startTime / 1000),
    endTime: Math.floor(range.endTime / 1000),
  });
  const queryId = requireField(started.queryId, 'queryId', 'StartQuery');

  const output = await pollQueryResults(client, queryId, options);

  return {
    description: buildLogInsightDescription(config),
    data: extractLogCsv(output.results, config.result_columns),
  };
}
