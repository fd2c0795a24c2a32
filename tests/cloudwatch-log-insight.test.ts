import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  CloudWatchLogsClient,
  GetQueryResultsCommand,
  StartQueryCommand,
  type GetQueryResultsResponse,
  type ResultField,
} from '@aws-sdk/client-cloudwatch-logs';
import { mockClient } from 'aws-sdk-client-mock';
import {
  AwsLogInsightClient,
  buildLogInsightDescription,
  extractLogCsv,
  fetchCloudwatchLogInsight,
  pollQueryResults,
} from '../src/datasources/cloudwatch-log-insight.js';
import { ColumnMismatchError, MissingFieldError, UnexpectedStatusError } from '../src/errors.js';
import type { CloudwatchLogInsightConfig } from '../src/models/config.js';
import { fakeClients, noSleep } from './fakes.js';

const config: CloudwatchLogInsightConfig = {
  order_no: 1,
  description: 'Some description',
  log_group_name: 'log-group-name',
  query: 'fields column1, column2',
  result_columns: ['column1', 'column2'],
};

const range = {
  startTime: Date.parse('2024-01-01T00:00:00Z'),
  endTime: Date.parse('2024-01-01T01:00:00Z'),
  timeZone: 'UTC',
};

function row(...pairs: [string, string][]): ResultField[] {
  return pairs.map(([field, value]) => ({ field, value }));
}

describe('CloudWatch Logs Insights data source', () => {
  describe('buildLogInsightDescription()', () => {
    it('should describe the query', () => {
      expect(buildLogInsightDescription(config)).toEqual([
        'Information: [Cloudwatch Log Insights]',
        'Description: [Some description]',
        'Log Group: [`log-group-name`]',
      ]);
    });
  });

  describe('extractLogCsv()', () => {
    it('should lay rows out under the configured columns', () => {
      const results = [
        row(['column1', 'row1-column1'], ['column2', 'row1-column2']),
        row(['column1', 'row2-column1'], ['column2', 'row2-column2']),
      ];

      expect(extractLogCsv(results, config.result_columns)).toBe(
        'column1,column2\nrow1-column1,row1-column2\nrow2-column1,row2-column2\n'
      );
    });

    it('should drop @ptr fields wherever they appear', () => {
      const results = [
        row(['column1', 'a'], ['column2', 'b'], ['@ptr', 'CmAKJgoi']),
        row(['@ptr', 'CmAKJgoj'], ['column1', 'c'], ['column2', 'd']),
      ];

      expect(extractLogCsv(results, config.result_columns)).toBe('column1,column2\na,b\nc,d\n');
    });

    it('should quote values containing commas or quotes', () => {
      const results = [row(['column1', 'GET /a, /b'], ['column2', 'said "hi"'])];

      expect(extractLogCsv(results, config.result_columns)).toBe(
        'column1,column2\n"GET /a, /b","said ""hi"""\n'
      );
    });

    it('should fail when a field is out of place', () => {
      const results = [
        row(['column1', 'row1-column1'], ['column2', 'row1-column2']),
        row(['column2', 'row2-column1'], ['column1', 'row2-column1']),
      ];

      expect(() => extractLogCsv(results, config.result_columns)).toThrow(
        'Expected column not matched! Expected: column1, Actual: column2'
      );
    });

    it('should expose both column names on the mismatch error', () => {
      try {
        extractLogCsv([row(['other', 'x'])], config.result_columns);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(ColumnMismatchError);
        if (e instanceof ColumnMismatchError) {
          expect(e.expected).toBe('column1');
          expect(e.actual).toBe('other');
        }
      }
    });

    it('should cycle the columns across rows', () => {
      // A short first row shifts the expected column for the next one.
      const results = [row(['column1', 'a']), row(['column1', 'b'])];

      expect(() => extractLogCsv(results, config.result_columns)).toThrow(
        'Expected column not matched! Expected: column2, Actual: column1'
      );
    });

    it('should return the sentinel when there are no rows', () => {
      expect(extractLogCsv([], config.result_columns)).toBe('No applicable data found\n');
      expect(extractLogCsv(undefined, config.result_columns)).toBe('No applicable data found\n');
    });
  });

  describe('pollQueryResults()', () => {
    it('should wait twice for Scheduled then Running before Complete', async () => {
      const clients = fakeClients({
        queryResponses: [
          { status: 'Scheduled' },
          { status: 'Running' },
          { status: 'Complete', results: [row(['column1', 'x'])] },
        ],
      });
      const sleep = vi.fn(noSleep);

      const output = await pollQueryResults(clients.logs, 'query-1', { sleep });

      expect(output.status).toBe('Complete');
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(1000);
      expect(clients.logs.getQueryResults).toHaveBeenCalledTimes(3);
      expect(clients.logs.getQueryResults).toHaveBeenCalledWith('query-1');
    });

    it.each(['Failed', 'Cancelled', 'Timeout', 'Unknown'] as const)(
      'should stop at once on %s',
      async (status) => {
        const clients = fakeClients({ queryResponses: [{ status }] });
        const sleep = vi.fn(noSleep);

        await expect(pollQueryResults(clients.logs, 'query-1', { sleep })).rejects.toThrow(
          `Unexpected status: ${status}`
        );
        expect(sleep).not.toHaveBeenCalled();
        expect(clients.logs.getQueryResults).toHaveBeenCalledOnce();
      }
    );

    it('should stop at a failure reached after waiting', async () => {
      const clients = fakeClients({ queryResponses: [{ status: 'Running' }, { status: 'Failed' }] });
      const sleep = vi.fn(noSleep);

      await expect(pollQueryResults(clients.logs, 'query-1', { sleep })).rejects.toBeInstanceOf(
        UnexpectedStatusError
      );
      expect(sleep).toHaveBeenCalledOnce();
    });

    it('should keep polling a long-running query without a limit', async () => {
      const running: GetQueryResultsResponse[] = Array.from({ length: 50 }, () => ({ status: 'Running' }));
      const clients = fakeClients({ queryResponses: [...running, { status: 'Complete', results: [] }] });
      const sleep = vi.fn(noSleep);

      await pollQueryResults(clients.logs, 'query-1', { sleep, pollIntervalMs: 5 });

      expect(sleep).toHaveBeenCalledTimes(50);
      expect(sleep).toHaveBeenLastCalledWith(5);
    });

    it('should fail when the response has no status', async () => {
      const clients = fakeClients({ queryResponses: [{ results: [] }] });

      await expect(pollQueryResults(clients.logs, 'query-1', { sleep: noSleep })).rejects.toBeInstanceOf(
        MissingFieldError
      );
    });
  });

  describe('fetchCloudwatchLogInsight()', () => {
    it('should start the query in epoch seconds and extract the results', async () => {
      const clients = fakeClients({
        queryResponses: [
          { status: 'Running' },
          { status: 'Complete', results: [row(['column1', 'a'], ['column2', 'b'])] },
        ],
      });

      const result = await fetchCloudwatchLogInsight(clients.logs, config, range, { sleep: noSleep });

      expect(clients.logs.startQuery).toHaveBeenCalledWith({
        logGroupName: 'log-group-name',
        queryString: 'fields column1, column2',
        startTime: 1704067200,
        endTime: 1704070800,
      });
      expect(result).toEqual({
        description: [
          'Information: [Cloudwatch Log Insights]',
          'Description: [Some description]',
          'Log Group: [`log-group-name`]',
        ],
        data: 'column1,column2\na,b\n',
      });
    });

    it('should fail when StartQuery returns no query id', async () => {
      const clients = fakeClients({ startQuery: {} });

      await expect(fetchCloudwatchLogInsight(clients.logs, config, range, { sleep: noSleep })).rejects.toThrow(
        "Missing field 'queryId' in StartQuery response"
      );
      expect(clients.logs.getQueryResults).not.toHaveBeenCalled();
    });
  });

  describe('AwsLogInsightClient', () => {
    const logsMock = mockClient(CloudWatchLogsClient);

    afterEach(() => {
      logsMock.reset();
    });

    it('should send StartQuery and GetQueryResults', async () => {
      logsMock.on(StartQueryCommand).resolves({ queryId: 'q-42' });
      logsMock.on(GetQueryResultsCommand, { queryId: 'q-42' }).resolves({ status: 'Complete', results: [] });

      const client = new AwsLogInsightClient(new CloudWatchLogsClient({ region: 'us-east-1' }));

      const started = await client.startQuery({
        logGroupName: '/app',
        queryString: 'fields @message',
        startTime: 1,
        endTime: 2,
      });
      const results = await client.getQueryResults('q-42');

      expect(started.queryId).toBe('q-42');
      expect(results.status).toBe('Complete');
      expect(logsMock.commandCalls(StartQueryCommand)[0].args[0].input).toEqual({
        logGroupName: '/app',
        queryString: 'fields @message',
        startTime: 1,
        endTime: 2,
      });
    });
  });
});
