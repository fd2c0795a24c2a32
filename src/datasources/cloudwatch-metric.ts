/**
 * CloudWatch metric data source.
 *
 * Fetches one time series per resolved dimension with a fixed 60 second
 * period and renders it as `timestamp,value` CSV, newest point first.
 */

import {
  GetMetricDataCommand,
  type CloudWatchClient,
  type Dimension,
  type GetMetricDataCommandOutput,
  type MetricDataQuery,
  type MetricDataResult,
} from '@aws-sdk/client-cloudwatch';
import { CsvWriter } from '../csv.js';
import { requireField } from '../errors.js';
import type { CloudwatchMetricConfig } from '../models/config.js';
import { NO_DATA_SENTINEL, type DateTimeRange, type PromptData } from '../models/prompt-data.js';
import { formatTimestamp } from '../time.js';
import { fetchInstances, type Ec2Client } from './ec2.js';

export const EC2_NAMESPACE = 'AWS/EC2';
export const METRIC_PERIOD_SECONDS = 60;

export interface CloudwatchClient {
  /**
   * Run one metric query. Each returned result holds its points oldest first.
   */
  getMetricData(startTime: Date, endTime: Date, query: MetricDataQuery): Promise<MetricDataResult[]>;
}

/**
 * CloudwatchClient backed by the AWS SDK.
 *
 * Pages are merged per query id so a series spanning several pages stays one
 * continuous result.
 */
export class AwsCloudwatchClient implements CloudwatchClient {
  constructor(private readonly client: CloudWatchClient) {}

  async getMetricData(startTime: Date, endTime: Date, query: MetricDataQuery): Promise<MetricDataResult[]> {
    const merged = new Map<string, MetricDataResult>();
    let nextToken: string | undefined;
    do {
      const resp: GetMetricDataCommandOutput = await this.client.send(
        new GetMetricDataCommand({
          StartTime: startTime,
          EndTime: endTime,
          MetricDataQueries: [query],
          ScanBy: 'TimestampAscending',
          NextToken: nextToken,
        })
      );

      for (const result of resp.MetricDataResults ?? []) {
        const key = result.Id ?? '';
        const existing = merged.get(key);
        if (existing) {
          existing.Timestamps = [...(existing.Timestamps ?? []), ...(result.Timestamps ?? [])];
          existing.Values = [...(existing.Values ?? []), ...(result.Values ?? [])];
        } else {
          merged.set(key, { ...result });
        }
      }
      nextToken = resp.NextToken;
    } while (nextToken);

    return [...merged.values()];
  }
}

/**
 * Resolve the configured dimension. For the EC2 namespace the configured
 * value is an instance name, expanded to one dimension per instance id.
 */
export async function buildDimensions(
  ec2Client: Ec2Client,
  config: CloudwatchMetricConfig
): Promise<Dimension[]> {
  if (config.metric_namespace === EC2_NAMESPACE) {
    const instances = await fetchInstances(ec2Client, config.dimension_value);
    return instances.map((instance) => ({
      Name: config.dimension_name,
      Value: requireField(instance.InstanceId, 'InstanceId', 'DescribeInstances'),
    }));
  }

  return [{ Name: config.dimension_name, Value: config.dimension_value }];
}

export function buildMetricQuery(config: CloudwatchMetricConfig, dimension: Dimension): MetricDataQuery {
  return {
    Id: config.metric_identifier,
    MetricStat: {
      Metric: {
        Namespace: config.metric_namespace,
        MetricName: config.metric_name,
        Dimensions: [dimension],
      },
      Stat: config.metric_stat,
      Period: METRIC_PERIOD_SECONDS,
    },
  };
}

export function buildMetricDescription(config: CloudwatchMetricConfig, dimension: Dimension): string[] {
  const description = [
    `Information: [Cloudwatch ${config.metric_namespace}]`,
    `Metric: [\`${config.metric_name}\`]`,
    `Dimension: [\`${dimension.Name ?? ''}:${dimension.Value ?? ''}\`]`,
  ];

  if (config.metric_unit !== undefined) {
    description.push(`Unit: ${config.metric_unit}`);
  }

  return description;
}

/**
 * Render results as CSV, reversing each series so the latest point is first.
 */
export function extractMetricCsv(results: readonly MetricDataResult[], timeZone: string): string {
  const writer = new CsvWriter();
  writer.writeRecord(['timestamp', 'value']);
  let rows = 0;

  for (const result of results) {
    const timestamps = [...(result.Timestamps ?? [])].reverse();
    const values = [...(result.Values ?? [])].reverse();
    const count = Math.min(timestamps.length, values.length);

    for (let i = 0; i < count; i++) {
      writer.writeRecord([formatTimestamp(timestamps[i], timeZone), String(values[i])]);
      rows++;
    }
  }

  if (rows === 0) {
    return NO_DATA_SENTINEL;
  }
  return writer.toString();
}

/**
 * One PromptData per resolved dimension, queried one after another.
 */
export async function fetchCloudwatchMetric(
  client: CloudwatchClient,
  ec2Client: Ec2Client,
  config: CloudwatchMetricConfig,
  range: DateTimeRange
): Promise<PromptData[]> {
  const promptData: PromptData[] = [];

  for (const dimension of await buildDimensions(ec2Client, config)) {
    const results = await client.getMetricData(
      new Date(range.startTime),
      new Date(range.endTime),
      buildMetricQuery(config, dimension)
    );

    promptData.push({
      description: buildMetricDescription(config, dimension),
      data: extractMetricCsv(results, range.timeZone),
    });
  }

  return promptData;
}
