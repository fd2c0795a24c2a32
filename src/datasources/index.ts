/**
 * Dispatch from a data source to its fetcher.
 */

import type { DateTimeRange, PromptData } from '../models/prompt-data.js';
import { fetchAppDescription } from './app-description.js';
import type { DataSource } from './base.js';
import { fetchCloudwatchLogInsight, type LogInsightClient, type PollOptions } from './cloudwatch-log-insight.js';
import { fetchCloudwatchMetric, type CloudwatchClient } from './cloudwatch-metric.js';
import { fetchEc2, type Ec2Client } from './ec2.js';
import { fetchRds, type RdsClient } from './rds.js';

/**
 * The service capabilities fetchers depend on. Fetchers only ever receive
 * these; they never build clients themselves.
 */
export interface ServiceClients {
  ec2: Ec2Client;
  rds: RdsClient;
  cloudwatch: CloudwatchClient;
  logs: LogInsightClient;
}

export interface FetchOptions {
  poll?: PollOptions;
}

/**
 * Fetch one data source, returning one PromptData per resolved entity.
 */
export async function fetchDataSource(
  source: DataSource,
  clients: ServiceClients,
  range: DateTimeRange,
  options: FetchOptions = {}
): Promise<PromptData[]> {
  switch (source.type) {
    case 'app_description':
      return [fetchAppDescription(source.config)];
    case 'ec2':
      return fetchEc2(clients.ec2, source.config);
    case 'rds':
      return [await fetchRds(clients.rds, source.config)];
    case 'cloudwatch_metric':
      return fetchCloudwatchMetric(clients.cloudwatch, clients.ec2, source.config, range);
    case 'cloudwatch_log_insight':
      return [await fetchCloudwatchLogInsight(clients.logs, source.config, range, options.poll)];
  }
}

export {
  compareDataSources,
  collectDataSources,
  displayName,
  orderNo,
  sortDataSources,
  type DataSource,
  type DataSourceType,
} from './base.js';
export { fetchAppDescription } from './app-description.js';
export { AwsEc2Client, buildEc2Description, fetchEc2, fetchInstances, type Ec2Client } from './ec2.js';
export { AwsRdsClient, buildRdsDescription, fetchRds, type RdsClient } from './rds.js';
export {
  AwsCloudwatchClient,
  EC2_NAMESPACE,
  METRIC_PERIOD_SECONDS,
  buildDimensions,
  buildMetricDescription,
  buildMetricQuery,
  extractMetricCsv,
  fetchCloudwatchMetric,
  type CloudwatchClient,
} from './cloudwatch-metric.js';
export {
  AwsLogInsightClient,
  DEFAULT_POLL_INTERVAL_MS,
  POINTER_FIELD,
  buildLogInsightDescription,
  extractLogCsv,
  fetchCloudwatchLogInsight,
  pollQueryResults,
  type LogInsightClient,
  type PollOptions,
  type StartQueryParams,
} from './cloudwatch-log-insight.js';
