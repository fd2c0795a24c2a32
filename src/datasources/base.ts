/**
 * Data source model.
 *
 * A closed union of the resources a run inspects. The sort key lives only on
 * each variant's config.
 */

import type {
  AppDescriptionConfig,
  CloudwatchLogInsightConfig,
  CloudwatchMetricConfig,
  Config,
  Ec2Config,
  RdsConfig,
} from '../models/config.js';

export type DataSource =
  | { readonly type: 'app_description'; readonly config: AppDescriptionConfig }
  | { readonly type: 'ec2'; readonly config: Ec2Config }
  | { readonly type: 'rds'; readonly config: RdsConfig }
  | { readonly type: 'cloudwatch_metric'; readonly config: CloudwatchMetricConfig }
  | { readonly type: 'cloudwatch_log_insight'; readonly config: CloudwatchLogInsightConfig };

export type DataSourceType = DataSource['type'];

export function orderNo(source: DataSource): number {
  return source.config.order_no;
}

/**
 * Fixed label used for progress reporting.
 */
export function displayName(source: DataSource): string {
  switch (source.type) {
    case 'app_description':
      return 'App description';
    case 'ec2':
      return 'EC2 instance';
    case 'rds':
      return 'RDS instance';
    case 'cloudwatch_metric':
      return 'Cloudwatch metric';
    case 'cloudwatch_log_insight':
      return 'Cloudwatch log insight';
  }
}

/**
 * Compare by order number only; equal keys compare equal.
 */
export function compareDataSources(a: DataSource, b: DataSource): number {
  return orderNo(a) - orderNo(b);
}

/**
 * Return a new array in non-decreasing order number. The sort is stable, so
 * sources sharing a key keep their configuration order.
 */
export function sortDataSources(sources: readonly DataSource[]): DataSource[] {
  return [...sources].sort(compareDataSources);
}

/**
 * Collect every configured data source, in configuration order.
 */
export function collectDataSources(config: Config): DataSource[] {
  const sources: DataSource[] = [];

  for (const c of config.app_description ?? []) {
    sources.push({ type: 'app_description', config: c });
  }
  for (const c of config.ec2 ?? []) {
    sources.push({ type: 'ec2', config: c });
  }
  for (const c of config.rds ?? []) {
    sources.push({ type: 'rds', config: c });
  }
  for (const c of config.cloudwatch_metric ?? []) {
    sources.push({ type: 'cloudwatch_metric', config: c });
  }
  for (const c of config.cloudwatch_log_insight ?? []) {
    sources.push({ type: 'cloudwatch_log_insight', config: c });
  }

  return sources;
}
