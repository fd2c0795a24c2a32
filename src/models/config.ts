/**
 * Configuration file schema.
 *
 * The TOML document maps one-to-one onto these schemas; each data source
 * table array holds blocks that carry their own `order_no`.
 */

import { z } from 'zod';

const nonEmpty = z.string().min(1);

const orderNo = z.number().int().min(0).max(255);

export const generalConfigSchema = z.object({
  profile: nonEmpty,
  time_zone: nonEmpty.optional(),
});

export const openAiConfigSchema = z.object({
  api_key: nonEmpty.optional(),
  model: nonEmpty,
  max_token: z.number().int().positive(),
});

export const appDescriptionConfigSchema = z.object({
  order_no: orderNo,
  description: nonEmpty,
});

export const ec2ConfigSchema = z.object({
  order_no: orderNo,
  instance_name: nonEmpty,
});

export const rdsConfigSchema = z.object({
  order_no: orderNo,
  db_identifier: nonEmpty,
});

export const cloudwatchMetricConfigSchema = z.object({
  order_no: orderNo,
  dimension_name: nonEmpty,
  dimension_value: nonEmpty,
  metric_identifier: nonEmpty,
  metric_namespace: nonEmpty,
  metric_name: nonEmpty,
  metric_stat: nonEmpty,
  metric_unit: nonEmpty.optional(),
});

export const cloudwatchLogInsightConfigSchema = z.object({
  order_no: orderNo,
  description: nonEmpty,
  log_group_name: nonEmpty,
  query: nonEmpty,
  result_columns: z.array(nonEmpty).min(1),
});

export const configSchema = z.object({
  general: generalConfigSchema,
  open_ai: openAiConfigSchema,
  app_description: z.array(appDescriptionConfigSchema).optional(),
  ec2: z.array(ec2ConfigSchema).optional(),
  rds: z.array(rdsConfigSchema).optional(),
  cloudwatch_metric: z.array(cloudwatchMetricConfigSchema).optional(),
  cloudwatch_log_insight: z.array(cloudwatchLogInsightConfigSchema).optional(),
});

export type GeneralConfig = z.infer<typeof generalConfigSchema>;
export type OpenAiConfig = z.infer<typeof openAiConfigSchema>;
export type AppDescriptionConfig = z.infer<typeof appDescriptionConfigSchema>;
export type Ec2Config = z.infer<typeof ec2ConfigSchema>;
export type RdsConfig = z.infer<typeof rdsConfigSchema>;
export type CloudwatchMetricConfig = z.infer<typeof cloudwatchMetricConfigSchema>;
export type CloudwatchLogInsightConfig = z.infer<typeof cloudwatchLogInsightConfigSchema>;
export type Config = z.infer<typeof configSchema>;
