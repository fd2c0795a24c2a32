/**
 * RDS instance data source.
 */

import {
  DescribeDBInstancesCommand,
  type DBInstance,
  type DescribeDBInstancesCommandOutput,
  type RDSClient,
} from '@aws-sdk/client-rds';
import { NotFoundError, requireField } from '../errors.js';
import type { RdsConfig } from '../models/config.js';
import type { PromptData } from '../models/prompt-data.js';

const OPERATION = 'DescribeDBInstances';

export interface RdsClient {
  /** Every DB instance visible to the profile, across all pages. */
  describeDbInstances(): Promise<DBInstance[]>;
}

/**
 * RdsClient backed by the AWS SDK.
 */
export class AwsRdsClient implements RdsClient {
  constructor(private readonly client: RDSClient) {}

  async describeDbInstances(): Promise<DBInstance[]> {
    const instances: DBInstance[] = [];
    let marker: string | undefined;
    do {
      const resp: DescribeDBInstancesCommandOutput = await this.client.send(
        new DescribeDBInstancesCommand({ Marker: marker })
      );
      instances.push(...(resp.DBInstances ?? []));
      marker = resp.Marker;
    } while (marker);
    return instances;
  }
}

export function buildRdsDescription(config: RdsConfig, instance: DBInstance): string[] {
  const instanceClass = requireField(instance.DBInstanceClass, 'DBInstanceClass', OPERATION);
  const engine = requireField(instance.Engine, 'Engine', OPERATION);
  const engineVersion = requireField(instance.EngineVersion, 'EngineVersion', OPERATION);
  const storageType = requireField(instance.StorageType, 'StorageType', OPERATION);
  const status = requireField(instance.DBInstanceStatus, 'DBInstanceStatus', OPERATION);
  const multiAz = requireField(instance.MultiAZ, 'MultiAZ', OPERATION);

  return [
    'Information: [RDS Instance]',
    `DB identifier: [\`${config.db_identifier}\`]`,
    `Class: [\`${instanceClass}\`]`,
    `Engine: [${engine} ${engineVersion}]`,
    `Storage type: [${storageType}]`,
    `Status: [${status}]`,
    `Multi AZ: [${multiAz}]`,
  ];
}

/**
 * Find the DB instance whose identifier equals the configured one.
 *
 * @throws NotFoundError when no identifier matches exactly.
 */
export async function fetchRds(client: RdsClient, config: RdsConfig): Promise<PromptData> {
  const instances = await client.describeDbInstances();

  const instance = instances.find((i) => i.DBInstanceIdentifier === config.db_identifier);
  if (!instance) {
    throw new NotFoundError(
      `Unable to find DB instance with name: ${config.db_identifier}`,
      config.db_identifier
    );
  }

  return { description: buildRdsDescription(config, instance) };
}
