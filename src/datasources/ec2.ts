/**
 * EC2 instance data source.
 *
 * Instances are looked up by their `Name` tag, so one configured name can
 * resolve to several instances (an autoscaled fleet, for example).
 */

import {
  DescribeInstancesCommand,
  type DescribeInstancesCommandOutput,
  type EC2Client,
  type Filter,
  type Instance,
  type Reservation,
} from '@aws-sdk/client-ec2';
import { NotFoundError, requireField } from '../errors.js';
import type { Ec2Config } from '../models/config.js';
import type { PromptData } from '../models/prompt-data.js';

const OPERATION = 'DescribeInstances';

export interface Ec2Client {
  /** Every reservation matching the filters, across all pages. */
  describeInstances(filters: Filter[]): Promise<Reservation[]>;
}

/**
 * Ec2Client backed by the AWS SDK.
 */
export class AwsEc2Client implements Ec2Client {
  constructor(private readonly client: EC2Client) {}

  async describeInstances(filters: Filter[]): Promise<Reservation[]> {
    const reservations: Reservation[] = [];
    let nextToken: string | undefined;
    do {
      const resp: DescribeInstancesCommandOutput = await this.client.send(
        new DescribeInstancesCommand({ Filters: filters, NextToken: nextToken })
      );
      reservations.push(...(resp.Reservations ?? []));
      nextToken = resp.NextToken;
    } while (nextToken);
    return reservations;
  }
}

/**
 * Resolve all instances whose Name tag equals `instanceName`.
 *
 * @throws NotFoundError when nothing matches.
 */
export async function fetchInstances(client: Ec2Client, instanceName: string): Promise<Instance[]> {
  const reservations = await client.describeInstances([
    { Name: 'tag:Name', Values: [instanceName] },
  ]);

  const instances = reservations.flatMap((r) => r.Instances ?? []);
  if (instances.length === 0) {
    throw new NotFoundError(`Unable to find instance with name: ${instanceName}`, instanceName);
  }
  return instances;
}

export function buildEc2Description(config: Ec2Config, instance: Instance): string[] {
  const instanceId = requireField(instance.InstanceId, 'InstanceId', OPERATION);
  const instanceType = requireField(instance.InstanceType, 'InstanceType', OPERATION);
  const cpu = requireField(instance.CpuOptions, 'CpuOptions', OPERATION);
  const coreCount = requireField(cpu.CoreCount, 'CpuOptions.CoreCount', OPERATION);
  const threadsPerCore = requireField(cpu.ThreadsPerCore, 'CpuOptions.ThreadsPerCore', OPERATION);
  const state = requireField(instance.State?.Name, 'State.Name', OPERATION);

  return [
    'Information: [EC2 Instance]',
    `Instance name: [\`${config.instance_name}\`]`,
    `Instance id: [\`${instanceId}\`]`,
    `Instance type: [\`${instanceType}\`]`,
    `Cpu core count: [${coreCount}]`,
    `Cpu threads per core: [${threadsPerCore}]`,
    `State: [${state}]`,
  ];
}

/**
 * One PromptData per instance carrying the configured name.
 */
export async function fetchEc2(client: Ec2Client, config: Ec2Config): Promise<PromptData[]> {
  const instances = await fetchInstances(client, config.instance_name);
  return instances.map((instance) => ({
    description: buildEc2Description(config, instance),
  }));
}
