/**
 * AWS service client construction.
 *
 * The only place SDK clients are created. Region and credentials come from
 * the named profile through the SDK's default provider chains.
 */

import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { EC2Client } from '@aws-sdk/client-ec2';
import { RDSClient } from '@aws-sdk/client-rds';
import { AwsCloudwatchClient } from './datasources/cloudwatch-metric.js';
import { AwsLogInsightClient } from './datasources/cloudwatch-log-insight.js';
import { AwsEc2Client } from './datasources/ec2.js';
import type { ServiceClients } from './datasources/index.js';
import { AwsRdsClient } from './datasources/rds.js';

export interface ManagedServiceClients extends ServiceClients {
  /** Release sockets held by the underlying SDK clients. */
  destroy(): void;
}

export function createServiceClients(profile: string): ManagedServiceClients {
  const ec2 = new EC2Client({ profile });
  const rds = new RDSClient({ profile });
  const cloudwatch = new CloudWatchClient({ profile });
  const logs = new CloudWatchLogsClient({ profile });

  return {
    ec2: new AwsEc2Client(ec2),
    rds: new AwsRdsClient(rds),
    cloudwatch: new AwsCloudwatchClient(cloudwatch),
    logs: new AwsLogInsightClient(logs),
    destroy: () => {
      ec2.destroy();
      rds.destroy();
      cloudwatch.destroy();
      logs.destroy();
    },
  };
}
