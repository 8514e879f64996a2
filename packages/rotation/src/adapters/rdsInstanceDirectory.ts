/**
 * RDS Instance Directory
 *
 * InstanceDirectory backed by the RDS DescribeDBInstances API.
 */

import { DescribeDBInstancesCommand, RDSClient } from '@aws-sdk/client-rds';
import type { InstanceDescription, InstanceDirectory } from '../types.js';

export function createRdsClient(region?: string): RDSClient {
  return new RDSClient(region ? { region } : {});
}

export class RdsInstanceDirectory implements InstanceDirectory {
  constructor(private readonly client: RDSClient) {}

  async describeInstances(identifier: string): Promise<InstanceDescription[]> {
    const output = await this.client.send(
      new DescribeDBInstancesCommand({ DBInstanceIdentifier: identifier })
    );

    return (output.DBInstances ?? []).map((instance) => ({
      identifier: instance.DBInstanceIdentifier ?? identifier,
      readReplicaSourceIdentifier: instance.ReadReplicaSourceDBInstanceIdentifier,
    }));
  }
}
