import { EC2Client, paginateDescribeInstances, paginateDescribeNatGateways } from '@aws-sdk/client-ec2';
import { LambdaClient, paginateListFunctions } from '@aws-sdk/client-lambda';
import { RDSClient, paginateDescribeDBInstances } from '@aws-sdk/client-rds';
import { ListBucketsCommand, S3Client } from '@aws-sdk/client-s3';
import { ResourceCount } from '../interfaces';

export interface InventoryClients {
  ec2: EC2Client;
  rds: RDSClient;
  lambda: LambdaClient;
  s3: S3Client;
}

async function countInstances(ec2: EC2Client): Promise<number> {
  let count = 0;
  const pages = paginateDescribeInstances(
    { client: ec2 },
    { Filters: [{ Name: 'instance-state-name', Values: ['running', 'pending'] }] }
  );
  for await (const page of pages) {
    for (const reservation of page.Reservations ?? []) {
      count += reservation.Instances?.length ?? 0;
    }
  }
  return count;
}

async function countDbInstances(rds: RDSClient): Promise<number> {
  let count = 0;
  for await (const page of paginateDescribeDBInstances({ client: rds }, {})) {
    count += page.DBInstances?.length ?? 0;
  }
  return count;
}

async function countNatGateways(ec2: EC2Client): Promise<number> {
  let count = 0;
  const pages = paginateDescribeNatGateways(
    { client: ec2 },
    { Filter: [{ Name: 'state', Values: ['available', 'pending'] }] }
  );
  for await (const page of pages) {
    count += page.NatGateways?.length ?? 0;
  }
  return count;
}

async function countFunctions(lambda: LambdaClient): Promise<number> {
  let count = 0;
  for await (const page of paginateListFunctions({ client: lambda }, {})) {
    count += page.Functions?.length ?? 0;
  }
  return count;
}

async function countBuckets(s3: S3Client): Promise<number> {
  const response = await s3.send(new ListBucketsCommand({}));
  return response.Buckets?.length ?? 0;
}

/**
 * Count the billable resources in the account for the critical alert
 *
 * Read-only. Each kind is counted on its own; a failing call leaves that
 * count null and the rest are still counted.
 */
export async function listActiveResources(clients: InventoryClients): Promise<ResourceCount[]> {
  const counters: Array<[string, () => Promise<number>]> = [
    ['EC2 Instances', () => countInstances(clients.ec2)],
    ['RDS Instances', () => countDbInstances(clients.rds)],
    ['NAT Gateways', () => countNatGateways(clients.ec2)],
    ['Lambda Functions', () => countFunctions(clients.lambda)],
    ['S3 Buckets', () => countBuckets(clients.s3)],
  ];

  const inventory: ResourceCount[] = [];
  for (const [label, count] of counters) {
    try {
      inventory.push({ label, count: await count() });
    } catch (error) {
      console.error(`Failed to count ${label}:`, error);
      inventory.push({ label, count: null });
    }
  }
  return inventory;
}
