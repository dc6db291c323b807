import {
  DeleteNatGatewayCommand,
  EC2Client,
  StopInstancesCommand,
  TerminateInstancesCommand,
  paginateDescribeInstances,
  paginateDescribeNatGateways,
} from '@aws-sdk/client-ec2';
import {
  DeleteDBInstanceCommand,
  RDSClient,
  StopDBInstanceCommand,
  paginateDescribeDBInstances,
} from '@aws-sdk/client-rds';
import { NukeAction, NukeCandidate, NukeRecord, NukeSummary, ResourceKind } from '../interfaces';
import { errorMessage } from './errors';

/**
 * Opt-in tag. Only resources carrying `CanNuke=true` may be terminated.
 */
export const NUKE_TAG_KEY = 'CanNuke';

export interface NukeClients {
  ec2: EC2Client;
  rds: RDSClient;
}

export interface NukeOptions {
  dryRun: boolean;
  now: Date;
}

type TagList = Array<{ Key?: string; Value?: string }> | undefined;

export function tagsToRecord(tags: TagList): Record<string, string> {
  const record: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key !== undefined) {
      record[tag.Key] = tag.Value ?? '';
    }
  }
  return record;
}

/**
 * Compared the way the IAM condition compares it: case-insensitive, no trimming.
 */
export function isNukable(tags: Record<string, string>): boolean {
  return tags[NUKE_TAG_KEY]?.toLowerCase() === 'true';
}

/**
 * Decide what a nuke pass may do to one resource
 *
 * Termination is reserved for resources tagged `CanNuke=true`. Untagged
 * instances and databases are only stopped. NAT gateways have no stopped
 * state, so an untagged gateway is left alone. Anything not in its billable
 * running state is skipped.
 */
export function decideNukeAction(candidate: NukeCandidate): NukeAction {
  const tagged = isNukable(candidate.tags);
  switch (candidate.kind) {
    case 'ec2-instance':
      if (candidate.state !== 'running') return 'skip';
      return tagged ? 'terminate' : 'stop';
    case 'rds-instance':
      if (candidate.state !== 'available') return 'skip';
      return tagged ? 'terminate' : 'stop';
    case 'nat-gateway':
      if (candidate.state !== 'available') return 'skip';
      return tagged ? 'terminate' : 'skip';
  }
}

/**
 * List every resource the pass looks at
 *
 * Each kind is listed on its own; a failing describe call becomes one failed
 * record for that kind and the other kinds are still listed.
 */
export async function enumerateCandidates(
  clients: NukeClients
): Promise<{ candidates: NukeCandidate[]; failures: NukeRecord[] }> {
  const candidates: NukeCandidate[] = [];
  const failures: NukeRecord[] = [];

  const listers: Array<[ResourceKind, () => Promise<NukeCandidate[]>]> = [
    ['ec2-instance', () => listRunningInstances(clients.ec2)],
    ['nat-gateway', () => listNatGateways(clients.ec2)],
    ['rds-instance', () => listDbInstances(clients.rds)],
  ];

  for (const [kind, list] of listers) {
    try {
      const found = await list();
      console.log(`Found ${found.length} ${kind} candidate(s)`);
      candidates.push(...found);
    } catch (error) {
      console.error(`Failed to list ${kind} resources:`, error);
      failures.push({ kind, id: '*', action: 'skip', outcome: 'failed', error: errorMessage(error) });
    }
  }

  return { candidates, failures };
}

async function listRunningInstances(ec2: EC2Client): Promise<NukeCandidate[]> {
  const candidates: NukeCandidate[] = [];
  const pages = paginateDescribeInstances(
    { client: ec2 },
    { Filters: [{ Name: 'instance-state-name', Values: ['running'] }] }
  );
  for await (const page of pages) {
    for (const reservation of page.Reservations ?? []) {
      for (const instance of reservation.Instances ?? []) {
        if (!instance.InstanceId) continue;
        candidates.push({
          id: instance.InstanceId,
          kind: 'ec2-instance',
          state: instance.State?.Name ?? 'unknown',
          tags: tagsToRecord(instance.Tags),
        });
      }
    }
  }
  return candidates;
}

async function listNatGateways(ec2: EC2Client): Promise<NukeCandidate[]> {
  const candidates: NukeCandidate[] = [];
  const pages = paginateDescribeNatGateways(
    { client: ec2 },
    { Filter: [{ Name: 'state', Values: ['available'] }] }
  );
  for await (const page of pages) {
    for (const gateway of page.NatGateways ?? []) {
      if (!gateway.NatGatewayId) continue;
      candidates.push({
        id: gateway.NatGatewayId,
        kind: 'nat-gateway',
        state: gateway.State ?? 'unknown',
        tags: tagsToRecord(gateway.Tags),
      });
    }
  }
  return candidates;
}

async function listDbInstances(rds: RDSClient): Promise<NukeCandidate[]> {
  const candidates: NukeCandidate[] = [];
  for await (const page of paginateDescribeDBInstances({ client: rds }, {})) {
    for (const db of page.DBInstances ?? []) {
      if (!db.DBInstanceIdentifier) continue;
      candidates.push({
        id: db.DBInstanceIdentifier,
        kind: 'rds-instance',
        state: db.DBInstanceStatus ?? 'unknown',
        tags: tagsToRecord(db.TagList),
      });
    }
  }
  return candidates;
}

/**
 * Snapshot name kept when a tagged database is deleted: `<id>-final-YYYYMMDDHHMM`
 */
export function finalSnapshotIdentifier(dbInstanceId: string, now: Date): string {
  const stamp = now.toISOString().replace(/[-:T]/g, '').slice(0, 12);
  return `${dbInstanceId}-final-${stamp}`;
}

/**
 * Issue the one mutating call for a decided action
 */
export async function applyNukeAction(
  clients: NukeClients,
  candidate: NukeCandidate,
  action: Exclude<NukeAction, 'skip'>,
  now: Date
): Promise<void> {
  switch (candidate.kind) {
    case 'ec2-instance':
      if (action === 'stop') {
        await clients.ec2.send(new StopInstancesCommand({ InstanceIds: [candidate.id] }));
      } else {
        await clients.ec2.send(new TerminateInstancesCommand({ InstanceIds: [candidate.id] }));
      }
      return;
    case 'nat-gateway':
      if (action === 'stop') {
        throw new Error(`NAT gateway ${candidate.id} cannot be stopped`);
      }
      await clients.ec2.send(new DeleteNatGatewayCommand({ NatGatewayId: candidate.id }));
      return;
    case 'rds-instance':
      if (action === 'stop') {
        await clients.rds.send(new StopDBInstanceCommand({ DBInstanceIdentifier: candidate.id }));
      } else {
        await clients.rds.send(
          new DeleteDBInstanceCommand({
            DBInstanceIdentifier: candidate.id,
            SkipFinalSnapshot: false,
            FinalDBSnapshotIdentifier: finalSnapshotIdentifier(candidate.id, now),
            DeleteAutomatedBackups: false,
          })
        );
      }
      return;
  }
}

/**
 * Stop or terminate expensive resources, one at a time
 *
 * In dry run no mutating call is made at all, stops included; candidates are
 * only reported as would-stop / would-terminate. A failure on one resource is
 * recorded and the pass moves on to the next.
 */
export async function runNukePass(clients: NukeClients, options: NukeOptions): Promise<NukeSummary> {
  const { candidates, failures } = await enumerateCandidates(clients);
  const records: NukeRecord[] = [...failures];

  for (const candidate of candidates) {
    const action = decideNukeAction(candidate);
    const base = { kind: candidate.kind, id: candidate.id, action };

    if (action === 'skip') {
      records.push({ ...base, outcome: 'skipped' });
      continue;
    }
    if (options.dryRun) {
      console.log(`DRY RUN: would ${action} ${candidate.kind} ${candidate.id}`);
      records.push({ ...base, outcome: action === 'stop' ? 'would-stop' : 'would-terminate' });
      continue;
    }

    try {
      await applyNukeAction(clients, candidate, action, options.now);
      console.log(`${action === 'stop' ? 'Stopped' : 'Terminated'} ${candidate.kind} ${candidate.id}`);
      records.push({ ...base, outcome: action === 'stop' ? 'stopped' : 'terminated' });
    } catch (error) {
      console.error(`Failed to ${action} ${candidate.kind} ${candidate.id}:`, error);
      records.push({ ...base, outcome: 'failed', error: errorMessage(error) });
    }
  }

  return summarizeNuke(records, options.dryRun);
}

export function summarizeNuke(records: NukeRecord[], dryRun: boolean): NukeSummary {
  const count = (outcome: NukeRecord['outcome']) => records.filter((r) => r.outcome === outcome).length;
  const failed = count('failed');
  return {
    status: failed > 0 ? 'partial_failure' : dryRun ? 'dry_run' : 'executed',
    dryRun,
    stopped: count('stopped'),
    terminated: count('terminated'),
    skipped: count('skipped'),
    failed,
    wouldStop: count('would-stop'),
    wouldTerminate: count('would-terminate'),
    records,
  };
}
