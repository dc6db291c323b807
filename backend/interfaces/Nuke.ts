export type ResourceKind = 'ec2-instance' | 'nat-gateway' | 'rds-instance';

export type NukeAction = 'stop' | 'terminate' | 'skip';

export type NukeOutcome =
  | 'stopped'
  | 'terminated'
  | 'skipped'
  | 'failed'
  | 'would-stop'
  | 'would-terminate';

/**
 * NukeCandidate Interface
 *
 * A resource found during a nuke pass. `state` is the provider's raw state
 * string (`running`, `available`, ...).
 */
export interface NukeCandidate {
  id: string;
  kind: ResourceKind;
  state: string;
  tags: Record<string, string>;
}

export interface NukeRecord {
  kind: ResourceKind;
  id: string;
  action: NukeAction;
  outcome: NukeOutcome;
  error?: string;
}

export type NukeStatus = 'dry_run' | 'executed' | 'partial_failure';

export interface NukeSummary {
  status: NukeStatus;
  dryRun: boolean;
  stopped: number;
  terminated: number;
  skipped: number;
  failed: number;
  wouldStop: number;
  wouldTerminate: number;
  records: Array<NukeRecord>;
}
