/**
 * Structured facts extracted from one virt-who run.
 */

/** Guest as reported by local (libvirt) mode */
export interface LocalGuest {
  state: number | string;
  active: number | boolean;
  type: string;
}

/** Guest as reported inside a host-to-guest mapping */
export interface RemoteGuest extends LocalGuest {
  /** Hypervisor the guest runs on */
  hypervisorId: string;
}

export interface HypervisorFacts {
  name: string;
  type: string;
  version: string;
  socketCount: string;
  systemUuid: string;
  /** Empty when the hypervisor reports no cluster */
  cluster: string;
  guests: string[];
}

export interface OrgMapping {
  hypervisorCount: number;
  hypervisors: Record<string, HypervisorFacts>;
  guests: Record<string, RemoteGuest>;
}

export interface LocalMappings {
  kind: 'local';
  guests: Record<string, LocalGuest>;
}

export interface RemoteMappings {
  kind: 'remote';
  orgs: string[];
  organizations: Record<string, OrgMapping>;
}

export type Mappings = LocalMappings | RemoteMappings;

export interface AnalysisResult {
  /** A `[... DEBUG]` line was logged */
  debug: boolean;
  /** A thread reported stopping after a single run */
  oneshot: boolean;
  terminated: boolean;
  threadCount: number;
  sendCount: number;
  reporterId: string | null;
  /** Interval announced by the agent when starting its loop */
  intervalSeconds: number | null;
  /** Measured time between the first two reports, -1 when not measured */
  loopIntervalSeconds: number;
  loopCount: number;
  mappings: Mappings;
  hypervisorId: string;
  printJson: string | null;
  errorCount: number;
  errorLines: string[];
  warningCount: number;
  warningLines: string[];
}

export function emptyMappings(local: boolean): Mappings {
  return local
    ? { kind: 'local', guests: {} }
    : { kind: 'remote', orgs: [], organizations: {} };
}
