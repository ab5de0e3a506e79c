export type InstanceStatus = "running" | "stopped" | "suspended";

export interface ResourceSpec {
  ramGb: number;
  cpuCores: number;
  diskGb: number;
}

export interface SuspensionEntry {
  time: string;
  reason: string;
  actor: string;
}

export interface InstanceRecord {
  id: string;
  resources: ResourceSpec;
  config: string;
  status: InstanceStatus;
  createdAt: string;
  suspensionHistory: SuspensionEntry[];
  sharedWith: string[];
}

export interface OwnedInstance {
  ownerId: string;
  record: InstanceRecord;
}

export interface AdminRegistry {
  mainAdmin: string;
  admins: string[];
}

export interface PortForward {
  instanceId: string;
  internalPort: number;
  hostPort: number;
}

export interface PortAllocationTable {
  slots: Record<string, number>;
  forwards: Record<string, PortForward[]>;
}

export interface StoreState {
  instances: Record<string, InstanceRecord[]>;
  admins: AdminRegistry;
  ports: PortAllocationTable;
}

export interface InstanceStats {
  id: string;
  status: string;
  cpu: string;
  memory: string;
  disk: string;
}

export interface FleetSummary {
  users: number;
  admins: number;
  instances: number;
  running: number;
  stopped: number;
  suspended: number;
  resources: ResourceSpec;
}
