// types.ts - Cross-cutting Primitives and Domain Model

// =============================================================================
// PRIMITIVES
// =============================================================================

// Remote identifiers are opaque strings assigned by the control plane
export type InstanceId = string;
export type SshKeyId = string;
export type NodeId = string;

// =============================================================================
// PROTOCOL VERSIONS
// =============================================================================

export const PROTO_VERSIONS = {
  UPCOMING: '~upcoming',
  V2025_06_10: '2025-06-10',
  V2025_05_29: '2025-05-29',
  V2025_03_21: '2025-03-21',
  V2025_02_10: '2025-02-10',
  V2024_09_22: '2024-09-22',
} as const;

export type KnownProtoVersion = (typeof PROTO_VERSIONS)[keyof typeof PROTO_VERSIONS];

/** Latest released protocol version */
export const DEFAULT_PROTO_VERSION: KnownProtoVersion = PROTO_VERSIONS.V2025_06_10;

export function isKnownProtoVersion(value: string): value is KnownProtoVersion {
  const known: readonly string[] = Object.values(PROTO_VERSIONS);
  return known.includes(value);
}

// =============================================================================
// INSTANCE STATUS
// =============================================================================

export const INSTANCE_STATUSES = ['Initializing', 'Active', 'Deactivating', 'Inactive'] as const;

export type InstanceStatus = (typeof INSTANCE_STATUSES)[number];

/** Statuses of instances that still occupy capacity. Inactive is terminal. */
export const LIVE_INSTANCE_STATUSES: readonly InstanceStatus[] = [
  'Active',
  'Initializing',
  'Deactivating',
];

// =============================================================================
// REMOTE RESOURCES (projected from wire data)
// =============================================================================

export type LoginInfo =
  | { kind: 'username_password'; username: string; password: string }
  | { kind: 'unknown' };

export interface VirtualMachine {
  vmid: number;
  name: string;
  loginInfo: LoginInfo | null;
  ready: boolean;
}

export interface Instance {
  id: InstanceId;
  status: InstanceStatus;
  nodeId: NodeId;
  nodeMode: string;
  nodeStatus: string;
  publicIp: string | null;
  privateIp: string | null;
  resourceInfo: { providerName: string; instanceType: string } | null;
  virtualMachines: VirtualMachine[];
}

export interface SshKey {
  id: SshKeyId;
  name: string;
  publicKey: string;
}

/** VM-provisioning details of a recipe: base image plus init script source. */
export interface VmRecipeDetails {
  imageUrl: string;
  cloudinitUrl: string;
}

export interface Recipe {
  name: string;
  description: string;
}

export interface RecipeGroup {
  name: string;
  description: string;
  recipes: Recipe[];
}

export interface InstanceTypeDatacenter {
  name: string;
  count: number;
}

export interface InstanceTypeVariant {
  name: string;
  cpuCount: number;
  gpuCount?: number;
  disk: number;
  dram: number;
  costPerHour: number;
  datacenters: InstanceTypeDatacenter[];
}

export interface InstanceType {
  name: string;
  brandShort?: string;
  manufacturer?: string;
  variants: InstanceTypeVariant[];
}

/** Exists only after the control plane accepted the token. */
export interface AuthSession {
  readonly token: string;
  readonly email: string;
}

// =============================================================================
// REQUESTS
// =============================================================================

export interface RentRequest {
  recipe: string;
  datacenter: string;
  instanceType: string;
  sshPublicKeys: string[];
  /** Base64-encoded script run after first boot */
  startupCommands?: string;
}

// =============================================================================
// CALLER-HELD STATE
// =============================================================================

/**
 * Desired state for an instance. None of these fields are ever returned by
 * the remote read API; they are carried forward from the caller's state.
 */
export interface InstancePlan {
  recipe: string;
  datacenter: string;
  instanceType: string;
  sshKeyId: SshKeyId;
  startupCommands?: string;
}

export interface VirtualMachineState {
  vmid: number;
  name: string;
  username: string | null;
}

/** Last known state of a tracked instance, as held by the caller. */
export interface InstanceState extends InstancePlan {
  id: InstanceId;
  status: InstanceStatus | null;
  nodeId: NodeId | null;
  nodeMode: string | null;
  nodeStatus: string | null;
  publicIp: string | null;
  privateIp: string | null;
  providerName: string | null;
  virtualMachines: VirtualMachineState[];
}

export interface SshKeyState {
  id: SshKeyId;
  name: string;
  publicKey: string;
}

/** Outcome of refreshing tracked state: the resource is gone when removed. */
export type ReadResult<T> = { kind: 'found'; state: T } | { kind: 'removed' };

// =============================================================================
// PREDICATES
// =============================================================================

/** Ready = Active and at least one hosted VM reports connectable. */
export function isInstanceReady(instance: Instance): boolean {
  return instance.status === 'Active' && instance.virtualMachines.some((vm) => vm.ready);
}
