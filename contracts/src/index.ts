// index.ts - Re-exports from all modules

// Types & primitives
export type {
  InstanceId,
  SshKeyId,
  NodeId,
  KnownProtoVersion,
  InstanceStatus,
  LoginInfo,
  VirtualMachine,
  Instance,
  SshKey,
  VmRecipeDetails,
  Recipe,
  RecipeGroup,
  InstanceTypeDatacenter,
  InstanceTypeVariant,
  InstanceType,
  AuthSession,
  RentRequest,
  InstancePlan,
  VirtualMachineState,
  InstanceState,
  SshKeyState,
  ReadResult,
} from './types';

export {
  PROTO_VERSIONS,
  DEFAULT_PROTO_VERSION,
  isKnownProtoVersion,
  INSTANCE_STATUSES,
  LIVE_INSTANCE_STATUSES,
  isInstanceReady,
} from './types';

// Errors
export {
  RiftError,
  ValidationError,
  AuthenticationError,
  NotFoundError,
  TransportError,
  ApiError,
  TimeoutError,
  CancellationError,
  SchemaError,
  LifecycleError,
  CreateError,
  ReadError,
  DeleteError,
  ERROR_CATEGORIES,
  ERROR_CODES_BY_CATEGORY,
  categoryForCode,
  isRiftError,
  isNotFound,
  describeError,
} from './errors';

export type { ErrorCategory, LifecycleOperation } from './errors';

// API - Control-plane wire format
export type {
  Versioned,
  InstancesSelector,
  NodeSelector,
  SshKeySelector,
  VirtualMachineConfiguration,
  RentInstanceRequestData,
  AddSshKeyRequestData,
  InstancesRequestData,
  ListInstanceTypesRequestData,
  AuthMeResponse,
  RecipeWire,
  RecipeGroupWire,
  ListRecipesResponse,
  SshKeyWire,
  ListSshKeysResponse,
  AddSshKeyResponse,
  RentInstanceResponse,
  VirtualMachineWire,
  InstanceWire,
  ListInstancesResponse,
  InstanceVariantWire,
  InstanceTypeWire,
  ListInstanceTypesResponse,
  RecipeDetails,
} from './api/cloud';

export {
  versioned,
  InstancesSelectorSchema,
  selectInstancesById,
  selectInstancesByStatus,
  NodeSelectorSchema,
  selectNodeByInstanceTypeAndLocation,
  SshKeySelectorSchema,
  ALL_INSTANCE_TYPES,
  AuthMeResponseSchema,
  RecipeWireSchema,
  RecipeGroupWireSchema,
  ListRecipesResponseSchema,
  SshKeyWireSchema,
  ListSshKeysResponseSchema,
  AddSshKeyResponseSchema,
  RentInstanceResponseSchema,
  VirtualMachineWireSchema,
  InstanceWireSchema,
  ListInstancesResponseSchema,
  InstanceVariantWireSchema,
  InstanceTypeWireSchema,
  ListInstanceTypesResponseSchema,
  parseRecipeDetails,
  parseLoginInfo,
} from './api/cloud';

// Config - Timing
export {
  TIMING,
  parseDuration,
  validateTimingConstraints,
  calculateBackoff,
  formatDuration,
} from './config/timing';

export type { TimingConfig } from './config/timing';
