// index.ts - Public surface of the lifecycle package

export {
  resolveClientConfig,
  loadConfigFile,
  clearConfigCache,
  parseSimpleToml,
  normalizeBaseUrl,
  DEFAULT_BASE_URL,
} from "./config";
export type { ConfigOverrides, ResolvedClientConfig } from "./config";

export { systemClock } from "./lib/clock";
export type { Clock } from "./lib/clock";

export { withRetry } from "./api/retry";
export type { RetryOptions } from "./api/retry";

export { HttpTransport, parseWith, ignoreBody } from "./api/transport";
export type { HttpMethod, TransportRequest, ResponseParser, HttpTransportOptions } from "./api/transport";

export { RiftClient, decodeStartupCommands } from "./api/client";
export type { ClientOptions } from "./api/client";

export {
  projectInstance,
  projectInstanceType,
  projectRecipeGroup,
  projectSshKey,
  projectVirtualMachine,
} from "./api/projections";

export { RecipeCache } from "./recipes/cache";
export type { RecipeGroupSource, RefreshSummary } from "./recipes/cache";

export { SshKeyManager } from "./ssh-keys/manager";
export type { SshKeyApi } from "./ssh-keys/manager";

export {
  InstanceController,
  defaultLifecyclePolicy,
  requiresReplacement,
  REPLACEMENT_FIELDS,
} from "./instances/controller";
export type {
  LifecyclePolicy,
  LifecycleTransition,
  CreatePhase,
  DeletePhase,
  CreateOptions,
  DeleteOptions,
  PersistFn,
  InstanceControllerOptions,
  InstanceApi,
  SshKeyLookup,
  ReplacementField,
} from "./instances/controller";

export { mergeSnapshot, projectVirtualMachines, initialState, importedState } from "./instances/state";

export { Catalog, datacentersWithCapacity } from "./catalog/catalog";
export type { CatalogApi, VariantMatch } from "./catalog/catalog";
