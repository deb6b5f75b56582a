// api/client.ts - Authenticated control-plane client
//
// All endpoints are POST with a { version, data } envelope except key
// deletion, which is DELETE with no body.

import {
  AddSshKeyResponseSchema,
  ALL_INSTANCE_TYPES,
  AuthenticationError,
  AuthMeResponseSchema,
  ApiError,
  LIVE_INSTANCE_STATUSES,
  ListInstanceTypesResponseSchema,
  ListInstancesResponseSchema,
  ListRecipesResponseSchema,
  ListSshKeysResponseSchema,
  NotFoundError,
  RentInstanceResponseSchema,
  RiftError,
  ValidationError,
  selectInstancesById,
  selectInstancesByStatus,
  selectNodeByInstanceTypeAndLocation,
  versioned,
  type AddSshKeyRequestData,
  type AuthSession,
  type Instance,
  type InstanceType,
  type InstancesRequestData,
  type InstancesSelector,
  type ListInstanceTypesRequestData,
  type RecipeGroupWire,
  type RentInstanceRequestData,
  type RentRequest,
  type SshKey,
  type VmRecipeDetails,
} from "@riftctl/contracts";
import { resolveClientConfig, type ConfigOverrides, type ResolvedClientConfig } from "../config";
import { HttpTransport, ignoreBody, parseWith } from "./transport";
import { projectInstance, projectInstanceType, projectSshKey } from "./projections";
import { RecipeCache } from "../recipes/cache";
import type { Clock } from "../lib/clock";

// =============================================================================
// Options
// =============================================================================

export interface ClientOptions extends ConfigOverrides {
  clock?: Clock;
  retryBaseDelayMs?: number;
  _fetchImpl?: typeof fetch;
}

// =============================================================================
// Startup commands
// =============================================================================

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Strict, padded base64 decode followed by trim. Line breaks are ignored. */
export function decodeStartupCommands(encoded: string): string {
  const compact = encoded.replace(/[\r\n]/g, "");
  if (!BASE64_PATTERN.test(compact)) {
    throw new ValidationError("startup commands are not valid base64", { code: "INVALID_FORMAT" });
  }
  return Buffer.from(compact, "base64").toString("utf-8").trim();
}

function validateRentRequest(request: RentRequest): void {
  if (request.recipe === "") {
    throw new ValidationError("no image specified", { code: "MISSING_REQUIRED_FIELD" });
  }
  if (request.sshPublicKeys.length === 0 || request.sshPublicKeys.some((k) => k === "")) {
    throw new ValidationError("no ssh key specified", { code: "MISSING_REQUIRED_FIELD" });
  }
  if (request.datacenter === "") {
    throw new ValidationError("empty datacenter", { code: "MISSING_REQUIRED_FIELD" });
  }
  if (request.instanceType === "") {
    throw new ValidationError("empty instance", { code: "MISSING_REQUIRED_FIELD" });
  }
}

// =============================================================================
// Authentication
// =============================================================================

async function authenticate(transport: HttpTransport, token: string): Promise<AuthSession> {
  let email: string | null | undefined;
  try {
    const response = await transport.execute(
      { method: "POST", path: "api/v1/auth/me", operation: "auth.me" },
      parseWith(AuthMeResponseSchema, "auth.me"),
    );
    email = response.data.email;
  } catch (err) {
    if (err instanceof ApiError && err.code === "UNAUTHORIZED") {
      throw new AuthenticationError("API token was rejected", { cause: err });
    }
    throw err;
  }
  if (!email) {
    throw new AuthenticationError("invalid API token: no identity behind it", { code: "INVALID_TOKEN" });
  }
  return Object.freeze({ token, email });
}

// =============================================================================
// Client
// =============================================================================

export class RiftClient {
  readonly recipes: RecipeCache;

  private constructor(
    readonly session: AuthSession,
    readonly config: Readonly<ResolvedClientConfig>,
    private readonly transport: HttpTransport,
  ) {
    this.recipes = new RecipeCache(() => this.listRecipes());
  }

  /**
   * Resolve config, authenticate and prime the recipe cache. A client exists
   * only once all three succeed.
   */
  static async connect(options: ClientOptions = {}): Promise<RiftClient> {
    const config = resolveClientConfig(options);
    const transport = new HttpTransport({
      baseUrl: config.baseUrl,
      token: config.token,
      retries: config.retries,
      requestTimeoutMs: config.requestTimeoutMs,
      retryBaseDelayMs: options.retryBaseDelayMs,
      clock: options.clock,
      _fetchImpl: options._fetchImpl,
    });

    const session = await authenticate(transport, config.token);
    const client = new RiftClient(session, Object.freeze(config), transport);

    await client.recipes.refresh();
    if (client.recipes.size === 0) {
      throw new RiftError("NO_VM_RECIPES", "no recipes for VMs found", "internal");
    }

    console.log(`[client] connected to ${config.baseUrl} as ${session.email} (proto ${config.protoVersion})`);
    return client;
  }

  get protoVersion(): string {
    return this.config.protoVersion;
  }

  private envelope<T>(data: T) {
    return versioned(this.config.protoVersion, data);
  }

  // ─── Recipes ──────────────────────────────────────────────────────────────

  async listRecipes(): Promise<RecipeGroupWire[]> {
    const response = await this.transport.execute(
      { method: "POST", path: "api/v1/recipes/list", body: this.envelope({}), operation: "recipes.list" },
      parseWith(ListRecipesResponseSchema, "recipes.list"),
    );
    return response.data.groups;
  }

  findRecipe(name: string): Promise<VmRecipeDetails> {
    return this.recipes.find(name);
  }

  // ─── SSH keys ─────────────────────────────────────────────────────────────

  async addSshKey(name: string, publicKey: string): Promise<SshKey> {
    const data: AddSshKeyRequestData = { name, public_key: publicKey };
    const response = await this.transport.execute(
      { method: "POST", path: "api/v1/ssh-keys/add", body: this.envelope(data), operation: "ssh-keys.add" },
      parseWith(AddSshKeyResponseSchema, "ssh-keys.add"),
    );
    return projectSshKey(response.data.public_key);
  }

  async listSshKeys(): Promise<SshKey[]> {
    const response = await this.transport.execute(
      { method: "POST", path: "api/v1/ssh-keys/list", body: this.envelope({}), operation: "ssh-keys.list" },
      parseWith(ListSshKeysResponseSchema, "ssh-keys.list"),
    );
    return response.data.keys.map(projectSshKey);
  }

  /** Throws NotFoundError when the key does not exist. */
  async deleteSshKey(id: string): Promise<void> {
    try {
      await this.transport.execute(
        { method: "DELETE", path: `api/v1/ssh-keys/${encodeURIComponent(id)}`, operation: "ssh-keys.delete" },
        ignoreBody,
      );
    } catch (err) {
      if (err instanceof NotFoundError) throw new NotFoundError("ssh key", id, { cause: err });
      throw err;
    }
  }

  // ─── Instances ────────────────────────────────────────────────────────────

  /** Validates, resolves the recipe and rents. Returns the ids the server assigned. */
  async rentInstance(request: RentRequest): Promise<string[]> {
    validateRentRequest(request);
    const commands = request.startupCommands ? decodeStartupCommands(request.startupCommands) : "";
    const recipe = await this.recipes.find(request.recipe);

    const data: RentInstanceRequestData = {
      selector: selectNodeByInstanceTypeAndLocation(request.instanceType, request.datacenter),
      with_public_ip: true,
      config: {
        VirtualMachine: {
          image_url: recipe.imageUrl,
          cloudinit_url: recipe.cloudinitUrl,
          cloudinit_commands: commands,
          ssh_key: { PublicKeys: [...request.sshPublicKeys] },
        },
      },
    };
    const response = await this.transport.execute(
      { method: "POST", path: "api/v1/instances/rent", body: this.envelope(data), operation: "instances.rent" },
      parseWith(RentInstanceResponseSchema, "instances.rent"),
    );
    return response.data.instance_ids;
  }

  /** Throws NotFoundError when the instance does not exist. */
  async terminateInstance(id: string): Promise<void> {
    const data: InstancesRequestData = { selector: selectInstancesById([id]) };
    try {
      await this.transport.execute(
        { method: "POST", path: "api/v1/instances/terminate", body: this.envelope(data), operation: "instances.terminate" },
        ignoreBody,
      );
    } catch (err) {
      if (err instanceof NotFoundError) throw new NotFoundError("instance", id, { cause: err });
      throw err;
    }
  }

  /** Instances matching the selector; by default every live (non-Inactive) instance. */
  async listInstances(selector: InstancesSelector = selectInstancesByStatus(LIVE_INSTANCE_STATUSES)): Promise<Instance[]> {
    const data: InstancesRequestData = { selector };
    const response = await this.transport.execute(
      { method: "POST", path: "api/v1/instances/list", body: this.envelope(data), operation: "instances.list" },
      parseWith(ListInstancesResponseSchema, "instances.list"),
    );
    return response.data.instances.map(projectInstance);
  }

  /** Missing or Inactive instances are NotFoundError. */
  async getInstance(id: string): Promise<Instance> {
    let instances: Instance[];
    try {
      instances = await this.listInstances(selectInstancesById([id]));
    } catch (err) {
      if (err instanceof NotFoundError) throw new NotFoundError("instance", id, { cause: err });
      throw err;
    }
    const instance = instances.find((i) => i.id === id);
    if (!instance || instance.status === "Inactive") {
      throw new NotFoundError("instance", id);
    }
    return instance;
  }

  // ─── Catalog ──────────────────────────────────────────────────────────────

  async listInstanceTypes(): Promise<InstanceType[]> {
    const data: ListInstanceTypesRequestData = { selector: ALL_INSTANCE_TYPES };
    const response = await this.transport.execute(
      { method: "POST", path: "api/v1/instance-types/list", body: this.envelope(data), operation: "instance-types.list" },
      parseWith(ListInstanceTypesResponseSchema, "instance-types.list"),
    );
    return response.data.instance_types.map(projectInstanceType);
  }
}
