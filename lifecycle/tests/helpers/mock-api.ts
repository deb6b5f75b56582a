// tests/helpers/mock-api.ts - In-memory control-plane API behind an injected fetch
//
// Mock strategy: the fetch implementation dispatches on path + method against
// MockApiState. Tests shape behaviour by editing the state: queue one-off
// replies per path, script instance progressions, or flip auth.

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  InstancesSelectorSchema,
  NodeSelectorSchema,
  type InstanceTypeWire,
  type InstanceWire,
  type RecipeGroupWire,
  type SshKeyWire,
} from "@riftctl/contracts";
import { RiftClient, type ClientOptions } from "../../control/src/api/client";
import { VirtualClock } from "./virtual-clock";

export const TEST_BASE_URL = "https://api.test.invalid/";
export const TEST_TOKEN = "test-secret";

// =============================================================================
// State
// =============================================================================

export type MockReply = { status: number; body?: unknown; text?: string } | { networkError: string };

/** One poll's worth of change to a rented instance; "gone" removes it. */
export type InstanceStep = Partial<InstanceWire> | "gone";

export interface RecordedRequest {
  method: string;
  path: string;
  headers: Record<string, string>;
  body: unknown;
}

export interface MockApiState {
  email: string | null;
  recipeGroups: RecipeGroupWire[];
  sshKeys: Map<string, SshKeyWire>;
  instances: Map<string, InstanceWire>;
  instanceTypes: InstanceTypeWire[];
  /** Steps applied, one per by-id list call, to the next rented instance */
  nextProgression: InstanceStep[];
  progressions: Map<string, InstanceStep[]>;
  /** Overrides the ids returned by the next rent */
  rentIds: string[] | null;
  /** Status an instance takes when terminated */
  terminateTo: InstanceWire["status"];
  /** One-off replies keyed by path, consumed before normal dispatch */
  queued: Map<string, MockReply[]>;
  requests: RecordedRequest[];
  nextKeyId: number;
  nextInstanceId: number;
}

export function vmRecipe(name: string, imageUrl: string, cloudinitUrl: string) {
  return { name, description: `${name} VM`, details: { VirtualMachine: { image_url: imageUrl, cloudinit_url: cloudinitUrl } } };
}

export function createMockState(): MockApiState {
  return {
    email: "dev@example.com",
    recipeGroups: [
      {
        name: "Linux",
        description: "Plain distributions",
        recipes: [
          vmRecipe("Ubuntu-22.04", "https://images.test/ubuntu-22.04.img", "https://images.test/ubuntu-init.yaml"),
          {
            name: "nvidia-docker",
            description: null,
            details: { ContainerImage: { image: "nvidia/cuda:12.2" } },
          },
          vmRecipe("Blank", "", ""),
        ],
      },
      {
        name: "ML",
        description: "Machine learning images",
        recipes: [vmRecipe("pytorch", "https://images.test/pytorch.img", "")],
      },
    ],
    sshKeys: new Map([
      ["key-1", { id: "key-1", name: "primary", public_key: "ssh-ed25519 AAAATESTKEY primary" }],
    ]),
    instances: new Map(),
    instanceTypes: [
      {
        name: "rtx49",
        brand_short: "RTX 4090",
        manufacturer: "NVIDIA",
        variants: [
          {
            name: "rtx49-8c-nr.1",
            cpu_count: 8,
            gpu_count: 1,
            disk: 500,
            dram: 64,
            cost_per_hour: 0.65,
            nodes_per_dc: { "us-east-nc-nr-1": 2, "eu-north-1": 0 },
          },
        ],
      },
      {
        name: "cpu",
        variants: [
          { name: "cpu-4c", cpu_count: 4, disk: 100, dram: 16, cost_per_hour: 0.05, nodes_per_dc: null },
        ],
      },
    ],
    nextProgression: [],
    progressions: new Map(),
    rentIds: null,
    terminateTo: "Inactive",
    queued: new Map(),
    requests: [],
    nextKeyId: 2,
    nextInstanceId: 1,
  };
}

/** Queue one-off replies for a path such as "api/v1/instances/list". */
export function queueReplies(state: MockApiState, path: string, ...replies: MockReply[]): void {
  state.queued.set(path, [...(state.queued.get(path) ?? []), ...replies]);
}

export function requestsTo(state: MockApiState, path: string): RecordedRequest[] {
  return state.requests.filter((r) => r.path === path);
}

// =============================================================================
// Dispatch
// =============================================================================

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function notFound(): Response {
  return jsonResponse({ error: "not found" }, 404);
}

const InstancesBodySchema = Type.Object({ data: Type.Object({ selector: InstancesSelectorSchema }) });
const RentBodySchema = Type.Object({ data: Type.Object({ selector: NodeSelectorSchema }) });
const AddKeyBodySchema = Type.Object({ data: Type.Object({ name: Type.String(), public_key: Type.String() }) });

function applyStep(state: MockApiState, id: string): void {
  const steps = state.progressions.get(id);
  const step = steps?.shift();
  if (step === undefined) return;
  if (step === "gone") {
    state.instances.delete(id);
    return;
  }
  const current = state.instances.get(id);
  if (current) state.instances.set(id, { ...current, ...step });
}

function handle(state: MockApiState, method: string, path: string, body: unknown): Response {
  if (path === "api/v1/auth/me" && method === "POST") {
    return jsonResponse({ data: { email: state.email } });
  }
  if (path === "api/v1/recipes/list" && method === "POST") {
    return jsonResponse({ data: { groups: state.recipeGroups } });
  }
  if (path === "api/v1/instance-types/list" && method === "POST") {
    return jsonResponse({ data: { instance_types: state.instanceTypes } });
  }
  if (path === "api/v1/ssh-keys/list" && method === "POST") {
    return jsonResponse({ data: { keys: [...state.sshKeys.values()] } });
  }
  if (path === "api/v1/ssh-keys/add" && method === "POST") {
    if (!Value.Check(AddKeyBodySchema, body)) return jsonResponse({ error: "bad request" }, 400);
    const key: SshKeyWire = { id: `key-${state.nextKeyId++}`, name: body.data.name, public_key: body.data.public_key };
    state.sshKeys.set(key.id, key);
    return jsonResponse({ data: { public_key: key } }, 201);
  }
  const keyMatch = path.match(/^api\/v1\/ssh-keys\/([^/]+)$/);
  if (keyMatch?.[1] && method === "DELETE") {
    const id = decodeURIComponent(keyMatch[1]);
    if (!state.sshKeys.delete(id)) return notFound();
    return new Response(null, { status: 200 });
  }
  if (path === "api/v1/instances/rent" && method === "POST") {
    if (!Value.Check(RentBodySchema, body)) return jsonResponse({ error: "bad request" }, 400);
    if (state.rentIds) {
      const ids = state.rentIds;
      state.rentIds = null;
      return jsonResponse({ data: { instance_ids: ids } });
    }
    const id = `inst-${state.nextInstanceId++}`;
    state.instances.set(id, {
      id,
      status: "Initializing",
      node_id: "node-1",
      node_mode: "VirtualMachine",
      node_status: "Ready",
      resource_info: {
        provider_name: "test-provider",
        instance_type: body.data.selector.ByInstanceTypeAndLocation.instance_type,
      },
      virtual_machines: [],
    });
    state.progressions.set(id, state.nextProgression);
    state.nextProgression = [];
    return jsonResponse({ data: { instance_ids: [id] } });
  }
  if (path === "api/v1/instances/terminate" && method === "POST") {
    if (!Value.Check(InstancesBodySchema, body) || !("ById" in body.data.selector)) {
      return jsonResponse({ error: "bad request" }, 400);
    }
    const ids = body.data.selector.ById;
    const live = ids.filter((id) => {
      const instance = state.instances.get(id);
      return instance !== undefined && instance.status !== "Inactive";
    });
    if (live.length === 0) return notFound();
    for (const id of live) {
      const instance = state.instances.get(id);
      if (instance) state.instances.set(id, { ...instance, status: state.terminateTo });
    }
    return new Response(null, { status: 200 });
  }
  if (path === "api/v1/instances/list" && method === "POST") {
    if (!Value.Check(InstancesBodySchema, body)) return jsonResponse({ error: "bad request" }, 400);
    const selector = body.data.selector;
    if ("ById" in selector) {
      for (const id of selector.ById) applyStep(state, id);
      const found = selector.ById.flatMap((id) => {
        const instance = state.instances.get(id);
        return instance ? [instance] : [];
      });
      return jsonResponse({ data: { instances: found } });
    }
    const statuses: string[] = selector.ByStatus;
    const found = [...state.instances.values()].filter((i) => statuses.includes(i.status));
    return jsonResponse({ data: { instances: found } });
  }
  return jsonResponse({ error: "mock route not found" }, 501);
}

export function createMockFetch(state: MockApiState): typeof fetch {
  return async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const method = init?.method ?? "GET";
    const path = url.startsWith(TEST_BASE_URL) ? url.slice(TEST_BASE_URL.length) : url;
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    state.requests.push({ method, path, headers, body });

    const queue = state.queued.get(path);
    const reply = queue?.shift();
    if (reply) {
      if ("networkError" in reply) throw new TypeError(reply.networkError);
      if (reply.text !== undefined) return new Response(reply.text, { status: reply.status });
      return reply.body === undefined ? new Response(null, { status: reply.status }) : jsonResponse(reply.body, reply.status);
    }

    return handle(state, method, path, body);
  };
}

// =============================================================================
// Client
// =============================================================================

export interface TestClient {
  client: RiftClient;
  state: MockApiState;
  clock: VirtualClock;
}

/** Connect a client to the mock API, with every config value pinned. */
export async function connectTestClient(
  state: MockApiState = createMockState(),
  options: Partial<ClientOptions> = {},
): Promise<TestClient> {
  const clock = new VirtualClock();
  const client = await RiftClient.connect({
    token: TEST_TOKEN,
    baseUrl: TEST_BASE_URL,
    protoVersion: "2025-06-10",
    retries: 2,
    retryBaseDelayMs: 1000,
    clock,
    _fetchImpl: createMockFetch(state),
    ...options,
  });
  return { client, state, clock };
}
