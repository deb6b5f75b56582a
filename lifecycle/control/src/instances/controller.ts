// instances/controller.ts - Instance lifecycle: rent + poll to ready, read, terminate + poll to gone
//
// create: requested -> renting -> polling -> ready | timed_out | cancelled | failed
// delete: requested -> terminating -> polling -> absent | timed_out | cancelled | failed
//
// When several poll-loop triggers are due at once, the deadline wins over
// cancellation, and cancellation wins over the interval tick.

import {
  TIMING,
  CancellationError,
  CreateError,
  DeleteError,
  ReadError,
  TimeoutError,
  ValidationError,
  formatDuration,
  isInstanceReady,
  isNotFound,
  isRiftError,
  type Instance,
  type InstanceId,
  type InstancePlan,
  type InstanceState,
  type ReadResult,
  type SshKey,
} from "@riftctl/contracts";
import type { RiftClient } from "../api/client";
import type { SshKeyManager } from "../ssh-keys/manager";
import { systemClock, type Clock } from "../lib/clock";
import { importedState, initialState, mergeSnapshot } from "./state";

// =============================================================================
// Types
// =============================================================================

export interface LifecyclePolicy {
  pollIntervalMs: number;
  createDeadlineMs: number;
  /** null waits for termination indefinitely */
  deleteDeadlineMs: number | null;
}

export type CreatePhase = "requested" | "renting" | "polling" | "ready" | "timed_out" | "cancelled" | "failed";
export type DeletePhase = "requested" | "terminating" | "polling" | "absent" | "timed_out" | "cancelled" | "failed";

export interface LifecycleTransition {
  operation: "create" | "delete";
  instanceId: InstanceId | null;
  from: CreatePhase | DeletePhase;
  to: CreatePhase | DeletePhase;
}

/** Receives the merged state whenever the authoritative view changes. */
export type PersistFn = (state: InstanceState) => void | Promise<void>;

export interface CreateOptions {
  signal?: AbortSignal;
  persist: PersistFn;
}

export interface DeleteOptions {
  signal?: AbortSignal;
  persist?: PersistFn;
}

export interface InstanceControllerOptions {
  clock?: Clock;
  policy?: Partial<LifecyclePolicy>;
  onTransition?: (transition: LifecycleTransition) => void;
}

export type InstanceApi = Pick<RiftClient, "rentInstance" | "getInstance" | "terminateInstance">;
export type SshKeyLookup = Pick<SshKeyManager, "findById">;

type Trigger = "deadline" | "cancelled" | "tick";

// =============================================================================
// Policy
// =============================================================================

export function defaultLifecyclePolicy(): LifecyclePolicy {
  return {
    pollIntervalMs: TIMING.POLL_INTERVAL_MS,
    createDeadlineMs: TIMING.CREATE_DEADLINE_MS,
    deleteDeadlineMs: TIMING.DELETE_DEADLINE_MS > 0 ? TIMING.DELETE_DEADLINE_MS : null,
  };
}

function validatePolicy(policy: LifecyclePolicy): void {
  if (policy.pollIntervalMs <= 0) {
    throw new ValidationError("poll interval must be > 0");
  }
  if (policy.createDeadlineMs <= policy.pollIntervalMs) {
    throw new ValidationError("create deadline must exceed the poll interval");
  }
  if (policy.deleteDeadlineMs !== null && policy.deleteDeadlineMs <= policy.pollIntervalMs) {
    throw new ValidationError("delete deadline must exceed the poll interval");
  }
}

// =============================================================================
// Replacement
// =============================================================================

/** Plan fields that cannot change in place: any difference forces a new instance. */
export const REPLACEMENT_FIELDS = [
  "recipe",
  "datacenter",
  "instanceType",
  "sshKeyId",
  "startupCommands",
] as const satisfies readonly (keyof InstancePlan)[];

export type ReplacementField = (typeof REPLACEMENT_FIELDS)[number];

export function requiresReplacement(prev: InstancePlan, next: InstancePlan): ReplacementField[] {
  return REPLACEMENT_FIELDS.filter((field) => (prev[field] ?? "") !== (next[field] ?? ""));
}

// =============================================================================
// Controller
// =============================================================================

class PhaseTracker<P extends CreatePhase | DeletePhase> {
  instanceId: InstanceId | null;

  constructor(
    private readonly operation: "create" | "delete",
    private phase: P,
    instanceId: InstanceId | null,
    private readonly emit?: (transition: LifecycleTransition) => void,
  ) {
    this.instanceId = instanceId;
  }

  to(next: P): void {
    const from = this.phase;
    this.phase = next;
    console.log(`[instances] ${this.operation} ${this.instanceId ?? "(unassigned)"}: ${from} -> ${next}`);
    this.emit?.({ operation: this.operation, instanceId: this.instanceId, from, to: next });
  }
}

export class InstanceController {
  readonly policy: Readonly<LifecyclePolicy>;
  private readonly clock: Clock;
  private readonly onTransition?: (transition: LifecycleTransition) => void;

  constructor(
    private readonly api: InstanceApi,
    private readonly sshKeys: SshKeyLookup,
    options: InstanceControllerOptions = {},
  ) {
    const policy = { ...defaultLifecyclePolicy(), ...options.policy };
    validatePolicy(policy);
    this.policy = Object.freeze(policy);
    this.clock = options.clock ?? systemClock;
    this.onTransition = options.onTransition;
  }

  // ─── Create ───────────────────────────────────────────────────────────────

  /**
   * Rent one instance and poll until it is ready. `persist` sees the id as
   * soon as the rent succeeds, so a failed or interrupted create still leaves
   * the caller tracking what was rented.
   */
  async create(plan: InstancePlan, options: CreateOptions): Promise<InstanceState> {
    const phase = new PhaseTracker<CreatePhase>("create", "requested", null, this.onTransition);

    let key: SshKey;
    try {
      key = await this.sshKeys.findById(plan.sshKeyId);
    } catch (err) {
      phase.to("failed");
      throw err;
    }
    if (options.signal?.aborted) {
      phase.to("cancelled");
      throw new CancellationError("instance creation was cancelled before renting", {
        cause: options.signal.reason,
      });
    }

    phase.to("renting");
    let ids: string[];
    try {
      ids = await this.api.rentInstance({
        recipe: plan.recipe,
        datacenter: plan.datacenter,
        instanceType: plan.instanceType,
        sshPublicKeys: [key.publicKey],
        startupCommands: plan.startupCommands,
      });
    } catch (err) {
      phase.to("failed");
      if (isRiftError(err) && (err.category === "validation" || err.category === "not_found")) {
        throw err;
      }
      throw new CreateError("failed to rent instance", { cause: err });
    }

    const [id] = ids;
    if (ids.length !== 1 || id === undefined) {
      phase.to("failed");
      throw new CreateError(`expected exactly one instance id from rent, got ${ids.length}`, {
        code: "UNEXPECTED_INSTANCE_COUNT",
        details: { instanceIds: ids },
      });
    }

    phase.instanceId = id;
    let state = initialState(plan, id);
    await options.persist(state);
    phase.to("polling");

    const deadlineAt = this.clock.now() + this.policy.createDeadlineMs;
    for (;;) {
      const trigger = await this.nextTrigger(deadlineAt, options.signal);

      if (trigger === "deadline") {
        await options.persist(state);
        phase.to("timed_out");
        throw new TimeoutError(
          `instance ${id} was not ready within ${formatDuration(this.policy.createDeadlineMs)}`,
          { details: { instanceId: id, lastStatus: state.status } },
        );
      }
      if (trigger === "cancelled") {
        await options.persist(state);
        phase.to("cancelled");
        throw new CancellationError(`creation of instance ${id} was cancelled`, {
          details: { instanceId: id, lastStatus: state.status },
          cause: options.signal?.reason,
        });
      }

      let instance: Instance;
      try {
        instance = await this.api.getInstance(id);
      } catch (err) {
        await options.persist(state);
        phase.to("failed");
        throw new CreateError(`failed to poll status of instance ${id}`, { instanceId: id, cause: err });
      }

      state = mergeSnapshot(state, instance);
      if (isInstanceReady(instance)) {
        await options.persist(state);
        phase.to("ready");
        return state;
      }
      console.log(`[instances] ${id} is ${instance.status}, waiting for a ready VM`);
    }
  }

  // ─── Read ─────────────────────────────────────────────────────────────────

  /** Refresh tracked state; `removed` when the instance is gone or Inactive. */
  async read(state: InstanceState): Promise<ReadResult<InstanceState>> {
    try {
      const instance = await this.api.getInstance(state.id);
      return { kind: "found", state: mergeSnapshot(state, instance) };
    } catch (err) {
      if (isNotFound(err)) {
        console.log(`[instances] ${state.id} no longer exists, dropping it`);
        return { kind: "removed" };
      }
      throw new ReadError(`failed to read instance ${state.id}`, { instanceId: state.id, cause: err });
    }
  }

  /** Adopt an existing instance by id. Plan fields stay empty. */
  async import(id: InstanceId): Promise<InstanceState> {
    try {
      return importedState(await this.api.getInstance(id));
    } catch (err) {
      if (isNotFound(err)) throw err;
      throw new ReadError(`failed to import instance ${id}`, { instanceId: id, cause: err });
    }
  }

  requiresReplacement(prev: InstancePlan, next: InstancePlan): ReplacementField[] {
    return requiresReplacement(prev, next);
  }

  // ─── Delete ───────────────────────────────────────────────────────────────

  /** Terminate and wait until the instance is gone. An already-gone instance is success. */
  async delete(state: InstanceState, options: DeleteOptions = {}): Promise<void> {
    const id = state.id;
    const phase = new PhaseTracker<DeletePhase>("delete", "requested", id, this.onTransition);

    if (options.signal?.aborted) {
      phase.to("cancelled");
      throw new CancellationError(`deletion of instance ${id} was cancelled before terminating`, {
        cause: options.signal.reason,
      });
    }

    phase.to("terminating");
    try {
      await this.api.terminateInstance(id);
    } catch (err) {
      if (isNotFound(err)) {
        phase.to("absent");
        return;
      }
      phase.to("failed");
      throw new DeleteError(`failed to terminate instance ${id}`, { instanceId: id, cause: err });
    }
    phase.to("polling");

    const deadlineMs = this.policy.deleteDeadlineMs;
    const deadlineAt = deadlineMs === null ? null : this.clock.now() + deadlineMs;
    let current = state;
    for (;;) {
      const trigger = await this.nextTrigger(deadlineAt, options.signal);

      if (trigger === "deadline") {
        await options.persist?.(current);
        phase.to("timed_out");
        throw new TimeoutError(
          `instance ${id} was still present after ${formatDuration(deadlineMs ?? 0)}`,
          { details: { instanceId: id, lastStatus: current.status } },
        );
      }
      if (trigger === "cancelled") {
        await options.persist?.(current);
        phase.to("cancelled");
        throw new CancellationError(`deletion of instance ${id} was cancelled`, {
          details: { instanceId: id, lastStatus: current.status },
          cause: options.signal?.reason,
        });
      }

      let instance: Instance;
      try {
        instance = await this.api.getInstance(id);
      } catch (err) {
        if (isNotFound(err)) {
          phase.to("absent");
          return;
        }
        await options.persist?.(current);
        phase.to("failed");
        throw new DeleteError(`failed to poll instance ${id} while terminating`, { instanceId: id, cause: err });
      }

      current = mergeSnapshot(current, instance);
      console.log(`[instances] ${id} is ${instance.status}, waiting for it to disappear`);
    }
  }

  // ─── Poll loop ────────────────────────────────────────────────────────────

  /**
   * Wait for the next poll tick. The wait is cut short by the deadline or
   * the signal; both are re-checked on wake in priority order.
   */
  private async nextTrigger(deadlineAt: number | null, signal?: AbortSignal): Promise<Trigger> {
    const due = (): Trigger | null => {
      if (deadlineAt !== null && this.clock.now() >= deadlineAt) return "deadline";
      if (signal?.aborted) return "cancelled";
      return null;
    };

    const before = due();
    if (before) return before;

    const remaining = deadlineAt === null ? Infinity : deadlineAt - this.clock.now();
    await this.clock.sleep(Math.min(this.policy.pollIntervalMs, remaining), signal);

    return due() ?? "tick";
  }
}
