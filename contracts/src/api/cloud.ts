// api/cloud.ts - Control-plane REST API wire types + TypeBox Schemas
//
// Field names follow the remote API (snake_case bodies, PascalCase union tags).
// Every request body is wrapped in a versioned envelope.

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import {
  INSTANCE_STATUSES,
  type InstanceStatus,
  type LoginInfo,
  type VmRecipeDetails,
} from '../types';
import { ValidationError } from '../errors';

// =============================================================================
// HELPERS
// =============================================================================

const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

const InstanceStatusSchema = Type.Union(INSTANCE_STATUSES.map((s) => Type.Literal(s)));

/** Request envelope: every body carries the protocol version */
export interface Versioned<T> {
  version: string;
  data: T;
}

export function versioned<T>(version: string, data: T): Versioned<T> {
  return { version, data };
}

// =============================================================================
// SELECTORS (tagged unions, exactly one variant populated)
// =============================================================================

export const InstancesSelectorSchema = Type.Union([
  Type.Object({ ById: Type.Array(Type.String(), { minItems: 1 }) }, { additionalProperties: false }),
  Type.Object(
    { ByStatus: Type.Array(InstanceStatusSchema, { minItems: 1 }) },
    { additionalProperties: false },
  ),
]);
export type InstancesSelector = Static<typeof InstancesSelectorSchema>;

export function selectInstancesById(ids: string[]): InstancesSelector {
  if (ids.length === 0 || ids.some((id) => id === '')) {
    throw new ValidationError('instance selector needs at least one non-empty id', {
      code: 'MISSING_REQUIRED_FIELD',
    });
  }
  return { ById: [...ids] };
}

export function selectInstancesByStatus(statuses: readonly InstanceStatus[]): InstancesSelector {
  if (statuses.length === 0) {
    throw new ValidationError('instance selector needs at least one status', {
      code: 'MISSING_REQUIRED_FIELD',
    });
  }
  return { ByStatus: [...statuses] };
}

export const NodeSelectorSchema = Type.Object(
  {
    ByInstanceTypeAndLocation: Type.Object({
      instance_type: Type.String({ minLength: 1 }),
      datacenters: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
    }),
  },
  { additionalProperties: false },
);
export type NodeSelector = Static<typeof NodeSelectorSchema>;

export function selectNodeByInstanceTypeAndLocation(instanceType: string, datacenter: string): NodeSelector {
  return {
    ByInstanceTypeAndLocation: { instance_type: instanceType, datacenters: [datacenter] },
  };
}

export const SshKeySelectorSchema = Type.Object(
  { PublicKeys: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }) },
  { additionalProperties: false },
);
export type SshKeySelector = Static<typeof SshKeySelectorSchema>;

/** The only instance-type selector the client uses */
export const ALL_INSTANCE_TYPES = 'All' as const;

// =============================================================================
// REQUEST BODIES
// =============================================================================

export interface VirtualMachineConfiguration {
  VirtualMachine: {
    image_url: string;
    cloudinit_url?: string;
    cloudinit_commands?: string;
    ssh_key: SshKeySelector;
  };
}

export interface RentInstanceRequestData {
  selector: NodeSelector;
  with_public_ip: boolean;
  config: VirtualMachineConfiguration;
}

export interface AddSshKeyRequestData {
  name: string;
  public_key: string;
}

export interface InstancesRequestData {
  selector: InstancesSelector;
}

export interface ListInstanceTypesRequestData {
  selector: typeof ALL_INSTANCE_TYPES;
}

// =============================================================================
// RESPONSE BODIES
// =============================================================================

export const AuthMeResponseSchema = Type.Object({
  data: Type.Object({
    email: Type.Optional(Nullable(Type.String())),
  }),
});
export type AuthMeResponse = Static<typeof AuthMeResponseSchema>;

export const RecipeWireSchema = Type.Object({
  name: Type.String(),
  description: Type.Optional(Nullable(Type.String())),
  // Opaque union: VM details, container details, or something newer
  details: Type.Optional(Type.Unknown()),
});
export type RecipeWire = Static<typeof RecipeWireSchema>;

export const RecipeGroupWireSchema = Type.Object({
  name: Type.String(),
  description: Type.Optional(Nullable(Type.String())),
  recipes: Type.Array(RecipeWireSchema),
});
export type RecipeGroupWire = Static<typeof RecipeGroupWireSchema>;

export const ListRecipesResponseSchema = Type.Object({
  data: Type.Object({
    groups: Type.Array(RecipeGroupWireSchema),
  }),
});
export type ListRecipesResponse = Static<typeof ListRecipesResponseSchema>;

export const SshKeyWireSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  public_key: Type.String(),
});
export type SshKeyWire = Static<typeof SshKeyWireSchema>;

export const ListSshKeysResponseSchema = Type.Object({
  data: Type.Object({
    keys: Type.Array(SshKeyWireSchema),
  }),
});
export type ListSshKeysResponse = Static<typeof ListSshKeysResponseSchema>;

export const AddSshKeyResponseSchema = Type.Object({
  data: Type.Object({
    public_key: SshKeyWireSchema,
  }),
});
export type AddSshKeyResponse = Static<typeof AddSshKeyResponseSchema>;

export const RentInstanceResponseSchema = Type.Object({
  data: Type.Object({
    instance_ids: Type.Array(Type.String()),
  }),
});
export type RentInstanceResponse = Static<typeof RentInstanceResponseSchema>;

export const VirtualMachineWireSchema = Type.Object({
  vmid: Type.Integer(),
  name: Type.String(),
  login_info: Type.Optional(Nullable(Type.Unknown())),
  ready: Type.Boolean(),
});
export type VirtualMachineWire = Static<typeof VirtualMachineWireSchema>;

export const InstanceWireSchema = Type.Object({
  id: Type.String(),
  status: InstanceStatusSchema,
  node_id: Type.String(),
  node_mode: Type.String(),
  node_status: Type.String(),
  host_address: Type.Optional(Nullable(Type.String())),
  internal_host_address: Type.Optional(Nullable(Type.String())),
  resource_info: Type.Optional(
    Nullable(
      Type.Object({
        provider_name: Type.String(),
        instance_type: Type.String(),
      }),
    ),
  ),
  virtual_machines: Type.Optional(Nullable(Type.Array(VirtualMachineWireSchema))),
});
export type InstanceWire = Static<typeof InstanceWireSchema>;

export const ListInstancesResponseSchema = Type.Object({
  data: Type.Object({
    instances: Type.Array(InstanceWireSchema),
  }),
});
export type ListInstancesResponse = Static<typeof ListInstancesResponseSchema>;

export const InstanceVariantWireSchema = Type.Object({
  name: Type.String(),
  cpu_count: Type.Integer(),
  gpu_count: Type.Optional(Nullable(Type.Integer())),
  disk: Type.Number(),
  dram: Type.Number(),
  cost_per_hour: Type.Number(),
  nodes_per_dc: Type.Optional(Nullable(Type.Record(Type.String(), Type.Integer()))),
});
export type InstanceVariantWire = Static<typeof InstanceVariantWireSchema>;

export const InstanceTypeWireSchema = Type.Object({
  name: Type.String(),
  brand_short: Type.Optional(Nullable(Type.String())),
  manufacturer: Type.Optional(Nullable(Type.String())),
  variants: Type.Array(InstanceVariantWireSchema),
});
export type InstanceTypeWire = Static<typeof InstanceTypeWireSchema>;

export const ListInstanceTypesResponseSchema = Type.Object({
  data: Type.Object({
    instance_types: Type.Array(InstanceTypeWireSchema),
  }),
});
export type ListInstanceTypesResponse = Static<typeof ListInstanceTypesResponseSchema>;

// =============================================================================
// OPAQUE UNION PAYLOADS
// =============================================================================

const VmRecipeDetailsWireSchema = Type.Object({
  VirtualMachine: Type.Object({
    image_url: Type.Optional(Nullable(Type.String())),
    cloudinit_url: Type.Optional(Nullable(Type.String())),
  }),
});

export type RecipeDetails = { kind: 'vm'; details: VmRecipeDetails } | { kind: 'other' };

/**
 * Interpret a recipe's opaque details payload. Anything that is not a
 * VirtualMachine variant with at least one populated field is `other`.
 */
export function parseRecipeDetails(raw: unknown): RecipeDetails {
  if (!Value.Check(VmRecipeDetailsWireSchema, raw)) {
    return { kind: 'other' };
  }
  const vm = raw.VirtualMachine;
  const details: VmRecipeDetails = {
    imageUrl: vm.image_url ?? '',
    cloudinitUrl: vm.cloudinit_url ?? '',
  };
  if (details.imageUrl === '' && details.cloudinitUrl === '') {
    return { kind: 'other' };
  }
  return { kind: 'vm', details };
}

const UsernamePasswordWireSchema = Type.Object({
  UsernameAndPassword: Type.Object({
    username: Type.String(),
    password: Type.Optional(Nullable(Type.String())),
  }),
});

export function parseLoginInfo(raw: unknown): LoginInfo | null {
  if (raw === null || raw === undefined) return null;
  if (Value.Check(UsernamePasswordWireSchema, raw)) {
    return {
      kind: 'username_password',
      username: raw.UsernameAndPassword.username,
      password: raw.UsernameAndPassword.password ?? '',
    };
  }
  return { kind: 'unknown' };
}
