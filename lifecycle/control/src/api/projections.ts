// api/projections.ts - Wire records -> domain model

import {
  parseLoginInfo,
  type Instance,
  type InstanceType,
  type InstanceTypeWire,
  type InstanceVariantWire,
  type InstanceTypeVariant,
  type InstanceWire,
  type RecipeGroup,
  type RecipeGroupWire,
  type SshKey,
  type SshKeyWire,
  type VirtualMachine,
  type VirtualMachineWire,
} from "@riftctl/contracts";

/** Empty strings from the API mean "absent" for optional addresses. */
function optionalString(value: string | null | undefined): string | null {
  return value ? value : null;
}

export function projectVirtualMachine(vm: VirtualMachineWire): VirtualMachine {
  return {
    vmid: vm.vmid,
    name: vm.name,
    loginInfo: parseLoginInfo(vm.login_info),
    ready: vm.ready,
  };
}

export function projectInstance(wire: InstanceWire): Instance {
  return {
    id: wire.id,
    status: wire.status,
    nodeId: wire.node_id,
    nodeMode: wire.node_mode,
    nodeStatus: wire.node_status,
    publicIp: optionalString(wire.host_address),
    privateIp: optionalString(wire.internal_host_address),
    resourceInfo: wire.resource_info
      ? { providerName: wire.resource_info.provider_name, instanceType: wire.resource_info.instance_type }
      : null,
    virtualMachines: (wire.virtual_machines ?? []).map(projectVirtualMachine),
  };
}

export function projectSshKey(wire: SshKeyWire): SshKey {
  return { id: wire.id, name: wire.name, publicKey: wire.public_key };
}

export function projectRecipeGroup(wire: RecipeGroupWire): RecipeGroup {
  return {
    name: wire.name,
    description: wire.description ?? "",
    recipes: wire.recipes.map((r) => ({ name: r.name, description: r.description ?? "" })),
  };
}

function projectVariant(wire: InstanceVariantWire): InstanceTypeVariant {
  const datacenters = Object.entries(wire.nodes_per_dc ?? {})
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => a.name.localeCompare(b.name));
  return {
    name: wire.name,
    cpuCount: wire.cpu_count,
    ...(wire.gpu_count != null ? { gpuCount: wire.gpu_count } : {}),
    disk: wire.disk,
    dram: wire.dram,
    costPerHour: wire.cost_per_hour,
    datacenters,
  };
}

export function projectInstanceType(wire: InstanceTypeWire): InstanceType {
  return {
    name: wire.name,
    ...(wire.brand_short ? { brandShort: wire.brand_short } : {}),
    ...(wire.manufacturer ? { manufacturer: wire.manufacturer } : {}),
    variants: wire.variants.map(projectVariant),
  };
}
