// instances/state.ts - Merge remote snapshots into caller-held instance state

import type {
  Instance,
  InstanceId,
  InstancePlan,
  InstanceState,
  VirtualMachine,
  VirtualMachineState,
} from "@riftctl/contracts";

export function projectVirtualMachines(vms: VirtualMachine[]): VirtualMachineState[] {
  return vms.map((vm) => ({
    vmid: vm.vmid,
    name: vm.name,
    username: vm.loginInfo?.kind === "username_password" ? vm.loginInfo.username : null,
  }));
}

/** State right after a rent: only the id is known. */
export function initialState(plan: InstancePlan, id: InstanceId): InstanceState {
  return {
    ...plan,
    id,
    status: null,
    nodeId: null,
    nodeMode: null,
    nodeStatus: null,
    publicIp: null,
    privateIp: null,
    providerName: null,
    virtualMachines: [],
  };
}

/**
 * Overwrite server-derived fields from `instance`. Write-only plan fields are
 * carried over from `prev`, and so are the addresses when the snapshot has none.
 */
export function mergeSnapshot(prev: InstanceState, instance: Instance): InstanceState {
  return {
    ...prev,
    id: instance.id,
    status: instance.status,
    nodeId: instance.nodeId,
    nodeMode: instance.nodeMode,
    nodeStatus: instance.nodeStatus,
    publicIp: instance.publicIp ?? prev.publicIp,
    privateIp: instance.privateIp ?? prev.privateIp,
    providerName: instance.resourceInfo?.providerName ?? prev.providerName,
    instanceType: instance.resourceInfo?.instanceType ?? prev.instanceType,
    virtualMachines: projectVirtualMachines(instance.virtualMachines),
  };
}

/** State for an instance adopted by id. Plan fields the API never returns stay empty. */
export function importedState(instance: Instance): InstanceState {
  return mergeSnapshot(
    initialState({ recipe: "", datacenter: "", instanceType: "", sshKeyId: "" }, instance.id),
    instance,
  );
}
