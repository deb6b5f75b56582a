// ssh-keys/manager.ts - Register, list, look up and remove SSH public keys

import {
  NotFoundError,
  ValidationError,
  isNotFound,
  type ReadResult,
  type SshKey,
  type SshKeyState,
} from "@riftctl/contracts";
import type { RiftClient } from "../api/client";

export type SshKeyApi = Pick<RiftClient, "addSshKey" | "listSshKeys" | "deleteSshKey">;

function toState(key: SshKey): SshKeyState {
  return { id: key.id, name: key.name, publicKey: key.publicKey };
}

export class SshKeyManager {
  constructor(private readonly api: SshKeyApi) {}

  async add(name: string, publicKey: string): Promise<SshKeyState> {
    if (name === "") {
      throw new ValidationError("ssh key name is empty", { code: "MISSING_REQUIRED_FIELD" });
    }
    if (publicKey === "") {
      throw new ValidationError("ssh public key is empty", { code: "MISSING_REQUIRED_FIELD" });
    }
    const key = await this.api.addSshKey(name, publicKey);
    console.log(`[ssh-keys] added ${key.name} (${key.id})`);
    return toState(key);
  }

  list(): Promise<SshKey[]> {
    return this.api.listSshKeys();
  }

  /** Removing a key that is already gone counts as success. */
  async delete(id: string): Promise<void> {
    try {
      await this.api.deleteSshKey(id);
      console.log(`[ssh-keys] deleted ${id}`);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      console.log(`[ssh-keys] ${id} already absent`);
    }
  }

  async findByName(name: string): Promise<SshKey> {
    const keys = await this.api.listSshKeys();
    const key = keys.find((k) => k.name === name);
    if (!key) throw new NotFoundError("ssh key", name);
    return key;
  }

  async findById(id: string): Promise<SshKey> {
    const keys = await this.api.listSshKeys();
    const key = keys.find((k) => k.id === id);
    if (!key) throw new NotFoundError("ssh key", id);
    return key;
  }

  /** Refresh tracked key state; `removed` once the id is no longer listed. */
  async read(state: SshKeyState): Promise<ReadResult<SshKeyState>> {
    const keys = await this.api.listSshKeys();
    const key = keys.find((k) => k.id === state.id);
    return key ? { kind: "found", state: toState(key) } : { kind: "removed" };
  }
}
