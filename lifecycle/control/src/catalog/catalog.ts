// catalog/catalog.ts - Read-only views of recipe groups and instance types

import {
  NotFoundError,
  type InstanceType,
  type InstanceTypeVariant,
  type RecipeGroup,
} from "@riftctl/contracts";
import type { RiftClient } from "../api/client";
import { projectRecipeGroup } from "../api/projections";

export type CatalogApi = Pick<RiftClient, "listRecipes" | "listInstanceTypes">;

export interface VariantMatch {
  instanceType: InstanceType;
  variant: InstanceTypeVariant;
}

export class Catalog {
  constructor(private readonly api: CatalogApi) {}

  async listRecipeGroups(): Promise<RecipeGroup[]> {
    const groups = await this.api.listRecipes();
    return groups.map(projectRecipeGroup);
  }

  listInstanceTypes(): Promise<InstanceType[]> {
    return this.api.listInstanceTypes();
  }

  /** Variant names are what rent requests call the instance type. */
  async findInstanceTypeVariant(name: string): Promise<VariantMatch> {
    for (const instanceType of await this.api.listInstanceTypes()) {
      const variant = instanceType.variants.find((v) => v.name === name);
      if (variant) return { instanceType, variant };
    }
    throw new NotFoundError("instance type", name);
  }
}

/** Datacenters with at least one free node for the variant, sorted by name. */
export function datacentersWithCapacity(variant: InstanceTypeVariant): string[] {
  return variant.datacenters.filter((dc) => dc.count > 0).map((dc) => dc.name);
}
