// recipes/cache.ts - In-memory recipe name -> VM provisioning details
//
// Names are matched case-insensitively. Entries are merged on refresh and
// never evicted. Concurrent refreshes share one in-flight listing, and the
// map is written only inside that listing, so a lookup never observes a
// half-applied refresh.

import {
  NotFoundError,
  parseRecipeDetails,
  type RecipeGroupWire,
  type VmRecipeDetails,
} from "@riftctl/contracts";

export type RecipeGroupSource = () => Promise<RecipeGroupWire[]>;

export interface RefreshSummary {
  added: number;
  skipped: number;
}

export class RecipeCache {
  private readonly entries = new Map<string, VmRecipeDetails>();
  private inflight: Promise<RefreshSummary> | null = null;

  constructor(private readonly source: RecipeGroupSource) {}

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  refresh(): Promise<RefreshSummary> {
    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /** Cached details, else one refresh, else NotFoundError('recipe', name). */
  async find(name: string): Promise<VmRecipeDetails> {
    const key = name.toLowerCase();
    const hit = this.entries.get(key);
    if (hit) return hit;

    await this.refresh();
    const found = this.entries.get(key);
    if (!found) {
      throw new NotFoundError("recipe", name);
    }
    return found;
  }

  private async load(): Promise<RefreshSummary> {
    const groups = await this.source();
    let added = 0;
    let skipped = 0;
    for (const group of groups) {
      for (const recipe of group.recipes) {
        const parsed = parseRecipeDetails(recipe.details);
        if (parsed.kind !== "vm") {
          skipped++;
          continue;
        }
        this.entries.set(recipe.name.toLowerCase(), parsed.details);
        added++;
      }
    }
    console.log(`[recipes] refreshed: ${added} VM recipes merged, ${skipped} other recipes skipped, ${this.entries.size} cached`);
    return { added, skipped };
  }
}
