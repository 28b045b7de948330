/**
 * Static model catalog. Read-only once constructed.
 */

import type { Model } from "./types";
import { ConfigError } from "@/lib/config";

/** A round needs two distinct models. */
export const MIN_MODELS = 2;

export class ModelRegistry {
  private readonly models: readonly Model[];
  private readonly byId: ReadonlyMap<string, Model>;

  constructor(models: readonly Model[]) {
    const byId = new Map<string, Model>();
    for (const model of models) {
      if (byId.has(model.id)) {
        throw new ConfigError([`Duplicate model id "${model.id}"`]);
      }
      byId.set(model.id, Object.freeze({ ...model }));
    }

    if (byId.size < MIN_MODELS) {
      throw new ConfigError([
        `At least ${MIN_MODELS} models are required, got ${byId.size}`,
      ]);
    }

    this.byId = byId;
    this.models = Object.freeze([...byId.values()]);
  }

  list(): readonly Model[] {
    return this.models;
  }

  get(id: string): Model | null {
    return this.byId.get(id) ?? null;
  }

  ids(): string[] {
    return this.models.map((m) => m.id);
  }
}
