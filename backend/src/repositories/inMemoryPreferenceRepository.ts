import type { Preference, PreferenceRepository } from "../services/matchingService";
import type { InsertOutcome } from "../services/matchStore";

function directedKey(actorId: string, targetId: string): string {
  return `${actorId}->${targetId}`;
}

export function createInMemoryPreferenceRepository(): PreferenceRepository {
  const byDirectedPair = new Map<string, Preference>();

  return {
    async insert(preference: Preference): Promise<InsertOutcome> {
      const key = directedKey(preference.actorId, preference.targetId);
      if (byDirectedPair.has(key)) return "conflict";
      byDirectedPair.set(key, preference);
      return "inserted";
    },

    async find(actorId: string, targetId: string): Promise<Preference | null> {
      return byDirectedPair.get(directedKey(actorId, targetId)) ?? null;
    }
  };
}
