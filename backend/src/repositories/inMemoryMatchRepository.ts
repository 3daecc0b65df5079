import type { InsertOutcome, Match, MatchRepository } from "../services/matchStore";
import { pairKey } from "../services/pairCanonicalizer";

function newestFirst(a: Match, b: Match): number {
  if (a.createdAtMs !== b.createdAtMs) return b.createdAtMs - a.createdAtMs;
  if (a.matchId === b.matchId) return 0;
  return a.matchId < b.matchId ? 1 : -1;
}

export function createInMemoryMatchRepository(): MatchRepository {
  const byPair = new Map<string, Match>();
  const byId = new Map<string, Match>();

  return {
    async insert(match: Match): Promise<InsertOutcome> {
      // Check and set happen in one turn of the event loop.
      const key = pairKey(match);
      if (byPair.has(key)) return "conflict";
      byPair.set(key, match);
      byId.set(match.matchId, match);
      return "inserted";
    },

    async findByPair(identityLow: string, identityHigh: string): Promise<Match | null> {
      return byPair.get(pairKey({ identityLow, identityHigh })) ?? null;
    },

    async findById(matchId: string): Promise<Match | null> {
      return byId.get(matchId) ?? null;
    },

    async listForIdentity(identity: string): Promise<ReadonlyArray<Match>> {
      return Array.from(byPair.values())
        .filter((m) => m.identityLow === identity || m.identityHigh === identity)
        .sort(newestFirst);
    }
  };
}
