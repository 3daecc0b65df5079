import type { InsertOutcome, Match, MatchRepository } from "../services/matchStore";
import { asNumber, asString, isUniqueViolation, type SqlClient } from "./postgresCore";

const MATCH_COLUMNS = "match_id, identity_low, identity_high, created_at_ms, updated_at_ms";

function toMatch(row: Record<string, unknown>): Match {
  return {
    matchId: asString(row.match_id),
    identityLow: asString(row.identity_low),
    identityHigh: asString(row.identity_high),
    createdAtMs: asNumber(row.created_at_ms),
    updatedAtMs: asNumber(row.updated_at_ms)
  };
}

export function createPostgresMatchRepository(client: SqlClient): MatchRepository {
  return {
    async insert(match: Match): Promise<InsertOutcome> {
      try {
        await client.query(
          `INSERT INTO matches (${MATCH_COLUMNS}) VALUES ($1, $2, $3, $4, $5)`,
          [match.matchId, match.identityLow, match.identityHigh, match.createdAtMs, match.updatedAtMs]
        );
        return "inserted";
      } catch (e: unknown) {
        if (isUniqueViolation(e, "matches_pair_key")) return "conflict";
        throw e;
      }
    },

    async findByPair(identityLow: string, identityHigh: string): Promise<Match | null> {
      const res = await client.query(
        `SELECT ${MATCH_COLUMNS}
         FROM matches
         WHERE identity_low = $1 AND identity_high = $2`,
        [identityLow, identityHigh]
      );
      const row = res.rows[0];
      return row ? toMatch(row) : null;
    },

    async findById(matchId: string): Promise<Match | null> {
      const res = await client.query(`SELECT ${MATCH_COLUMNS} FROM matches WHERE match_id = $1`, [matchId]);
      const row = res.rows[0];
      return row ? toMatch(row) : null;
    },

    async listForIdentity(identity: string): Promise<ReadonlyArray<Match>> {
      const res = await client.query(
        `SELECT ${MATCH_COLUMNS}
         FROM matches
         WHERE identity_low = $1 OR identity_high = $1
         ORDER BY created_at_ms DESC, match_id DESC`,
        [identity]
      );
      return res.rows.map(toMatch);
    }
  };
}
