import type { Decision, Preference, PreferenceRepository } from "../services/matchingService";
import type { InsertOutcome } from "../services/matchStore";
import { asNumber, asString, isUniqueViolation, type SqlClient } from "./postgresCore";

function asDecision(value: unknown): Decision {
  if (value === "like" || value === "pass") return value;
  throw new Error(`Unexpected decision value ${String(value)}.`);
}

function toPreference(row: Record<string, unknown>): Preference {
  return {
    preferenceId: asString(row.preference_id),
    actorId: asString(row.actor_id),
    targetId: asString(row.target_id),
    decision: asDecision(row.decision),
    createdAtMs: asNumber(row.created_at_ms),
    updatedAtMs: asNumber(row.updated_at_ms)
  };
}

export function createPostgresPreferenceRepository(client: SqlClient): PreferenceRepository {
  return {
    async insert(preference: Preference): Promise<InsertOutcome> {
      try {
        await client.query(
          `INSERT INTO preferences (preference_id, actor_id, target_id, decision, created_at_ms, updated_at_ms)
           VALUES ($1, $2, $3, $4, $5, $6)`,
          [
            preference.preferenceId,
            preference.actorId,
            preference.targetId,
            preference.decision,
            preference.createdAtMs,
            preference.updatedAtMs
          ]
        );
        return "inserted";
      } catch (e: unknown) {
        if (isUniqueViolation(e, "preferences_actor_target_key")) return "conflict";
        throw e;
      }
    },

    async find(actorId: string, targetId: string): Promise<Preference | null> {
      const res = await client.query(
        `SELECT preference_id, actor_id, target_id, decision, created_at_ms, updated_at_ms
         FROM preferences
         WHERE actor_id = $1 AND target_id = $2`,
        [actorId, targetId]
      );
      const row = res.rows[0];
      return row ? toPreference(row) : null;
    }
  };
}
