import type { StoredUser, UpdateOutcome, UserRepository } from "../services/authService";
import type { InsertOutcome } from "../services/matchStore";

export function createInMemoryUserRepository(): UserRepository {
  const byId = new Map<string, StoredUser>();
  const idByEmail = new Map<string, string>();

  return {
    async insert(user: StoredUser): Promise<InsertOutcome> {
      if (idByEmail.has(user.email) || byId.has(user.id)) return "conflict";
      byId.set(user.id, user);
      idByEmail.set(user.email, user.id);
      return "inserted";
    },

    async findByEmail(email: string): Promise<StoredUser | null> {
      const id = idByEmail.get(email);
      return id === undefined ? null : byId.get(id) ?? null;
    },

    async findById(userId: string): Promise<StoredUser | null> {
      return byId.get(userId) ?? null;
    },

    async update(user: StoredUser): Promise<UpdateOutcome> {
      const existing = byId.get(user.id);
      if (!existing) return "missing";
      // Email is immutable after registration.
      byId.set(user.id, { ...user, email: existing.email });
      return "updated";
    }
  };
}
