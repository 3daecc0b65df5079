import { createInMemoryUserRepository } from "../backend/src/repositories/inMemoryUserRepository";
import type { StoredUser, UserRepository } from "../backend/src/services/authService";
import { createProfileService, createUserDirectory, isValidBirthDate } from "../backend/src/services/profileService";
import { createStorageGuard } from "../backend/src/services/storageGuard";

const CREATED = 1_000;

function seedUser(overrides: Partial<StoredUser> = {}): StoredUser {
  return {
    id: "u_a",
    email: "ada@example.com",
    name: "Ada",
    gender: null,
    birthDate: null,
    bio: "Likes long walks.",
    avatarUrl: null,
    passwordSaltB64: "c2FsdA==",
    passwordHashB64: "aGFzaA==",
    createdAtMs: CREATED,
    updatedAtMs: CREATED,
    ...overrides
  };
}

async function createHarness() {
  const users = createInMemoryUserRepository();
  await users.insert(seedUser());
  const svc = createProfileService({
    users,
    nowMs: () => 5_000,
    storage: createStorageGuard({ timeoutMs: 1_000, onFailure: () => undefined })
  });
  return { svc, users };
}

describe("profileService", () => {
  it("Given a registered user When getProfile is called Then the public profile is returned without password fields", async () => {
    const { svc } = await createHarness();

    const result = await svc.getProfile("u_a");

    expect(result).toEqual({
      ok: true,
      value: {
        id: "u_a",
        email: "ada@example.com",
        name: "Ada",
        bio: "Likes long walks.",
        createdAtMs: CREATED,
        updatedAtMs: CREATED
      }
    });
  });

  it("Given a partial update When updateProfile is called Then only the named fields change", async () => {
    const { svc, users } = await createHarness();

    const result = await svc.updateProfile("u_a", {
      gender: " female ",
      birthDate: "1990-12-10",
      avatarUrl: "https://cdn.example.com/a.png"
    });

    expect(result).toEqual({
      ok: true,
      value: {
        id: "u_a",
        email: "ada@example.com",
        name: "Ada",
        gender: "female",
        birthDate: "1990-12-10",
        bio: "Likes long walks.",
        avatarUrl: "https://cdn.example.com/a.png",
        createdAtMs: CREATED,
        updatedAtMs: 5_000
      }
    });
    const stored = await users.findById("u_a");
    expect(stored?.gender).toBe("female");
  });

  it("Given a null bio When updateProfile is called Then the bio is cleared", async () => {
    const { svc } = await createHarness();

    const result = await svc.updateProfile("u_a", { bio: null, name: "Ada L." });

    expect(result.ok).toBe(true);
    if (!result.ok) throw new Error("unreachable");
    expect(result.value.bio).toBeUndefined();
    expect(result.value.name).toBe("Ada L.");
  });

  it("Given invalid fields When updateProfile is called Then it fails with INVALID_INPUT and nothing changes", async () => {
    const { svc, users } = await createHarness();

    const badDate = await svc.updateProfile("u_a", { birthDate: "2023-02-29" });
    const badUrl = await svc.updateProfile("u_a", { avatarUrl: "ftp://example.com/a.png" });
    const blankName = await svc.updateProfile("u_a", { name: "  " });
    const numericBio = await svc.updateProfile("u_a", { bio: 42 });

    expect(badDate).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "birthDate must be a valid date formatted as YYYY-MM-DD." }
    });
    expect(!badUrl.ok && badUrl.error.message).toBe("avatarUrl must be an http(s) URL.");
    expect(!blankName.ok && blankName.error.message).toBe("Name is required.");
    expect(!numericBio.ok && numericBio.error.message).toBe("bio must be a string.");
    expect((await users.findById("u_a"))?.updatedAtMs).toBe(CREATED);
  });

  it("Given an unknown user When the profile is read or updated Then it fails with USER_NOT_FOUND", async () => {
    const { svc } = await createHarness();

    const notFound = { ok: false, error: { code: "USER_NOT_FOUND", message: "User not found." } };
    expect(await svc.getProfile("u_missing")).toEqual(notFound);
    expect(await svc.updateProfile("u_missing", { name: "X" })).toEqual(notFound);
  });

  it("Given the user row disappears before the save When updateProfile is called Then it fails with USER_NOT_FOUND", async () => {
    const inner = createInMemoryUserRepository();
    await inner.insert(seedUser());
    const users: UserRepository = {
      ...inner,
      async update() {
        return "missing" as const;
      }
    };
    const svc = createProfileService({
      users,
      nowMs: () => 5_000,
      storage: createStorageGuard({ timeoutMs: 1_000, onFailure: () => undefined })
    });

    const result = await svc.updateProfile("u_a", { name: "Ada L." });

    expect(result).toEqual({ ok: false, error: { code: "USER_NOT_FOUND", message: "User not found." } });
  });

  it("Given calendar dates When isValidBirthDate is called Then only real dates in YYYY-MM-DD pass", () => {
    expect(isValidBirthDate("2000-02-29")).toBe(true);
    expect(isValidBirthDate("1900-02-29")).toBe(false);
    expect(isValidBirthDate("2000-13-01")).toBe(false);
    expect(isValidBirthDate("2000-1-01")).toBe(false);
  });

  it("Given a user directory When a counterpart is looked up Then only public match fields are returned", async () => {
    const { users } = await createHarness();
    const directory = createUserDirectory(users);

    expect(await directory.getMatchedUser("u_a")).toEqual({ id: "u_a", name: "Ada", bio: "Likes long walks." });
    expect(await directory.getMatchedUser("u_missing")).toBeNull();
  });
});
