import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { makeUser } from "../helpers/fixtures";

const storage = vi.hoisted(() => ({
  findUserByEmail: vi.fn(),
  createUser: vi.fn(),
  updateUser: vi.fn(),
}));

vi.mock("../../server/storage", () => storage);

import { resetConfig } from "../../server/config";
import { authorizeUrl, findOrCreateOAuthUser, pickGithubEmail } from "../../server/oauth";

beforeEach(() => {
  vi.resetAllMocks();
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("pickGithubEmail", () => {
  it("takes the primary verified address", () => {
    expect(
      pickGithubEmail([
        { email: "old@example.com", primary: false, verified: true },
        { email: "ada@example.com", primary: true, verified: true },
      ]),
    ).toBe("ada@example.com");
  });

  it("ignores an unverified primary", () => {
    expect(pickGithubEmail([{ email: "ada@example.com", primary: true, verified: false }])).toBeNull();
    expect(pickGithubEmail([])).toBeNull();
  });
});

describe("authorizeUrl", () => {
  it("needs the provider configured", () => {
    expect(() => authorizeUrl("google", "state-1")).toThrow("Google login is not configured");
  });

  it("asks GitHub for the email scope", () => {
    vi.stubEnv("GITHUB_CLIENT_ID", "test-client");
    vi.stubEnv("GITHUB_CLIENT_SECRET", "test-secret");
    vi.stubEnv("GITHUB_REDIRECT_URI", "http://localhost:8080/api/auth/github/callback");
    resetConfig();

    const url = new URL(authorizeUrl("github", "state-1"));
    expect(url.origin + url.pathname).toBe("https://github.com/login/oauth/authorize");
    expect(url.searchParams.get("client_id")).toBe("test-client");
    expect(url.searchParams.get("redirect_uri")).toBe("http://localhost:8080/api/auth/github/callback");
    expect(url.searchParams.get("scope")).toBe("read:user user:email");
    expect(url.searchParams.get("state")).toBe("state-1");
  });
});

describe("findOrCreateOAuthUser", () => {
  const profile = { email: "ada@example.com", name: "Ada L", avatarUrl: "https://img.example.com/ada.png" };

  it("creates a passwordless account for a new email", async () => {
    const created = makeUser({ authProvider: "github", name: "Ada L" });
    storage.findUserByEmail.mockResolvedValueOnce(null);
    storage.createUser.mockResolvedValueOnce(created);

    expect(await findOrCreateOAuthUser("github", profile)).toBe(created);
    expect(storage.createUser).toHaveBeenCalledWith({
      email: "ada@example.com",
      passwordHash: null,
      name: "Ada L",
      avatarUrl: "https://img.example.com/ada.png",
      authProvider: "github",
    });
  });

  it("links an existing account and fills only what it lacks", async () => {
    const updated = makeUser({ avatarUrl: "https://img.example.com/ada.png" });
    storage.findUserByEmail.mockResolvedValueOnce(makeUser());
    storage.updateUser.mockResolvedValueOnce(updated);

    expect(await findOrCreateOAuthUser("google", profile)).toBe(updated);
    expect(storage.updateUser).toHaveBeenCalledWith("user-1", { avatarUrl: "https://img.example.com/ada.png" });
    expect(storage.createUser).not.toHaveBeenCalled();
  });

  it("leaves a complete account untouched", async () => {
    const existing = makeUser({ avatarUrl: "https://img.example.com/mine.png" });
    storage.findUserByEmail.mockResolvedValueOnce(existing);

    expect(await findOrCreateOAuthUser("google", profile)).toBe(existing);
    expect(storage.updateUser).not.toHaveBeenCalled();
  });
});
