import { describe, expect, test } from "vitest";
import { GitHubApiClient } from "./client";
import { getUserProfile, toUserProfile, twitterUrl } from "./profile";
import {
  createFakeFetch,
  createRecordingLogger,
  encodeBase64,
  jsonResponse,
} from "./test-utils";

function setup(user: unknown, profileReadme?: string) {
  const fake = createFakeFetch((url) => {
    if (url.pathname === "/users/alice") {
      return user === undefined ? undefined : jsonResponse(user);
    }
    if (profileReadme !== undefined && url.pathname === "/repos/alice/alice/contents/README.md") {
      return jsonResponse({ content: encodeBase64(profileReadme) });
    }
    return undefined;
  });
  const logger = createRecordingLogger();
  const client = new GitHubApiClient({ logger, fetch: fake.fetch });
  return { client, fake, logger };
}

describe("twitterUrl", () => {
  test("builds a profile URL from a handle", () => {
    expect(twitterUrl("alice_dev")).toBe("https://twitter.com/alice_dev");
  });

  test("returns null without a handle", () => {
    expect(twitterUrl(null)).toBeNull();
    expect(twitterUrl("")).toBeNull();
    expect(twitterUrl(undefined)).toBeNull();
  });
});

describe("toUserProfile", () => {
  test("maps empty strings to null", () => {
    const profile = toUserProfile({ login: "alice", blog: "", email: null }, "alice", null);
    expect(profile.website).toBeNull();
    expect(profile.email).toBeNull();
  });
});

describe("getUserProfile", () => {
  test("maps the user record and profile README", async () => {
    const { client, logger } = setup(
      {
        login: "alice",
        name: "Alice Example",
        bio: "Builds tools",
        company: "Example Co",
        blog: "https://alice.example.com",
        twitter_username: "alice_dev",
        location: "Lisbon",
        email: "alice@example.com",
        avatar_url: "https://avatars.example.com/u/1",
        public_repos: 12,
        followers: 340,
        following: 7,
      },
      "Hi, I'm Alice"
    );

    expect(await getUserProfile(client, "alice", logger)).toEqual({
      name: "Alice Example",
      bio: "Builds tools",
      company: "Example Co",
      website: "https://alice.example.com",
      twitter: "https://twitter.com/alice_dev",
      location: "Lisbon",
      email: "alice@example.com",
      publicRepos: 12,
      followers: 340,
      following: 7,
      profileReadme: "Hi, I'm Alice",
      avatarUrl: "https://avatars.example.com/u/1",
      login: "alice",
    });
    expect(logger.lines).toContain("info: Found profile README for user: alice");
  });

  test("leaves absent social fields empty and falls back to the input login", async () => {
    const { client, logger } = setup({ name: "Alice Example", public_repos: 3 });

    const profile = await getUserProfile(client, "alice", logger);

    expect(profile).not.toBeNull();
    expect(profile?.website).toBeNull();
    expect(profile?.twitter).toBeNull();
    expect(profile?.email).toBeNull();
    expect(profile?.login).toBe("alice");
    expect(profile?.followers).toBe(0);
    expect(profile?.following).toBe(0);
    expect(profile?.profileReadme).toBeNull();
  });

  test("reads the profile README from the owner/owner repository", async () => {
    const { client, fake, logger } = setup({ login: "alice" });

    await getUserProfile(client, "alice", logger);

    expect(fake.calls.map((url) => url.pathname)).toEqual([
      "/users/alice",
      "/repos/alice/alice/contents/README.md",
      "/repos/alice/alice/contents/readme.md",
      "/repos/alice/alice/contents/README.rst",
      "/repos/alice/alice/contents/README.txt",
      "/repos/alice/alice/contents/README",
    ]);
  });

  test("returns null when the user record is unavailable", async () => {
    const { client, fake, logger } = setup(undefined);

    expect(await getUserProfile(client, "alice", logger)).toBeNull();
    expect(fake.calls).toHaveLength(1);
    expect(logger.lines).toContain("error: Failed to fetch user data for: alice");
  });
});
