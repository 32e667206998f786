import { z } from "zod";
import type { GitHubApiClient } from "./client";
import type { Logger } from "./logger";
import { getReadmeContent } from "./readme";
import type { UserProfile } from "./Types";

const optionalText = z.string().nullable().optional();
const counter = z.number().int().nonnegative().nullable().optional();

export const GitHubUserSchema = z.object({
  login: z.string().min(1).optional(),
  name: optionalText,
  bio: optionalText,
  company: optionalText,
  blog: optionalText,
  twitter_username: optionalText,
  location: optionalText,
  email: optionalText,
  avatar_url: optionalText,
  public_repos: counter,
  followers: counter,
  following: counter,
});

export type GitHubUser = z.infer<typeof GitHubUserSchema>;

/** GitHub reports missing profile fields as null or "" */
function textOrNull(value: string | null | undefined): string | null {
  return value ? value : null;
}

export function twitterUrl(handle: string | null | undefined): string | null {
  return handle ? `https://twitter.com/${handle}` : null;
}

/**
 * Map a `/users/{username}` payload onto a UserProfile
 */
export function toUserProfile(
  user: GitHubUser,
  username: string,
  profileReadme: string | null
): UserProfile {
  return {
    name: textOrNull(user.name),
    bio: textOrNull(user.bio),
    company: textOrNull(user.company),
    website: textOrNull(user.blog),
    twitter: twitterUrl(user.twitter_username),
    location: textOrNull(user.location),
    email: textOrNull(user.email),
    publicRepos: user.public_repos ?? 0,
    followers: user.followers ?? 0,
    following: user.following ?? 0,
    profileReadme,
    avatarUrl: textOrNull(user.avatar_url),
    login: user.login ?? username,
  };
}

/**
 * Get the profile README from the special username/username repository
 */
export async function getProfileReadme(
  client: GitHubApiClient,
  username: string,
  logger: Logger
): Promise<string | null> {
  const readme = await getReadmeContent(client, username, username, logger);
  if (readme) {
    logger.info(`Found profile README for user: ${username}`);
  }
  return readme;
}

/**
 * Fetch the user record and profile README. Returns null when the user record is unavailable.
 */
export async function getUserProfile(
  client: GitHubApiClient,
  username: string,
  logger: Logger
): Promise<UserProfile | null> {
  logger.info(`Fetching profile information for user: ${username}`);

  const data = await client.request("/users/{username}", { username });
  const parsed = GitHubUserSchema.safeParse(data);
  if (!parsed.success) {
    logger.error(`Failed to fetch user data for: ${username}`);
    return null;
  }

  const profileReadme = await getProfileReadme(client, username, logger);
  const profile = toUserProfile(parsed.data, username, profileReadme);

  logger.info(`Successfully fetched profile for: ${username}`);
  return profile;
}
