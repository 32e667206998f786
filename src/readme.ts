import { z } from "zod";
import type { GitHubApiClient } from "./client";
import type { Logger } from "./logger";

/** Tried in order; the first one with content wins. */
export const README_CANDIDATES = [
  "README.md",
  "readme.md",
  "README.rst",
  "README.txt",
  "README",
] as const;

const ContentsSchema = z.object({
  content: z.string().optional(),
});

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode a base64 contents payload as UTF-8. GitHub wraps it at 60 columns.
 */
export function decodeContent(content: string): string {
  const compact = content.replace(/\s+/g, "");
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new Error("content is not valid base64");
  }
  return utf8.decode(Buffer.from(compact, "base64"));
}

/**
 * Get README content from a repository, or null when it has none
 */
export async function getReadmeContent(
  client: GitHubApiClient,
  owner: string,
  repo: string,
  logger: Logger
): Promise<string | null> {
  for (const candidate of README_CANDIDATES) {
    const data = await client.request("/repos/{owner}/{repo}/contents/{path}", {
      owner,
      repo,
      path: candidate,
    });

    const parsed = ContentsSchema.safeParse(data);
    if (!parsed.success || !parsed.data.content) continue;

    try {
      const content = decodeContent(parsed.data.content);
      logger.info(`Found README: ${candidate} in ${repo} (${content.length} characters)`);
      return content;
    } catch (error) {
      logger.error(
        `Failed to decode README content for ${repo}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  logger.debug(`No README found for repository: ${repo}`);
  return null;
}
