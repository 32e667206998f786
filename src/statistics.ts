import type { LanguageBytes, Repository, ScrapingStatistics } from "./Types";

/**
 * Aggregate repository totals and the language histogram in one pass.
 * Languages keep the order in which they were first seen.
 */
export function calculateStatistics(repositories: Repository[]): ScrapingStatistics {
  const languageMap = new Map<string, number>();
  let totalStars = 0;
  let totalForks = 0;
  let repositoriesWithReadme = 0;

  for (const repo of repositories) {
    totalStars += repo.stars;
    totalForks += repo.forks;
    if (repo.readmeContent) repositoriesWithReadme++;

    for (const [language, bytes] of Object.entries(repo.languages)) {
      languageMap.set(language, (languageMap.get(language) ?? 0) + bytes);
    }
  }

  const languageDistribution: LanguageBytes = Object.fromEntries(languageMap);

  return {
    totalRepositories: repositories.length,
    repositoriesWithReadme,
    totalStars,
    totalForks,
    uniqueLanguages: Array.from(languageMap.keys()),
    languageDistribution,
  };
}

/**
 * Languages ordered by total bytes, largest first
 */
export function topLanguages(statistics: ScrapingStatistics, limit = 5): string[] {
  return Object.entries(statistics.languageDistribution)
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([language]) => language);
}

export function totalCodeBytes(statistics: ScrapingStatistics): number {
  return Object.values(statistics.languageDistribution).reduce((sum, bytes) => sum + bytes, 0);
}

const BYTE_UNITS = ["KB", "MB", "GB", "TB"];

/**
 * Bytes in binary units with one decimal, e.g. `2.0 KB`; under 1 KiB stays whole
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;

  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

const COUNT_SUFFIXES: ReadonlyArray<readonly [number, string]> = [
  [1_000_000_000, "B"],
  [1_000_000, "M"],
  [1_000, "K"],
];

/**
 * Counts such as followers: `42`, `2.5K`, `12.3M`
 */
export function formatNumber(num: number): string {
  for (const [size, suffix] of COUNT_SUFFIXES) {
    if (num >= size) return `${(num / size).toFixed(1)}${suffix}`;
  }
  return num.toString();
}
