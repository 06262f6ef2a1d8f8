/** Tag reported when the repository has no release yet, so the first one published is v1. */
export const BASELINE_VERSION = 'v0';

/**
 * Next release tag: "v4" -> "v5". Input is expected to be `v<int>`;
 * anything else is not checked.
 */
export function incrementVersion(version: string): string {
  const current = parseInt(version.slice(1), 10);
  return `v${current + 1}`;
}
