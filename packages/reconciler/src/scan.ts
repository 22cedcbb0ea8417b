/**
 * Scan — collect WP-linked commits from target repository scans.
 *
 * A branch belongs to the feature when its name contains the feature slug;
 * a commit does when its message does. WP IDs are read from branch names
 * and commit messages with WP_PATTERN.
 */

import type { RepoScan, ScanFindings, WpCommit } from "./types.js";

/** WP IDs are "WP" followed by exactly two digits, as a whole word. */
export const WP_PATTERN = /\bWP(\d{2})\b/g;

const REMOTE_PREFIX = "remotes/origin/";

/** Unique WP IDs mentioned in `text`, in order of first mention. */
export function extractWpIds(text: string): string[] {
  const ids = new Set<string>();
  for (const match of text.matchAll(WP_PATTERN)) {
    ids.add(`WP${match[1] ?? ""}`);
  }
  return [...ids];
}

function displayBranch(name: string): string {
  return name.startsWith(REMOTE_PREFIX) ? name.slice(REMOTE_PREFIX.length) : name;
}

export function scanRepos(feature: string, scans: readonly RepoScan[]): ScanFindings {
  const commits = new Map<string, WpCommit[]>();
  const merged = new Set<string>();
  const errors: string[] = [];
  let reposScanned = 0;

  const add = (wp: string, commit: WpCommit): void => {
    let list = commits.get(wp);
    if (list === undefined) {
      list = [];
      commits.set(wp, list);
    }
    if (!list.some((c) => c.sha === commit.sha)) {
      list.push(commit);
    }
  };

  for (const scan of scans) {
    if (scan.error !== undefined) {
      errors.push(`${scan.repo}: ${scan.error}`);
      continue;
    }
    reposScanned += 1;

    for (const branch of scan.branches) {
      if (!branch.name.includes(feature)) continue;
      for (const wp of extractWpIds(branch.name)) {
        add(wp, { ...branch.head, repo: scan.repo, branch: displayBranch(branch.name) });
        if (branch.merged) merged.add(wp);
      }
    }

    for (const commit of scan.commits) {
      if (!commit.message.includes(feature)) continue;
      for (const wp of extractWpIds(commit.message)) {
        add(wp, { ...commit, repo: scan.repo });
      }
    }
  }

  return { commits, merged, reposScanned, errors };
}
