/**
 * GitHub REST API surface used by the structured API probe
 */

import type { Octokit } from '@octokit/rest';

export interface PullSummary {
  number: number;
  title: string;
  state: string;
  draft: boolean;
  merged: boolean;
  author: string | null;
  baseRef: string;
  headRef: string;
  body: string | null;
  changedFiles: number;
  additions: number;
  deletions: number;
  commits: number;
  url: string;
}

export interface PullFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  changes: number;
  patch?: string;
}

export interface CommitSummary {
  sha: string;
  message: string;
  author: string | null;
  date: string | null;
}

export interface IssueSummary {
  number: number;
  title: string;
  state: string;
  body: string | null;
  author: string | null;
  labels: string[];
  url: string;
  isPullRequest: boolean;
}

export interface RepoCoordinates {
  owner: string;
  repo: string;
}

export interface ListCommitsOptions {
  ref?: string;
  pullNumber?: number;
  /** Stop reading pages once at least this many commits are collected */
  limit?: number;
}

export interface GitHubApi {
  getPull(repo: RepoCoordinates, number: number, signal?: AbortSignal): Promise<PullSummary>;
  listPullFiles(repo: RepoCoordinates, number: number, signal?: AbortSignal): Promise<PullFile[]>;
  getPullDiff(repo: RepoCoordinates, number: number, signal?: AbortSignal): Promise<string>;
  listCommits(
    repo: RepoCoordinates,
    options: ListCommitsOptions,
    signal?: AbortSignal
  ): Promise<CommitSummary[]>;
  getIssue(repo: RepoCoordinates, number: number, signal?: AbortSignal): Promise<IssueSummary>;
  searchIssues(repo: RepoCoordinates, text: string, signal?: AbortSignal): Promise<IssueSummary[]>;
}

const PAGE_SIZE = 100;

interface RawIssue {
  number: number;
  title: string;
  state: string;
  body?: string | null;
  user: { login: string } | null;
  labels: Array<string | { name?: string }>;
  html_url: string;
  pull_request?: unknown;
}

function toIssueSummary(issue: RawIssue): IssueSummary {
  return {
    number: issue.number,
    title: issue.title,
    state: issue.state,
    body: issue.body ?? null,
    author: issue.user?.login ?? null,
    labels: issue.labels
      .map((label) => (typeof label === 'string' ? label : label.name ?? ''))
      .filter((label) => label !== ''),
    url: issue.html_url,
    isPullRequest: issue.pull_request !== undefined && issue.pull_request !== null,
  };
}

function toCommitSummary(commit: {
  sha: string;
  commit: { message: string; author: { name?: string; date?: string } | null };
  // Octokit types a commit without a linked account as an empty object
  author: { login?: string } | null;
}): CommitSummary {
  return {
    sha: commit.sha,
    message: commit.commit.message,
    author: commit.author?.login ?? commit.commit.author?.name ?? null,
    date: commit.commit.author?.date ?? null,
  };
}

/**
 * GitHubApi backed by an authenticated Octokit client
 */
export function createOctokitApi(octokit: Octokit): GitHubApi {
  return {
    async getPull({ owner, repo }, number, signal) {
      const { data } = await octokit.pulls.get({
        owner,
        repo,
        pull_number: number,
        request: { signal },
      });

      return {
        number: data.number,
        title: data.title,
        state: data.state,
        draft: data.draft ?? false,
        merged: data.merged,
        author: data.user?.login ?? null,
        baseRef: data.base.ref,
        headRef: data.head.ref,
        body: data.body,
        changedFiles: data.changed_files,
        additions: data.additions,
        deletions: data.deletions,
        commits: data.commits,
        url: data.html_url,
      };
    },

    async listPullFiles({ owner, repo }, number, signal) {
      const files = await octokit.paginate(octokit.pulls.listFiles, {
        owner,
        repo,
        pull_number: number,
        per_page: PAGE_SIZE,
        request: { signal },
      });

      return files.map((file) => ({
        filename: file.filename,
        status: file.status,
        additions: file.additions,
        deletions: file.deletions,
        changes: file.changes,
        patch: file.patch,
      }));
    },

    async getPullDiff({ owner, repo }, number, signal) {
      const response = await octokit.pulls.get({
        owner,
        repo,
        pull_number: number,
        mediaType: { format: 'diff' },
        request: { signal },
      });

      // The diff media type returns the raw diff text in place of the JSON body
      const diff: unknown = response.data;
      if (typeof diff !== 'string') {
        throw new Error(`Expected diff text for ${owner}/${repo}#${number}`);
      }
      return diff;
    },

    async listCommits({ owner, repo }, options, signal) {
      if (options.pullNumber !== undefined) {
        const commits = await octokit.paginate(octokit.pulls.listCommits, {
          owner,
          repo,
          pull_number: options.pullNumber,
          per_page: PAGE_SIZE,
          request: { signal },
        });
        return commits.map(toCommitSummary);
      }

      const commits: CommitSummary[] = [];
      const pages = octokit.paginate.iterator(octokit.repos.listCommits, {
        owner,
        repo,
        sha: options.ref,
        per_page: PAGE_SIZE,
        request: { signal },
      });
      for await (const { data } of pages) {
        commits.push(...data.map(toCommitSummary));
        if (options.limit !== undefined && commits.length >= options.limit) break;
      }
      return commits;
    },

    async getIssue({ owner, repo }, number, signal) {
      const { data } = await octokit.issues.get({
        owner,
        repo,
        issue_number: number,
        request: { signal },
      });
      return toIssueSummary(data);
    },

    async searchIssues({ owner, repo }, text, signal) {
      const { data } = await octokit.search.issuesAndPullRequests({
        q: `"${text}" repo:${owner}/${repo}`,
        per_page: 50,
        request: { signal },
      });
      return data.items.map(toIssueSummary);
    },
  };
}
