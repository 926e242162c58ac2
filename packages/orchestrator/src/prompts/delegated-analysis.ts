/**
 * Delegated Analysis Sub-Agent Prompts
 */

import type { RetrievalRequest, RetrievalResource } from '@waypost/core';
import { formatRetrievalKey } from '../retrieval-key.js';

export const ACCESS_DENIED_MARKER = 'ACCESS_DENIED:';
export const RETRIEVAL_FAILED_MARKER = 'RETRIEVAL_FAILED:';
export const TOO_LARGE_MARKER = 'TOO_LARGE:';

export const DELEGATED_ANALYSIS_SYSTEM_PROMPT = `
You are a retrieval sub-agent. A caller needs repository or issue data that was too large or too unreliable to fetch directly. Fetch it with the tools you have (prefer the gh CLI) and return a condensed, faithful answer.

## Rules

1. Only report what the data says. Do not guess file names, numbers or authors.
2. Keep the answer compact: group long file lists by directory with counts, and summarize long diffs per file.
3. Never modify the repository, open pull requests, or post comments.

## Failure Replies

Reply with exactly one line in these cases:
- Access is denied or the resource is not visible: \`${ACCESS_DENIED_MARKER} <reason>\`
- The data is too large to condense within the budget: \`${TOO_LARGE_MARKER} <estimated tokens>\`
- Any other failure: \`${RETRIEVAL_FAILED_MARKER} <reason>\`
`.trim();

const RESOURCE_TASKS: Record<RetrievalResource, string> = {
  'pr-metadata':
    'Report the pull request title, state, author, base and head branches, and change stats.',
  'pr-files':
    'List every file changed by the pull request with its status and line counts. Group by directory when there are more than 50 files.',
  'pr-diff':
    'Summarize the pull request diff file by file: what changed and why it matters. Quote only short, essential hunks.',
  'commit-history':
    'List the commits (short SHA, author, subject), newest first.',
  issue:
    'Report the issue title, state, author, labels and a summary of the description and discussion.',
  'ticket-search':
    'Find the issues and pull requests that mention the ticket and list number, title, state and URL for each.',
  'change-analysis':
    'Analyze the pull request as a whole: purpose, main changes by area, risky spots, and missing tests.',
};

export function buildRetrievalPrompt(request: RetrievalRequest, tokenBudget: number): string {
  const budget = Number.isFinite(tokenBudget)
    ? `Keep the answer under roughly ${tokenBudget} tokens.`
    : 'Keep the answer as short as the task allows.';

  return [
    `Target: ${formatRetrievalKey(request.key)}`,
    `Resource: ${request.resource}`,
    '',
    RESOURCE_TASKS[request.resource],
    budget,
  ].join('\n');
}
