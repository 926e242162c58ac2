/**
 * GitHub Client Factory
 *
 * Creates authenticated Octokit instances from a personal token or GitHub App
 * installation credentials.
 */

import { Octokit } from '@octokit/rest';
import { createAppAuth } from '@octokit/auth-app';
import { readFileSync } from 'fs';
import { createLogger } from '@waypost/core';

const logger = createLogger('github-client');

export type GitHubCredentials =
  | { type: 'token'; token: string }
  | { type: 'app'; appId: string; privateKey: string; installationId: number };

export class MissingCredentialsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MissingCredentialsError';
  }
}

/**
 * Read credentials from the environment. A token wins over app credentials.
 */
export function resolveCredentials(env: NodeJS.ProcessEnv = process.env): GitHubCredentials {
  const token = env.GITHUB_TOKEN || env.GH_TOKEN;
  if (token) {
    return { type: 'token', token };
  }

  const appId = env.GITHUB_APP_ID;
  const privateKeyPath = env.GITHUB_PRIVATE_KEY_PATH;
  const privateKey = privateKeyPath
    ? readFileSync(privateKeyPath, 'utf-8')
    : env.GITHUB_PRIVATE_KEY;
  const installationId = Number.parseInt(env.GITHUB_INSTALLATION_ID ?? '', 10);

  if (!appId || !privateKey) {
    throw new MissingCredentialsError(
      'GitHub credentials not configured: set GITHUB_TOKEN, or GITHUB_APP_ID with GITHUB_PRIVATE_KEY'
    );
  }

  if (!Number.isInteger(installationId)) {
    throw new MissingCredentialsError('GITHUB_INSTALLATION_ID must be set for GitHub App auth');
  }

  return { type: 'app', appId, privateKey, installationId };
}

export function createGitHubClient(credentials: GitHubCredentials): Octokit {
  if (credentials.type === 'token') {
    logger.debug('Creating GitHub client with token auth');
    return new Octokit({ auth: credentials.token });
  }

  logger.debug({ installationId: credentials.installationId }, 'Creating GitHub client');

  return new Octokit({
    authStrategy: createAppAuth,
    auth: {
      appId: credentials.appId,
      privateKey: credentials.privateKey,
      installationId: credentials.installationId,
    },
  });
}
