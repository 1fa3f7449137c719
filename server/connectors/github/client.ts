/**
 * GitHub REST API Client
 *
 * Stateless apart from the cached login of the authenticated user.
 * Token passed to constructor; every method returns plain objects.
 * Reads are retried on 5xx; writes are never retried.
 */

import { withRetry } from '../../utils/retry.js';
import { createLogger } from '../../utils/logger.js';
import {
  isJsonObject,
  parseBranch,
  parseRateLimit,
  parseRepository,
  type CreateRepositoryInput,
  type CreatedBranch,
  type GitHubBranch,
  type GitHubRepository,
  type RateLimitStatus,
} from './types.js';

const logger = createLogger('GitHub');

// ============================================================================
// Error Classes
// ============================================================================

export class GitHubApiError extends Error {
  constructor(
    public status: number,
    message: string
  ) {
    super(message);
    this.name = 'GitHubApiError';
  }
}

export class GitHubRateLimitError extends GitHubApiError {
  constructor(status: number, public resetAt: string | null) {
    super(status, 'GitHub rate limit exceeded');
    this.name = 'GitHubRateLimitError';
  }
}

// ============================================================================
// GitHub Client
// ============================================================================

export interface GitHubClientConfig {
  token: string;
  apiUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  retryBaseDelayMs?: number;
}

export class GitHubClient {
  private token: string;
  private apiUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;
  private retryBaseDelayMs: number;
  private login: string | null = null;

  constructor(config: GitHubClientConfig) {
    this.token = config.token;
    this.apiUrl = (config.apiUrl ?? 'https://api.github.com').replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 15_000;
    this.fetchImpl = config.fetch ?? fetch;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 1000;
  }

  // ==========================================================================
  // Request plumbing
  // ==========================================================================

  private async request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<unknown> {
    const response = await this.fetchImpl(`${this.apiUrl}${path}`, {
      method,
      headers: {
        'Accept': 'application/vnd.github+json',
        'Authorization': `Bearer ${this.token}`,
        'X-GitHub-Api-Version': '2022-11-28',
        ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
      },
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const remaining = response.headers.get('x-ratelimit-remaining');
      if ((response.status === 403 || response.status === 429) && remaining === '0') {
        const reset = response.headers.get('x-ratelimit-reset');
        throw new GitHubRateLimitError(
          response.status,
          reset ? new Date(Number(reset) * 1000).toISOString() : null
        );
      }

      const text = await response.text();
      throw new GitHubApiError(response.status, `GitHub API error: ${extractMessage(text)}`);
    }

    if (response.status === 204) return null;
    return response.json();
  }

  private get(path: string): Promise<unknown> {
    return withRetry(() => this.request('GET', path), {
      maxRetries: 2,
      baseDelay: this.retryBaseDelayMs,
      shouldRetry: (err) => err instanceof GitHubApiError && err.status >= 500,
      onRetry: (attempt, err, delayMs) => {
        logger.warn('Retrying GitHub read', { path, attempt, delayMs, error: err.message });
      },
    });
  }

  // ==========================================================================
  // Account
  // ==========================================================================

  async getRateLimit(): Promise<RateLimitStatus> {
    return parseRateLimit(await this.get('/rate_limit'));
  }

  async getLogin(): Promise<string> {
    if (this.login) return this.login;
    const user = await this.get('/user');
    if (!isJsonObject(user) || typeof user.login !== 'string') {
      throw new Error('Unexpected user payload from GitHub');
    }
    this.login = user.login;
    return user.login;
  }

  // ==========================================================================
  // Repositories
  // ==========================================================================

  async createRepository(input: CreateRepositoryInput): Promise<GitHubRepository> {
    const autoInit = input.autoInit ?? true;
    const created = await this.request('POST', '/user/repos', {
      name: input.name,
      description: input.description ?? '',
      private: input.private ?? false,
      auto_init: autoInit,
      ...(autoInit && input.gitignoreTemplate ? { gitignore_template: input.gitignoreTemplate } : {}),
    });
    return parseRepository(created);
  }

  async listRepositories(options: { limit?: number; type?: 'all' | 'owner' | 'member' } = {}): Promise<GitHubRepository[]> {
    const limit = Math.min(Math.max(options.limit ?? 20, 1), 100);
    const params = new URLSearchParams({
      type: options.type ?? 'all',
      sort: 'updated',
      per_page: String(limit),
    });
    const repos = await this.get(`/user/repos?${params.toString()}`);
    if (!Array.isArray(repos)) {
      throw new Error('Unexpected repository list payload from GitHub');
    }
    return repos.slice(0, limit).map(parseRepository);
  }

  // ==========================================================================
  // Branches
  // ==========================================================================

  async listBranches(repoName: string): Promise<GitHubBranch[]> {
    const owner = await this.getLogin();
    const branches = await this.get(`/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repoName)}/branches`);
    if (!Array.isArray(branches)) {
      throw new Error('Unexpected branch list payload from GitHub');
    }
    return branches.map(parseBranch);
  }

  async createBranch(repoName: string, branchName: string, sourceBranch = 'main'): Promise<CreatedBranch> {
    const owner = await this.getLogin();
    const repoPath = `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repoName)}`;

    const sourceRef = await this.get(`${repoPath}/git/ref/heads/${encodeURIComponent(sourceBranch)}`);
    const sourceObject = isJsonObject(sourceRef) ? sourceRef.object : undefined;
    const sha = isJsonObject(sourceObject) ? sourceObject.sha : undefined;
    if (typeof sha !== 'string') {
      throw new Error(`Source branch '${sourceBranch}' not found in ${repoName}`);
    }

    const created = await this.request('POST', `${repoPath}/git/refs`, {
      ref: `refs/heads/${branchName}`,
      sha,
    });
    const refUrl = isJsonObject(created) && typeof created.url === 'string' ? created.url : '';

    return { branchName, repoName, sourceBranch, sha, refUrl };
  }
}

function extractMessage(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isJsonObject(parsed) && typeof parsed.message === 'string') {
      return parsed.message;
    }
  } catch {
    // not JSON; fall through to raw text
  }
  return text || 'Unknown error';
}
