import type { GitHubClient } from '../connectors/github/client.js';
import type { CreatedBranch, GitHubBranch, GitHubRepository } from '../connectors/github/types.js';
import { BaseCapabilityAdapter } from './base-adapter.js';
import { AdapterRejectedError } from './types.js';

/** Remaining-call budget at or below which requests are refused. */
export const RATE_LIMIT_FLOOR = 10;

export type RepositoryBackend = Pick<
  GitHubClient,
  'getRateLimit' | 'createRepository' | 'listRepositories' | 'createBranch' | 'listBranches'
>;

export type RepositoryParams =
  | { operation: 'create_repository'; name: string; description: string; private: boolean }
  | { operation: 'list_repositories'; limit: number }
  | { operation: 'create_branch'; repoName: string; branchName: string; sourceBranch: string }
  | { operation: 'list_branches'; repoName: string };

export type RepositoryPayload =
  | { operation: 'create_repository'; repository: GitHubRepository }
  | { operation: 'list_repositories'; repositories: GitHubRepository[] }
  | { operation: 'create_branch'; branch: CreatedBranch }
  | { operation: 'list_branches'; repoName: string; branches: GitHubBranch[] };

export class RepositoryAdapter extends BaseCapabilityAdapter<RepositoryParams, RepositoryPayload> {
  readonly tag = 'repository_management' as const;
  readonly service = 'github';

  constructor(private backend: RepositoryBackend | null) {
    super('RepositoryAdapter');
  }

  isAvailable(): boolean {
    return this.backend !== null;
  }

  protected async checkPreconditions(params: RepositoryParams): Promise<void> {
    const status = await this.requireBackend().getRateLimit();
    if (status.remaining <= RATE_LIMIT_FLOOR) {
      this.logger.warn('GitHub rate limit budget exhausted', {
        remaining: status.remaining,
        resetAt: status.resetAt,
      });
      throw new AdapterRejectedError(this.service, params.operation, 'GitHub rate limit exceeded');
    }
  }

  protected async execute(params: RepositoryParams): Promise<RepositoryPayload> {
    const backend = this.requireBackend();
    switch (params.operation) {
      case 'create_repository': {
        const repository = await backend.createRepository({
          name: params.name,
          description: params.description,
          private: params.private,
          autoInit: true,
          gitignoreTemplate: 'Python',
        });
        this.logger.info('Repository created', { name: repository.fullName });
        return { operation: 'create_repository', repository };
      }
      case 'list_repositories':
        return {
          operation: 'list_repositories',
          repositories: await backend.listRepositories({ limit: params.limit }),
        };
      case 'create_branch':
        return {
          operation: 'create_branch',
          branch: await backend.createBranch(params.repoName, params.branchName, params.sourceBranch),
        };
      case 'list_branches':
        return {
          operation: 'list_branches',
          repoName: params.repoName,
          branches: await backend.listBranches(params.repoName),
        };
    }
  }

  protected describeResponse(payload: RepositoryPayload): unknown {
    if (payload.operation === 'list_repositories') {
      return { operation: payload.operation, count: payload.repositories.length, names: payload.repositories.map((r) => r.name) };
    }
    return payload;
  }

  private requireBackend(): RepositoryBackend {
    if (!this.backend) {
      throw new Error('GitHub client is not configured');
    }
    return this.backend;
  }
}
