/**
 * GitHub REST API shapes used by the repository capability, and the
 * guards that turn untyped JSON into them.
 */

export interface GitHubRepository {
  name: string;
  fullName: string;
  description: string;
  htmlUrl: string;
  cloneUrl: string;
  sshUrl: string;
  language: string | null;
  private: boolean;
  stars: number;
  forks: number;
  updatedAt: string | null;
  size: number;
}

export interface GitHubBranch {
  name: string;
  protected: boolean;
  commitSha: string;
}

export interface CreatedBranch {
  branchName: string;
  repoName: string;
  sourceBranch: string;
  sha: string;
  refUrl: string;
}

export interface CreateRepositoryInput {
  name: string;
  description?: string;
  private?: boolean;
  autoInit?: boolean;
  gitignoreTemplate?: string;
}

export interface RateLimitStatus {
  remaining: number;
  limit: number;
  resetAt: string | null;
}

type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(obj: JsonObject, key: string, fallback = ''): string {
  const value = obj[key];
  return typeof value === 'string' ? value : fallback;
}

function num(obj: JsonObject, key: string): number {
  const value = obj[key];
  return typeof value === 'number' ? value : 0;
}

export function parseRepository(value: unknown): GitHubRepository {
  if (!isJsonObject(value) || typeof value.name !== 'string') {
    throw new Error('Unexpected repository payload from GitHub');
  }
  const language = value.language;
  const updatedAt = value.updated_at;
  return {
    name: value.name,
    fullName: str(value, 'full_name', value.name),
    description: str(value, 'description') || 'No description',
    htmlUrl: str(value, 'html_url'),
    cloneUrl: str(value, 'clone_url'),
    sshUrl: str(value, 'ssh_url'),
    language: typeof language === 'string' ? language : null,
    private: value.private === true,
    stars: num(value, 'stargazers_count'),
    forks: num(value, 'forks_count'),
    updatedAt: typeof updatedAt === 'string' ? updatedAt : null,
    size: num(value, 'size'),
  };
}

export function parseBranch(value: unknown): GitHubBranch {
  if (!isJsonObject(value) || typeof value.name !== 'string') {
    throw new Error('Unexpected branch payload from GitHub');
  }
  const commit = value.commit;
  return {
    name: value.name,
    protected: value.protected === true,
    commitSha: isJsonObject(commit) ? str(commit, 'sha') : '',
  };
}

export function parseRateLimit(value: unknown): RateLimitStatus {
  const resources = isJsonObject(value) ? value.resources : undefined;
  const core = isJsonObject(resources) ? resources.core : undefined;
  if (!isJsonObject(core)) {
    throw new Error('Unexpected rate limit payload from GitHub');
  }
  const reset = core.reset;
  return {
    remaining: num(core, 'remaining'),
    limit: num(core, 'limit'),
    resetAt: typeof reset === 'number' ? new Date(reset * 1000).toISOString() : null,
  };
}
