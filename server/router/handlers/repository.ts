import type { GitHubRepository } from '../../connectors/github/types.js';
import { SectionBuilder, type RouteHandler } from './section.js';

const NAME = `["']?([\\w.-]+)["']?`;
const CREATE_BRANCH_PATTERN = new RegExp(
  `create\\s+(?:a\\s+)?(?:new\\s+)?branch\\s+${NAME}\\s+(?:in|on|for)\\s+(?:repo(?:sitory)?\\s+)?${NAME}(?:\\s+from\\s+${NAME})?`,
  'i'
);
const LIST_BRANCHES_PATTERN = new RegExp(`branch(?:es)?\\s+(?:for|in|of|on)\\s+(?:repo(?:sitory)?\\s+)?${NAME}`, 'i');

export const REPOSITORY_HELP = `## 🐙 GitHub Operations Available

### 📂 Repository Management
- **List repositories:** "list my repositories" or "show my repos"
- **Create repository:** "create repository [name]"

### 🌿 Branch Management
- **List branches:** "show branches for [repo-name]"
- **Create branch:** "create branch [name] in [repo-name]" (optionally "from [source-branch]")

What would you like to do with GitHub?`;

/**
 * The word following "repository" or "repo", with surrounding quotes removed.
 */
export function extractRepositoryName(text: string): string | null {
  const words = text.split(/\s+/).filter(Boolean);
  for (let i = 0; i < words.length - 1; i++) {
    const word = words[i]?.toLowerCase();
    if (word === 'repository' || word === 'repo') {
      const name = words[i + 1]?.replace(/^["']+|["']+$/g, '');
      return name ? name : null;
    }
  }
  return null;
}

export function formatRepositoryList(repositories: GitHubRepository[]): string {
  if (repositories.length === 0) {
    return 'No repositories found for this account.';
  }
  const entries = repositories.map((repo) => {
    const heading = [
      `**${repo.private ? '🔒' : '🌍'} ${repo.name}**`,
      repo.language ? `(${repo.language})` : '',
      repo.stars > 0 ? `⭐ ${repo.stars}` : '',
    ]
      .filter(Boolean)
      .join(' ');
    return `${heading}\n└─ ${repo.description}\n└─ [View Repository](${repo.htmlUrl})`;
  });
  return `## 📂 Your GitHub Repositories\n\n${entries.join('\n\n')}`;
}

export function formatCreatedRepository(repo: GitHubRepository): string {
  return `## ✅ Repository Created Successfully!

**Repository:** ${repo.name}
**URL:** [View Repository](${repo.htmlUrl})
**Clone URL:** \`${repo.cloneUrl}\`
**SSH URL:** \`${repo.sshUrl}\`

The repository was initialized with a Python .gitignore and is ready for development.`;
}

export const handleRepository: RouteHandler = async (ctx) => {
  const section = new SectionBuilder(ctx.invocation);
  const adapter = ctx.registry.get('repository_management');
  const text = ctx.request.userRequest;
  const lower = text.toLowerCase();
  const mentionsRepo = lower.includes('repo');

  // Branch requests first: "list branches for my-repo" also mentions "repo".
  if (lower.includes('branch') && lower.includes('create')) {
    const match = text.match(CREATE_BRANCH_PATTERN);
    const branchName = match?.[1];
    const repoName = match?.[2];
    if (!branchName || !repoName) {
      return section.write("Please specify the branch and repository. Example: 'create branch feature-x in my-repo'").build();
    }
    const outcome = await section.invoke(adapter, {
      operation: 'create_branch',
      repoName,
      branchName,
      sourceBranch: match?.[3] ?? 'main',
    });
    if (outcome.success && outcome.payload.operation === 'create_branch') {
      const branch = outcome.payload.branch;
      section.write(`## 🌿 Branch Created

**Branch:** ${branch.branchName}
**Repository:** ${branch.repoName}
**From:** ${branch.sourceBranch} (\`${branch.sha.slice(0, 7)}\`)`);
    } else if (!outcome.success) {
      section.fail('Branch creation', outcome.error);
    }
    return section.build();
  }

  if (lower.includes('branch') && ['list', 'show', 'get'].some((w) => lower.includes(w))) {
    const repoName = text.match(LIST_BRANCHES_PATTERN)?.[1];
    if (!repoName) {
      return section.write("To list branches, please specify the repository name. Example: 'show branches for my-repo'").build();
    }
    const outcome = await section.invoke(adapter, { operation: 'list_branches', repoName });
    if (outcome.success && outcome.payload.operation === 'list_branches') {
      const lines = outcome.payload.branches.map(
        (b) => `- **${b.name}**${b.protected ? ' 🔒' : ''} \`${b.commitSha.slice(0, 7)}\``
      );
      section.write(
        `## 🌿 Branches in ${outcome.payload.repoName}\n\n${lines.length > 0 ? lines.join('\n') : 'No branches found.'}`
      );
    } else if (!outcome.success) {
      section.fail('Branch listing', outcome.error);
    }
    return section.build();
  }

  if (lower.includes('list') && mentionsRepo) {
    const outcome = await section.invoke(adapter, { operation: 'list_repositories', limit: 10 });
    if (outcome.success && outcome.payload.operation === 'list_repositories') {
      section.write(formatRepositoryList(outcome.payload.repositories));
    } else if (!outcome.success) {
      section.fail('Repository listing', outcome.error);
    }
    return section.build();
  }

  if (lower.includes('create') && mentionsRepo) {
    const name = extractRepositoryName(text);
    if (!name) {
      return section.write("Please specify the repository name. Example: 'create repository my-new-project'").build();
    }
    const outcome = await section.invoke(adapter, {
      operation: 'create_repository',
      name,
      description: 'Repository created via the multi-capability assistant',
      private: lower.includes('private'),
    });
    if (outcome.success && outcome.payload.operation === 'create_repository') {
      section.write(formatCreatedRepository(outcome.payload.repository));
    } else if (!outcome.success) {
      section.fail('Repository creation', outcome.error);
    }
    return section.build();
  }

  return section.write(REPOSITORY_HELP).build();
};
