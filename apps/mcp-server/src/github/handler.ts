import type { Octokit } from "@octokit/rest";
import {
  GetFileContentsInputSchema,
  GetRepositoryInputSchema,
  ListRepositoriesInputSchema,
  ListBranchesInputSchema,
  SearchCodeInputSchema,
  CreateOrUpdateFileInputSchema,
  CreateBranchInputSchema,
  CreatePullRequestInputSchema,
} from "@repo-relay/schemas";
import type {
  GetFileContentsInput,
  GetRepositoryInput,
  ListRepositoriesInput,
  ListBranchesInput,
  SearchCodeInput,
  CreateOrUpdateFileInput,
  CreateBranchInput,
  CreatePullRequestInput,
} from "@repo-relay/schemas";
import type { ToolHandler } from "@repo-relay/core";

export interface FileContents {
  path: string;
  sha: string;
  size: number;
  content: string;
}

export interface FileWriteResult {
  action: "created" | "updated";
  path: string;
  sha: string | null;
  commitSha: string | null;
}

export interface RepositorySummary {
  fullName: string;
  description: string | null;
  defaultBranch: string;
  private: boolean;
  stars: number;
  forks: number;
  openIssues: number;
  htmlUrl: string;
  updatedAt: string | null;
}

export interface RepositoryListItem {
  fullName: string;
  private: boolean;
  defaultBranch: string | null;
  updatedAt: string | null;
}

export interface BranchSummary {
  name: string;
  sha: string;
  protected: boolean;
}

export interface CodeSearchResult {
  totalCount: number;
  items: Array<{ path: string; repo: string; sha: string; htmlUrl: string }>;
}

type RepoRef = {
  owner: string;
  repo: string;
};

/**
 * Executes governed tool calls against the GitHub REST API. Arguments have
 * already been validated by the dispatcher; each method re-parses its own
 * schema so the handler can also be driven directly.
 */
export class GitHubToolHandler implements ToolHandler {
  constructor(private readonly octokit: Octokit) {}

  async call(toolId: string, args: Record<string, unknown>): Promise<unknown> {
    switch (toolId) {
      case "get_file_contents":
        return this.getFileContents(GetFileContentsInputSchema.parse(args));
      case "get_repository":
        return this.getRepository(GetRepositoryInputSchema.parse(args));
      case "list_repositories":
        return this.listRepositories(ListRepositoriesInputSchema.parse(args));
      case "list_branches":
        return this.listBranches(ListBranchesInputSchema.parse(args));
      case "search_code":
        return this.searchCode(SearchCodeInputSchema.parse(args));
      case "create_or_update_file":
        return this.createOrUpdateFile(CreateOrUpdateFileInputSchema.parse(args));
      case "create_branch":
        return this.createBranch(CreateBranchInputSchema.parse(args));
      case "create_pull_request":
        return this.createPullRequest(CreatePullRequestInputSchema.parse(args));
      default:
        throw new Error(`No GitHub handler for tool: ${toolId}`);
    }
  }

  /** Login of the account the token belongs to. Used as the status identity probe. */
  async whoami(signal?: AbortSignal): Promise<string> {
    const { data } = await this.octokit.rest.users.getAuthenticated({ request: { signal } });
    return data.login;
  }

  async getFileContents(input: GetFileContentsInput): Promise<FileContents> {
    const { data } = await this.octokit.rest.repos.getContent({
      ...splitRepo(input.repo),
      path: input.path,
      ref: input.branch,
    });
    if (Array.isArray(data) || !("content" in data) || data.type !== "file") {
      throw new Error(`${input.path} is not a file`);
    }
    return {
      path: data.path,
      sha: data.sha,
      size: data.size,
      content: Buffer.from(data.content, "base64").toString("utf8"),
    };
  }

  async getRepository(input: GetRepositoryInput): Promise<RepositorySummary> {
    const { data } = await this.octokit.rest.repos.get({ ...splitRepo(input.repo) });
    return {
      fullName: data.full_name,
      description: data.description,
      defaultBranch: data.default_branch,
      private: data.private,
      stars: data.stargazers_count,
      forks: data.forks_count,
      openIssues: data.open_issues_count,
      htmlUrl: data.html_url,
      updatedAt: data.updated_at,
    };
  }

  async listRepositories(input: ListRepositoriesInput): Promise<RepositoryListItem[]> {
    const { data } = await this.octokit.rest.repos.listForAuthenticatedUser({
      per_page: input.perPage,
      sort: input.sort,
    });
    return data.map((repo) => ({
      fullName: repo.full_name,
      private: repo.private,
      defaultBranch: repo.default_branch ?? null,
      updatedAt: repo.updated_at ?? null,
    }));
  }

  async listBranches(input: ListBranchesInput): Promise<BranchSummary[]> {
    const { data } = await this.octokit.rest.repos.listBranches({
      ...splitRepo(input.repo),
      per_page: input.perPage,
    });
    return data.map((branch) => ({
      name: branch.name,
      sha: branch.commit.sha,
      protected: branch.protected,
    }));
  }

  async searchCode(input: SearchCodeInput): Promise<CodeSearchResult> {
    const q = input.repo ? `${input.query} repo:${input.repo}` : input.query;
    const { data } = await this.octokit.rest.search.code({ q, per_page: input.perPage });
    return {
      totalCount: data.total_count,
      items: data.items.map((item) => ({
        path: item.path,
        repo: item.repository.full_name,
        sha: item.sha,
        htmlUrl: item.html_url,
      })),
    };
  }

  async createOrUpdateFile(input: CreateOrUpdateFileInput): Promise<FileWriteResult> {
    const ref = splitRepo(input.repo);
    const existingSha = await this.findFileSha(ref, input.path, input.branch);
    const { data } = await this.octokit.rest.repos.createOrUpdateFileContents({
      ...ref,
      path: input.path,
      message: input.message,
      content: Buffer.from(input.content, "utf8").toString("base64"),
      branch: input.branch,
      ...(existingSha ? { sha: existingSha } : {}),
    });
    return {
      action: existingSha ? "updated" : "created",
      path: input.path,
      sha: data.content?.sha ?? null,
      commitSha: data.commit.sha ?? null,
    };
  }

  async createBranch(input: CreateBranchInput): Promise<{ ref: string; sha: string }> {
    const ref = splitRepo(input.repo);
    const { data: base } = await this.octokit.rest.git.getRef({ ...ref, ref: `heads/${input.fromBranch}` });
    const { data } = await this.octokit.rest.git.createRef({
      ...ref,
      ref: `refs/heads/${input.branch}`,
      sha: base.object.sha,
    });
    return { ref: data.ref, sha: data.object.sha };
  }

  async createPullRequest(
    input: CreatePullRequestInput,
  ): Promise<{ number: number; url: string; state: string }> {
    const { data } = await this.octokit.rest.pulls.create({
      ...splitRepo(input.repo),
      title: input.title,
      head: input.head,
      base: input.base,
      draft: input.draft,
      ...(input.body !== undefined ? { body: input.body } : {}),
    });
    return { number: data.number, url: data.html_url, state: data.state };
  }

  private async findFileSha(ref: RepoRef, path: string, branch: string): Promise<string | null> {
    try {
      const { data } = await this.octokit.rest.repos.getContent({ ...ref, path, ref: branch });
      if (Array.isArray(data)) {
        throw new Error(`${path} is a directory`);
      }
      return data.sha;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }
}

export function splitRepo(slug: string): RepoRef {
  const [owner, repo, ...rest] = slug.split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`Repository must be "owner/name", got "${slug}"`);
  }
  return { owner, repo };
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "status" in err && err.status === 404;
}
