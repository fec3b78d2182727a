import type { AnyZodObject } from "zod";
import {
  GetFileContentsInputSchema,
  GetRepositoryInputSchema,
  ListRepositoriesInputSchema,
  ListBranchesInputSchema,
  SearchCodeInputSchema,
  CreateOrUpdateFileInputSchema,
  CreateBranchInputSchema,
  CreatePullRequestInputSchema,
  ConnectionStatusInputSchema,
} from "@repo-relay/schemas";
import type { ToolName } from "@repo-relay/schemas";

/**
 * - read: idempotent upstream query; response size is checked.
 * - write: mutates upstream state; request size is checked, never cached.
 * - diagnostic: answered locally, bypasses cache and rate limiting.
 */
export type ToolClass = "read" | "write" | "diagnostic";

export interface ToolDefinition {
  name: string;
  description: string;
  toolClass: ToolClass;
  cacheable: boolean;
  inputSchema: AnyZodObject;
  /**
   * Field holding file content: an argument for writes, a result field for
   * reads. When absent, the whole serialized request/response is measured.
   */
  payloadField?: string;
}

/**
 * Static classification of every exposed tool. Declared explicitly so that a
 * mutating tool can never be cached by accident of naming.
 */
export const TOOL_CATALOG: readonly ToolDefinition[] = [
  {
    name: "get_file_contents",
    description:
      "Read a file from a repository branch. Returns the decoded UTF-8 content " +
      "along with the blob sha and size.",
    toolClass: "read",
    cacheable: true,
    inputSchema: GetFileContentsInputSchema,
    payloadField: "content",
  },
  {
    name: "get_repository",
    description:
      "Get repository metadata: description, default branch, visibility, " +
      "star/fork/issue counts and last update time.",
    toolClass: "read",
    cacheable: true,
    inputSchema: GetRepositoryInputSchema,
  },
  {
    name: "list_repositories",
    description: "List repositories the authenticated user can access, most recently updated first.",
    toolClass: "read",
    cacheable: true,
    inputSchema: ListRepositoriesInputSchema,
  },
  {
    name: "list_branches",
    description: "List branches of a repository with their head commit and protection flag.",
    toolClass: "read",
    cacheable: true,
    inputSchema: ListBranchesInputSchema,
  },
  {
    name: "search_code",
    description: "Search code on GitHub, optionally restricted to one repository.",
    toolClass: "read",
    cacheable: true,
    inputSchema: SearchCodeInputSchema,
  },
  {
    name: "create_or_update_file",
    description:
      "Create a file, or update it if it already exists, with a single commit " +
      "on the given branch. Content is plain text.",
    toolClass: "write",
    cacheable: false,
    inputSchema: CreateOrUpdateFileInputSchema,
    payloadField: "content",
  },
  {
    name: "create_branch",
    description: "Create a branch pointing at the head of another branch (default: main).",
    toolClass: "write",
    cacheable: false,
    inputSchema: CreateBranchInputSchema,
  },
  {
    name: "create_pull_request",
    description: "Open a pull request from `head` into `base` (default: main).",
    toolClass: "write",
    cacheable: false,
    inputSchema: CreatePullRequestInputSchema,
  },
  {
    name: "connection_status",
    description:
      "Report remaining rate-limit quota per tool, window reset times, cache " +
      "size and the authenticated GitHub account. Never consumes quota.",
    toolClass: "diagnostic",
    cacheable: false,
    inputSchema: ConnectionStatusInputSchema,
  },
] satisfies ReadonlyArray<ToolDefinition & { name: ToolName }>;
