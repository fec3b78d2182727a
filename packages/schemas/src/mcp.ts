import { z } from "zod";

/** "owner/name", the way GitHub prints a repository's full name. */
export const RepoSlugSchema = z
  .string()
  .regex(/^[A-Za-z0-9-]+\/[A-Za-z0-9._-]+$/, 'Expected "owner/name"');
export type RepoSlug = z.infer<typeof RepoSlugSchema>;

const BranchNameSchema = z.string().min(1).max(255);
const PerPageSchema = z.number().int().positive().max(100);

export const ToolNameSchema = z.enum([
  "get_file_contents",
  "create_or_update_file",
  "get_repository",
  "list_repositories",
  "list_branches",
  "create_branch",
  "create_pull_request",
  "search_code",
  "connection_status",
]);
export type ToolName = z.infer<typeof ToolNameSchema>;

// ── Read Tool Inputs ───────────────────────────────────────────────────────

export const GetFileContentsInputSchema = z.object({
  repo: RepoSlugSchema,
  path: z.string().min(1),
  branch: BranchNameSchema.default("main"),
});
export type GetFileContentsInput = z.infer<typeof GetFileContentsInputSchema>;

export const GetRepositoryInputSchema = z.object({
  repo: RepoSlugSchema,
});
export type GetRepositoryInput = z.infer<typeof GetRepositoryInputSchema>;

export const ListRepositoriesInputSchema = z.object({
  perPage: PerPageSchema.default(30),
  sort: z.enum(["created", "updated", "pushed", "full_name"]).default("updated"),
});
export type ListRepositoriesInput = z.infer<typeof ListRepositoriesInputSchema>;

export const ListBranchesInputSchema = z.object({
  repo: RepoSlugSchema,
  perPage: PerPageSchema.default(30),
});
export type ListBranchesInput = z.infer<typeof ListBranchesInputSchema>;

export const SearchCodeInputSchema = z.object({
  query: z.string().min(1).max(256),
  repo: RepoSlugSchema.optional(),
  perPage: PerPageSchema.default(20),
});
export type SearchCodeInput = z.infer<typeof SearchCodeInputSchema>;

// ── Write Tool Inputs ──────────────────────────────────────────────────────

export const CreateOrUpdateFileInputSchema = z.object({
  repo: RepoSlugSchema,
  path: z.string().min(1),
  content: z.string(),
  message: z.string().min(1),
  branch: BranchNameSchema.default("main"),
});
export type CreateOrUpdateFileInput = z.infer<typeof CreateOrUpdateFileInputSchema>;

export const CreateBranchInputSchema = z.object({
  repo: RepoSlugSchema,
  branch: BranchNameSchema,
  fromBranch: BranchNameSchema.default("main"),
});
export type CreateBranchInput = z.infer<typeof CreateBranchInputSchema>;

export const CreatePullRequestInputSchema = z.object({
  repo: RepoSlugSchema,
  title: z.string().min(1),
  head: BranchNameSchema,
  base: BranchNameSchema.default("main"),
  body: z.string().optional(),
  draft: z.boolean().default(false),
});
export type CreatePullRequestInput = z.infer<typeof CreatePullRequestInputSchema>;

// ── Diagnostic Tool Inputs ─────────────────────────────────────────────────

export const ConnectionStatusInputSchema = z.object({});
export type ConnectionStatusInput = z.infer<typeof ConnectionStatusInputSchema>;
