import { z } from 'zod';
import { DraftState } from '../constants';
import { ResponseFormatError } from '../errors';

// Raw platform responses use snake_case; every schema maps to a camelCase record.

const countSchema = z.number().int().nonnegative();

export const datasetRecordSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    alias: z.string().default(''),
    default_branch: z.string(),
    commit_id: z.string().nullable().default(null),
    created_at: z.string(),
    updated_at: z.string(),
    owner: z.string(),
    is_public: z.boolean().default(false),
    config: z.string().nullable().default(null),
  })
  .transform((raw) => ({
    id: raw.id,
    name: raw.name,
    alias: raw.alias,
    defaultBranch: raw.default_branch,
    commitId: raw.commit_id,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at,
    owner: raw.owner,
    isPublic: raw.is_public,
    config: raw.config,
  }));

const commitFields = {
  commit_id: z.string(),
  parent_commit_id: z.string().nullable().default(null),
  title: z.string(),
  description: z.string().default(''),
  committer: z.string(),
  committed_at: z.string(),
};

export const commitRecordSchema = z.object(commitFields).transform((raw) => ({
  commitId: raw.commit_id,
  parentCommitId: raw.parent_commit_id,
  title: raw.title,
  description: raw.description,
  committer: raw.committer,
  committedAt: raw.committed_at,
}));

/** Branches and tags: a commit plus the name pointing at it. */
export const namedCommitRecordSchema = z
  .object({ name: z.string(), ...commitFields })
  .transform((raw) => ({
    name: raw.name,
    commitId: raw.commit_id,
    parentCommitId: raw.parent_commit_id,
    title: raw.title,
    description: raw.description,
    committer: raw.committer,
    committedAt: raw.committed_at,
  }));

export const draftRecordSchema = z
  .object({
    number: z.number().int().positive(),
    title: z.string(),
    branch: z.string(),
    state: z.nativeEnum(DraftState),
    parent_commit_id: z.string().nullable().default(null),
    creator: z.string(),
    created_at: z.string(),
    updated_at: z.string(),
    description: z.string().default(''),
  })
  .transform((raw) => ({
    number: raw.number,
    title: raw.title,
    branch: raw.branch,
    state: raw.state,
    parentCommitId: raw.parent_commit_id,
    creator: raw.creator,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at,
    description: raw.description,
  }));

export const datasetPageSchema = z
  .object({ datasets: z.array(datasetRecordSchema), total_count: countSchema })
  .transform((raw) => ({ items: raw.datasets, totalCount: raw.total_count }));

export const branchPageSchema = z
  .object({ branches: z.array(namedCommitRecordSchema), total_count: countSchema })
  .transform((raw) => ({ items: raw.branches, totalCount: raw.total_count }));

export const tagPageSchema = z
  .object({ tags: z.array(namedCommitRecordSchema), total_count: countSchema })
  .transform((raw) => ({ items: raw.tags, totalCount: raw.total_count }));

export const commitPageSchema = z
  .object({ commits: z.array(commitRecordSchema), total_count: countSchema })
  .transform((raw) => ({ items: raw.commits, totalCount: raw.total_count }));

export const draftPageSchema = z
  .object({ drafts: z.array(draftRecordSchema), total_count: countSchema })
  .transform((raw) => ({ items: raw.drafts, totalCount: raw.total_count }));

export const errorBodySchema = z.object({
  code: z.string().optional(),
  message: z.string(),
});

/**
 * Parse a response body against a schema, reporting the first mismatching
 * field as a ResponseFormatError.
 */
export function decode<S extends z.ZodTypeAny>(schema: S, body: unknown, what: string): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : '<root>';
    throw new ResponseFormatError(
      `Unexpected ${what} response at ${path}: ${issue?.message ?? 'invalid body'}`,
      body
    );
  }
  return result.data;
}
