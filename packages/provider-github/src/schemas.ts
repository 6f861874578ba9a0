import { z } from "zod";

const userSchema = z.object({ login: z.string() }).nullish();

const labelSchema = z.union([z.string(), z.object({ name: z.string().nullish() })]);

export const githubPullRequestSchema = z.object({
  number: z.number(),
  title: z.string(),
  state: z.string(),
  draft: z.boolean().nullish(),
  merged: z.boolean().nullish(),
  merged_at: z.string().nullish(),
  closed_at: z.string().nullish(),
  created_at: z.string(),
  updated_at: z.string(),
  user: userSchema,
  base: z.object({ ref: z.string() }).nullish(),
  labels: z.array(labelSchema).nullish()
});

export const githubReviewSchema = z.object({
  id: z.number(),
  user: userSchema,
  state: z.string(),
  body: z.string().nullish(),
  submitted_at: z.string().nullish()
});

export const githubIssueCommentSchema = z.object({
  id: z.number(),
  user: userSchema,
  created_at: z.string()
});

export const githubReviewCommentSchema = z.object({
  id: z.number(),
  user: userSchema,
  created_at: z.string(),
  pull_request_review_id: z.number().nullish()
});

// Timeline items are a union of many event shapes; only these fields matter here.
export const githubTimelineEventSchema = z.object({
  id: z.number().nullish(),
  node_id: z.string().nullish(),
  event: z.string().nullish(),
  created_at: z.string().nullish(),
  actor: userSchema
});

const gitIdentitySchema = z
  .object({
    name: z.string().nullish(),
    date: z.string().nullish()
  })
  .nullish();

export const githubCommitSchema = z.object({
  sha: z.string(),
  author: userSchema,
  parents: z.array(z.object({ sha: z.string() })),
  commit: z.object({
    author: gitIdentitySchema,
    committer: gitIdentitySchema
  })
});

export type GithubPullRequest = z.infer<typeof githubPullRequestSchema>;
export type GithubReview = z.infer<typeof githubReviewSchema>;
export type GithubIssueComment = z.infer<typeof githubIssueCommentSchema>;
export type GithubReviewComment = z.infer<typeof githubReviewCommentSchema>;
export type GithubTimelineEvent = z.infer<typeof githubTimelineEventSchema>;
export type GithubCommit = z.infer<typeof githubCommitSchema>;
