import { z } from 'zod';

/**
 * Zod schemas for the subset of the GitHub events API we read.
 *
 * Only `type`, `repo` and `created_at` are required; payload fields are
 * optional because GitHub trims payloads for some event types. Missing
 * titles and links are dealt with by the normalizer, not here.
 */
const userSchema = z.object({
  login: z.string(),
});

const pullRequestSchema = z.object({
  id: z.number(),
  html_url: z.string().optional(),
  title: z.string().optional(),
  merged: z.boolean().optional(),
  user: userSchema.optional(),
});

const issueSchema = z.object({
  id: z.number(),
  html_url: z.string().optional(),
  title: z.string().optional(),
  user: userSchema.optional(),
});

export const githubEventSchema = z.object({
  id: z.string(),
  type: z.string(),
  repo: z.object({ name: z.string() }),
  created_at: z.string().nullable().optional(),
  payload: z.object({
    action: z.string().optional(),
    pull_request: pullRequestSchema.optional(),
    issue: issueSchema.optional(),
  }).default({}),
});

export type GithubEvent = z.infer<typeof githubEventSchema>;
