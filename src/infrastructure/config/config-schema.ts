import { z } from 'zod';

/**
 * Zod schema for the persisted configuration file (`~/.standup`).
 *
 * Every section is optional so the file can be written step by step:
 * `standup config` stores GitHub credentials, `standup auth google`
 * adds the OAuth client and token later.
 */
export const configFileSchema = z.object({
  github: z.object({
    username: z.string().min(1),
    token: z.string().min(1),
  }).optional(),
  google_client: z.object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
  }).optional(),
  google_token: z.object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1),
    expires_at: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' }),
  }).optional(),
  gcal: z.object({
    id: z.string().min(1),
  }).optional(),
  include_issue_comments: z.boolean().optional(),
  time_zone: z.string().min(1).optional(),
});

export type StandupConfig = z.infer<typeof configFileSchema>;

export type GoogleToken = NonNullable<StandupConfig['google_token']>;
export type GoogleClientCredentials = NonNullable<StandupConfig['google_client']>;
