import { z } from 'zod';

export const jiraAttachmentSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  filename: z.string(),
  created: z.string(),
  content: z.string(),
});

export const jiraUserSchema = z.object({
  displayName: z.string().optional(),
  name: z.string().optional(),
  accountId: z.string().optional(),
});

export const jiraCommentSchema = z.object({
  created: z.string(),
  author: jiraUserSchema.nullish(),
  body: z.string().nullish(),
});

export const jiraIssueSchema = z.object({
  key: z.string(),
  fields: z.record(z.string(), z.unknown()),
});

export const jiraIssueFieldsSchema = z.object({
  attachment: z.array(jiraAttachmentSchema).nullish(),
  comment: z
    .object({
      comments: z.array(jiraCommentSchema),
    })
    .nullish(),
});

export const jiraAttachmentListSchema = z.array(jiraAttachmentSchema).min(1);

export const cachedIssueSnapshotSchema = z.object({
  options: z.object({
    server: z.string(),
  }),
  raw: z.unknown(),
});
