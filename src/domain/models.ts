import { z } from "zod";

export const IdSourceSchema = z.enum(["native", "content_hash"]);
export type IdSource = z.infer<typeof IdSourceSchema>;

export const PostRecordSchema = z.object({
  postId: z.string().min(1),
  idSource: IdSourceSchema,
  author: z.string(),
  text: z.string(),
  postedAt: z.string().nullable(),
  mediaRefs: z.array(z.string()),
  extractedAt: z.string(),
});
export type PostRecord = z.infer<typeof PostRecordSchema>;

export const ProfileReferenceSchema = z.object({
  handle: z.string(),
  profileUrl: z.string(),
  activityUrl: z.string(),
});
export type ProfileReference = z.infer<typeof ProfileReferenceSchema>;

export const WriteModeSchema = z.enum(["replace", "merge"]);
export type WriteMode = z.infer<typeof WriteModeSchema>;

export const StopReasonSchema = z.enum(["target_reached", "stalled", "max_attempts", "cancelled"]);
export type StopReason = z.infer<typeof StopReasonSchema>;

export interface RawSnapshot {
  html: string;
  url: string;
  capturedAt: Date;
  /** 0 for the capture taken right after the session opens. */
  scroll: number;
}

export const STORED_SCHEMA_VERSION = 1;

export const StoredPostsFileSchema = z.object({
  schemaVersion: z.literal(STORED_SCHEMA_VERSION),
  contract: z.string(),
  profile: ProfileReferenceSchema,
  posts: z.array(PostRecordSchema),
});
export type StoredPostsFile = z.infer<typeof StoredPostsFileSchema>;
