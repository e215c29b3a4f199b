import { z } from "zod";

export const STAGES = [
  "awaiting_point_of_sale",
  "awaiting_container",
  "awaiting_sub_items",
  "awaiting_photos",
  "awaiting_decision",
  "done",
] as const;

export const photoRefSchema = z.object({
  mediaId: z.string().min(1),
  mimeType: z.string().optional(),
  ordinal: z.number().int().positive(),
});

export const sessionRecordSchema = z.object({
  conversationId: z.string(),
  pointOfSale: z.string(),
  containerCategory: z.string(),
  subItems: z.array(z.string()),
  currentSubItemIndex: z.number().int().min(0),
  photosBySubItem: z.record(z.string(), z.array(photoRefSchema)),
  stage: z.enum(STAGES),
  createdAt: z.number(),
  updatedAt: z.number(),
});

export type SessionRecord = z.infer<typeof sessionRecordSchema>;

export interface SessionStoreAdapter {
  get(key: string): Promise<SessionRecord | null>;
  set(key: string, record: SessionRecord, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<boolean>;
}

/** A stored record that no longer matches the session shape. */
export class CorruptSessionError extends Error {
  constructor(
    message: string,
    readonly key: string
  ) {
    super(message);
    this.name = "CorruptSessionError";
  }
}
