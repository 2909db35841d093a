import { z } from "zod";

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const documentMetadataSchema = z.object({
  source: z.string(),
  sourceType: z.enum(["article", "pdf", "video", "text"]),
  contentLength: z.number().int().nonnegative(),
  title: z.string().optional(),
  author: z.string().optional(),
  numPages: z.number().int().nonnegative().optional(),
  numSegments: z.number().int().nonnegative().optional(),
  videoId: z.string().optional(),
  filePath: z.string().optional(),
  extras: z.record(metadataValueSchema).optional()
});

export const storedEntrySchema = z.object({
  id: z.string(),
  text: z.string(),
  metadata: documentMetadataSchema,
  embedding: z.array(z.number())
});

export const storedCollectionSchema = z.object({
  version: z.literal(1),
  name: z.string(),
  embeddingModel: z.string(),
  embeddingDimension: z.number().int().positive().optional(),
  entries: z.array(storedEntrySchema)
});

export type StoredEntry = z.infer<typeof storedEntrySchema>;

export type StoredCollection = z.infer<typeof storedCollectionSchema>;
