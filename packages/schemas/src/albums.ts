import { z } from "zod";

export const POSITION_FIELD = "US_peak_chart_post";

// Records are flat mappings; only the fields the views read are typed here.
export const RawAlbumRecord = z
  .object({
    album: z.unknown(),
    year: z.unknown(),
    [POSITION_FIELD]: z.unknown()
  })
  .passthrough();

export type RawAlbumRecord = z.infer<typeof RawAlbumRecord>;

export const RawAlbumCollection = z.array(RawAlbumRecord);

export type RawAlbumCollection = z.infer<typeof RawAlbumCollection>;

export const UploadRequest = z.object({
  contents: z.string().nullable().optional(),
  filename: z.string().max(512).nullable().optional()
});

export type UploadRequest = z.infer<typeof UploadRequest>;
