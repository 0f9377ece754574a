import { z } from 'zod';

// --- Remote manifest: flat form ---

export const FlatPlaylistEntrySchema = z.object({
  id: z.union([z.string(), z.number()]),
  startTime: z.string(),
  endTime: z.string(),
  videoIds: z.array(z.union([z.string(), z.number()])),
  active: z.boolean().optional(),
  order: z.number().nullish(),
});

export const FlatManifestSchema = z.array(z.unknown());

// --- Remote manifest: enveloped form ---

export const MediaAssetSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  title: z.string().nullish(),
  fileUrl: z.string().nullish(),
  startTime: z.number().nullish(),
  duration: z.number().nullish(),
  file: z.object({
    id: z.union([z.string(), z.number()]),
    filename_disk: z.string().min(1),
  }),
});

export const PlaylistAssetSchema = z.object({
  order: z.number().nullish(),
  media_assets_id: MediaAssetSchema,
});

export const EnvelopedPlaylistEntrySchema = z.object({
  id: z.union([z.number(), z.string()]),
  title: z.string().nullish(),
  active: z.boolean().nullish(),
  order: z.number().nullish(),
  portrait: z.boolean().nullish(),
  beginTime: z.string(),
  endTime: z.string(),
  device: z
    .object({
      device_id: z.string().nullish(),
      device_name: z.string().nullish(),
    })
    .nullish(),
  assets: z.array(z.unknown()).nullish(),
});

export const EnvelopedManifestSchema = z.object({
  data: z.array(z.unknown()),
});

// --- Changelog ---

export const ChangelogEntrySchema = z.object({
  id: z.number(),
  date_created: z.string().min(1),
  date_updated: z.string().nullish(),
  log: z.string().nullish(),
});

export const ChangelogResponseSchema = z.object({
  data: z.array(ChangelogEntrySchema),
});

// --- Persisted records ---

export const StoredVideoSchema = z.object({
  id: z.string(),
  name: z.string(),
  remoteUrl: z.string(),
  localPath: z.string().nullable(),
  downloaded: z.boolean(),
  order: z.number().optional(),
  clipStartSeconds: z.number().optional(),
  clipDurationSeconds: z.number().optional(),
});

export const StoredPlaylistSchema = z.object({
  id: z.string(),
  title: z.string().optional(),
  startTime: z.string(),
  endTime: z.string(),
  active: z.boolean(),
  order: z.number().optional(),
  portrait: z.boolean().optional(),
  deviceId: z.string().optional(),
  deviceName: z.string().optional(),
  orderedVideoIds: z.array(z.string()),
});

export const StoredCatalogSchema = z.object({
  playlists: z.array(StoredPlaylistSchema),
  videos: z.array(StoredVideoSchema),
});

export const ChangelogMarkerSchema = z.object({
  id: z.number(),
  dateCreated: z.string(),
});

export const DeviceInfoSchema = z.object({
  deviceId: z.string(),
  deviceName: z.string(),
  location: z.string().default(''),
  active: z.boolean().default(true),
  geo: z
    .object({
      latitude: z.number(),
      longitude: z.number(),
    })
    .optional(),
});

export type FlatPlaylistEntry = z.infer<typeof FlatPlaylistEntrySchema>;
export type EnvelopedPlaylistEntry = z.infer<typeof EnvelopedPlaylistEntrySchema>;
export type PlaylistAsset = z.infer<typeof PlaylistAssetSchema>;
export type ChangelogResponse = z.infer<typeof ChangelogResponseSchema>;
