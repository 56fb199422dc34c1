import { z } from 'zod';

const releaseFileSchema = z.object({
  url: z.string(),
  packagetype: z.string(),
  filename: z.string().optional(),
});

export const projectMetadataSchema = z.object({
  info: z.object({
    name: z.string().optional(),
    version: z.string(),
    project_urls: z.record(z.string(), z.string().nullable()).nullable().optional(),
  }),
  releases: z.record(z.string(), z.array(releaseFileSchema)).default({}),
});

export type ProjectMetadata = z.infer<typeof projectMetadataSchema>;
