import { z } from 'zod';

const packageEntrySchema = z
  .object({
    project: z.string().trim().min(1).optional(),
    name: z.string().trim().min(1).optional(),
  })
  .refine(entry => entry.project !== undefined || entry.name !== undefined, {
    message: 'each entry needs a "project" or "name" field',
  })
  .transform(entry => entry.project ?? entry.name ?? '');

const packageEntriesSchema = z.array(packageEntrySchema);

// Either a bare array or the top-packages dump shape `{ rows: [...] }`.
export const packageListSchema = z.union([
  packageEntriesSchema,
  z.object({ rows: packageEntriesSchema }).transform(list => list.rows),
]);
