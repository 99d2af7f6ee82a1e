/**
 * Schemas of JSON listing entries
 */

import { z } from 'zod';

export const ObjectEntrySchema = z.object({
  name: z.string(),
  hash: z.string(),
  bytes: z.number().int().nonnegative(),
  content_type: z.string(),
  last_modified: z.string(),
  symlink_path: z.string().optional(),
});

export const SubdirEntrySchema = z.object({
  subdir: z.string(),
});

export const ObjectListingSchema = z.array(z.union([ObjectEntrySchema, SubdirEntrySchema]));

export const ContainerEntrySchema = z.object({
  name: z.string(),
  count: z.number().int().nonnegative(),
  bytes: z.number().int().nonnegative(),
  last_modified: z.string().optional(),
});

export const ContainerListingSchema = z.array(ContainerEntrySchema);

export type ObjectEntry = z.infer<typeof ObjectEntrySchema>;
export type SubdirEntry = z.infer<typeof SubdirEntrySchema>;
export type ContainerEntry = z.infer<typeof ContainerEntrySchema>;

/**
 * Parses a listing timestamp. Swift writes them in UTC without a zone
 * designator, e.g. "2024-03-01T12:00:00.000000".
 */
export function parseListingDate(value: string | undefined): Date | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const millis = value.replace(/(\.\d{3})\d+/, '$1');
  const hasZone = /(Z|[+-]\d{2}:\d{2})$/.test(millis);
  const date = new Date(hasZone ? millis : `${millis}Z`);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
