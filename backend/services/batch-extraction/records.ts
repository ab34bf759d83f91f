import { z } from 'zod';

const optionalText = z
  .union([z.string(), z.number()])
  .optional()
  .catch(undefined)
  .transform((value) => (value === undefined || value === '' ? undefined : String(value)));

export const referenceRecordSchema = z
  .object({
    title: z.string().min(1),
    content: z.string().catch(''),
    url: optionalText,
    thumbnail_url: optionalText,
    thumbnailUrl: optionalText,
  })
  .transform(({ title, content, url, thumbnail_url, thumbnailUrl }) => ({
    title,
    content,
    url,
    thumbnailUrl: thumbnailUrl ?? thumbnail_url,
  }));

export const videoRecordSchema = z
  .object({
    title: z.string().min(1),
    url: z.string().min(1),
    thumbnail_url: optionalText,
    thumbnailUrl: optionalText,
    duration: optionalText,
    views: optionalText,
    upload_date: optionalText,
    uploadDate: optionalText,
  })
  .transform(({ title, url, thumbnail_url, thumbnailUrl, duration, views, upload_date, uploadDate }) => ({
    title,
    url,
    thumbnailUrl: thumbnailUrl ?? thumbnail_url,
    duration,
    views,
    uploadDate: uploadDate ?? upload_date,
  }));

export const linkRecordSchema = z.object({
  title: z.string().catch('Untitled Content'),
  link: z.string().min(1),
  source: optionalText,
});

export type ReferenceRecord = z.infer<typeof referenceRecordSchema>;
export type VideoRecord = z.infer<typeof videoRecordSchema>;
export type LinkRecord = z.infer<typeof linkRecordSchema> & { pageNumber: number };
