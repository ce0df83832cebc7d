import { z } from 'zod';

// Page metadata supplied by the content-fetch collaborator. Only the URL is required;
// everything else defaults to neutral.
export const pageMetadataSchema = z.object({
  url: z.string().min(1),
  title: z.string().default(''),
  description: z.string().default(''),
  keywords: z.array(z.string()).default([]),
  extractedText: z.string().default(''),
  videoTitle: z.string().default(''),
  videoDescription: z.string().default(''),
  videoChannel: z.string().default(''),
  hasVideo: z.boolean().default(false),
  hasForms: z.boolean().default(false),
  contentLength: z.number().nonnegative().default(0),
  imagesCount: z.number().int().nonnegative().default(0),
  linksCount: z.number().int().nonnegative().default(0),
  externalLinksCount: z.number().int().nonnegative().default(0),
  contentQualityScore: z.number().min(0).max(1).default(0),
  educationalIndicators: z.number().nonnegative().default(0),
  entertainmentIndicators: z.number().nonnegative().default(0)
});

export type PageMetadata = z.infer<typeof pageMetadataSchema>;
export type PageMetadataInput = z.input<typeof pageMetadataSchema>;

export function basicMetadata(url: string): PageMetadata {
  return {
    url,
    title: '',
    description: '',
    keywords: [],
    extractedText: '',
    videoTitle: '',
    videoDescription: '',
    videoChannel: '',
    hasVideo: false,
    hasForms: false,
    contentLength: 0,
    imagesCount: 0,
    linksCount: 0,
    externalLinksCount: 0,
    contentQualityScore: 0,
    educationalIndicators: 0,
    entertainmentIndicators: 0
  };
}

/** Title and description text used for mission alignment, preferring video fields. */
export function alignmentText(metadata: PageMetadata): string {
  const title = metadata.videoTitle || metadata.title;
  const description = metadata.videoDescription || metadata.description;
  return `${title} \n ${description}`.trim();
}
