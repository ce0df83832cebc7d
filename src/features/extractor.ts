import type { Logger } from 'pino';
import type { Mission, PageMetadata } from '../types/index.js';
import { basicMetadata } from '../types/index.js';
import { ExtractionError, describeError } from '../errors.js';
import { missionKeywords } from './keywords.js';
import { parseTarget } from './target.js';
import { TEXT_BLOCK_SIZE, contentTextBlock, countOf, missionTextBlock, urlTextBlock } from './text-blocks.js';

export const STRUCTURAL_SIZE = 15;
export const CONTENT_SIZE = 15;
export const TEMPORAL_SIZE = 4;
export const FEATURE_DIMENSION = TEXT_BLOCK_SIZE * 3 + STRUCTURAL_SIZE + CONTENT_SIZE + TEMPORAL_SIZE;

export interface ExtractOptions {
  now?: Date;
  logger?: Logger;
}

/** Flattens page metadata into the single text the content block is computed from. */
export function contentText(metadata: PageMetadata): string {
  const parts: string[] = [];

  if (metadata.videoTitle) parts.push(`Video Title: ${metadata.videoTitle}`);
  if (metadata.videoDescription) parts.push(`Video Description: ${metadata.videoDescription.slice(0, 300)}`);
  if (metadata.videoChannel) parts.push(`Channel: ${metadata.videoChannel}`);

  if (metadata.educationalIndicators > 0) parts.push(`Educational Content Score: ${metadata.educationalIndicators}`);
  if (metadata.entertainmentIndicators > 0) parts.push(`Entertainment Content Score: ${metadata.entertainmentIndicators}`);

  if (!metadata.videoTitle && metadata.title) parts.push(`Page Title: ${metadata.title}`);
  if (!metadata.videoDescription && metadata.description) parts.push(`Description: ${metadata.description.slice(0, 200)}`);

  if (metadata.keywords.length > 0) parts.push(`Keywords: ${metadata.keywords.slice(0, 10).join(' ')}`);
  if (metadata.extractedText && !metadata.videoTitle) parts.push(`Content: ${metadata.extractedText.slice(0, 200)}`);
  if (metadata.contentQualityScore > 0) parts.push(`Quality Score: ${metadata.contentQualityScore.toFixed(2)}`);

  if (parts.length > 0) return parts.join(' | ');

  const bare = metadata.url.includes('://') ? metadata.url.split('://')[1] : metadata.url;
  return `Website: ${bare.replace(/[/_-]/g, ' ')}`;
}

export function structuralFeatures(metadata: PageMetadata): number[] {
  const target = parseTarget(metadata.url);
  const { host, path, query, urlLower } = target;
  const has = (...needles: string[]) => (needles.some(n => path.includes(n)) ? 1 : 0);

  return [
    host ? host.split('.').length : 0,
    host.endsWith('.edu') ? 1 : 0,
    host.endsWith('.org') ? 1 : 0,
    host.endsWith('.gov') ? 1 : 0,
    host.includes('docs') || host.includes('documentation') ? 1 : 0,
    path ? path.split('/').length : 0,
    has('/watch', '/video'),
    has('/article', '/post', '/blog'),
    has('/search', '/results'),
    has('/user', '/profile'),
    new Set(query.keys()).size,
    query.has('q') || query.has('search') ? 1 : 0,
    urlLower.length,
    countOf(urlLower, '&'),
    urlLower.includes('https') ? 1 : 0
  ];
}

export function contentFeatures(metadata: PageMetadata, mission: Mission | undefined): number[] {
  const educational = metadata.educationalIndicators;
  const entertainment = metadata.entertainmentIndicators;

  let ratio: number;
  if (entertainment > 0) {
    ratio = Math.min(educational / entertainment, 5) / 5;
  } else {
    ratio = educational > 0 ? 1 : 0;
  }

  const keywords = missionKeywords(mission);
  const title = (metadata.videoTitle || metadata.title).toLowerCase();
  const description = (metadata.videoDescription || metadata.description).toLowerCase();
  const titleMatches = keywords.filter(k => title.includes(k)).length;
  const descriptionMatches = keywords.filter(k => description.includes(k)).length;

  return [
    metadata.title ? 1 : 0,
    metadata.description ? 1 : 0,
    metadata.keywords.length,
    metadata.contentLength / 10000,
    metadata.videoTitle ? 1 : 0,
    metadata.videoDescription ? 1 : 0,
    metadata.videoChannel ? 1 : 0,
    Math.min(educational / 10, 1),
    Math.min(entertainment / 10, 1),
    metadata.contentQualityScore,
    ratio,
    Math.min(titleMatches / 3, 1),
    Math.min(descriptionMatches / 5, 1),
    metadata.hasVideo ? 1 : 0,
    metadata.hasForms ? 1 : 0
  ];
}

/** Hour and weekday are read in UTC so the vector depends on the instant, not the host timezone. */
export function temporalFeatures(now: Date): number[] {
  const hour = now.getUTCHours();
  // Monday = 0 through Sunday = 6
  const weekday = (now.getUTCDay() + 6) % 7;
  return [hour / 23, weekday / 6, hour >= 9 && hour <= 17 ? 1 : 0, weekday >= 5 ? 1 : 0];
}

function compute(metadata: PageMetadata, mission: Mission | undefined, now: Date): Float32Array {
  const missionText = mission?.missionText ?? '';
  const values = [
    ...urlTextBlock(metadata.url),
    ...missionTextBlock(missionText),
    ...contentTextBlock(contentText(metadata)),
    ...structuralFeatures(metadata),
    ...contentFeatures(metadata, mission),
    ...temporalFeatures(now)
  ];

  if (values.length !== FEATURE_DIMENSION || values.some(v => !Number.isFinite(v))) {
    throw new ExtractionError(`Feature vector for ${metadata.url} is malformed`);
  }
  return Float32Array.from(values);
}

/**
 * Builds the classifier input for a page. Always returns a vector of
 * {@link FEATURE_DIMENSION} values; if anything in the input cannot be used the
 * vector falls back to the features of the bare URL, then to zeros.
 */
export function extractFeatures(
  metadata: PageMetadata,
  mission: Mission | undefined,
  options: ExtractOptions = {}
): Float32Array {
  const now = options.now ?? new Date();

  try {
    return compute(metadata, mission, now);
  } catch (err) {
    options.logger?.debug({ url: metadata.url, err: describeError(err) }, 'Feature extraction degraded');
  }

  try {
    return compute(basicMetadata(metadata.url), mission, now);
  } catch (err) {
    options.logger?.debug({ url: metadata.url, err: describeError(err) }, 'Using neutral feature vector');
    return new Float32Array(FEATURE_DIMENSION);
  }
}

export function extractUrlFeatures(url: string, mission: Mission | undefined, options: ExtractOptions = {}): Float32Array {
  return extractFeatures(basicMetadata(url), mission, options);
}
