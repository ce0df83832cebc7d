import { featureHash } from '../crypto/index.js';

export const TEXT_BLOCK_SIZE = 384;
const COUNT_SLOTS = 50;
const INDICATOR_SLOTS = 100;
const HASH_SLOTS = 234;

export function countOf(text: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let index = text.indexOf(needle);
  while (index !== -1) {
    count++;
    index = text.indexOf(needle, index + needle.length);
  }
  return count;
}

function flag(condition: boolean): number {
  return condition ? 1 : 0;
}

function charClasses(text: string): { alpha: number; digit: number; other: number } {
  let alpha = 0;
  let digit = 0;
  let other = 0;
  for (const ch of text) {
    if (/\p{L}/u.test(ch)) alpha++;
    else if (/\p{N}/u.test(ch)) digit++;
    else other++;
  }
  return { alpha, digit, other };
}

function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

function presentCount(text: string, terms: string[]): number {
  return terms.filter(term => text.includes(term)).length;
}

function padTo(values: number[], size: number): number[] {
  const out = values.slice(0, size);
  while (out.length < size) out.push(0);
  return out;
}

function hashedTokens(prefix: string, tokens: string[]): number[] {
  const out: number[] = [];
  for (let i = 0; i < HASH_SLOTS; i++) {
    out.push(featureHash(`${prefix}_${i}_${tokens[i] ?? 'empty'}`));
  }
  return out;
}

function assemble(counts: number[], indicators: number[], hashed: number[]): number[] {
  return [...padTo(counts, COUNT_SLOTS), ...padTo(indicators, INDICATOR_SLOTS), ...hashed];
}

export function urlTextBlock(url: string): number[] {
  const lower = url.toLowerCase();
  const chars = charClasses(lower);

  const counts = [
    url.length, lower.split('/').length, lower.split('.').length,
    countOf(lower, '/'), countOf(lower, '?'), countOf(lower, '&'),
    countOf(lower, '='), countOf(lower, '-'), countOf(lower, '_'),
    countOf(lower, '%'), lower.split('?')[0].length,
    flag(lower.includes('https')), flag(lower.includes('www')),
    flag(lower.includes('.com')), flag(lower.includes('.org')),
    flag(lower.includes('.edu')), flag(lower.includes('.gov')),
    chars.alpha, chars.digit, chars.other
  ];

  const indicators = [
    countOf(lower, 'youtube'), countOf(lower, 'reddit'), countOf(lower, 'github'),
    countOf(lower, 'stackoverflow'), countOf(lower, 'wikipedia'), countOf(lower, 'docs'),
    countOf(lower, 'learn'), countOf(lower, 'tutorial'), countOf(lower, 'course'),
    countOf(lower, 'video'), countOf(lower, 'watch'), countOf(lower, 'search'),
    flag(['api', 'doc', 'guide'].some(t => lower.includes(t))),
    flag(['game', 'play', 'fun'].some(t => lower.includes(t))),
    countOf(lower, '/')
  ];

  // The whole URL hashes as one phrase of its first five words in every slot
  const phrase = words(lower.replace(/[^a-z0-9]/g, ' ')).slice(0, 5).join(' ');
  const hashed: number[] = [];
  for (let i = 0; i < HASH_SLOTS; i++) {
    hashed.push(featureHash(`url_${i}_${phrase}`));
  }

  return assemble(counts, indicators, hashed);
}

export function missionTextBlock(mission: string): number[] {
  const lower = mission.toLowerCase();
  const tokens = words(lower);
  const chars = charClasses(lower);
  const lengths = tokens.map(w => w.length);

  const counts = [
    mission.length, tokens.length, new Set(tokens).size,
    countOf(lower, ' '), countOf(lower, '.'), countOf(lower, ','),
    countOf(lower, '!'), countOf(lower, '?'), countOf(lower, ';'),
    countOf(lower, ':'), chars.alpha, chars.digit, chars.other,
    lengths.reduce((a, b) => a + b, 0) / Math.max(tokens.length, 1),
    lengths.length ? Math.max(...lengths) : 0
  ];

  const indicators = [
    presentCount(lower, ['learn', 'study', 'understand', 'master', 'tutorial']),
    presentCount(lower, ['work', 'job', 'project', 'task', 'complete']),
    presentCount(lower, ['create', 'build', 'develop', 'design', 'make']),
    presentCount(lower, ['research', 'find', 'information', 'data', 'explore']),
    presentCount(lower, ['skill', 'practice', 'improve', 'training', 'course']),
    tokens.length,
    countOf(lower, '?'),
    countOf(lower, '.')
  ];

  return assemble(counts, indicators, hashedTokens('mission', tokens));
}

export function contentTextBlock(content: string): number[] {
  const lower = content.toLowerCase();
  const tokens = words(lower);
  const sentences = lower.split('.');
  const chars = charClasses(lower);
  const lengths = tokens.map(w => w.length);
  const longest = lengths.length ? Math.max(...lengths) : 0;

  const counts = [
    content.length, tokens.length, new Set(tokens).size, sentences.length,
    countOf(lower, ' '), countOf(lower, '.'), countOf(lower, ','),
    countOf(lower, '!'), countOf(lower, '?'), countOf(lower, ':'),
    countOf(lower, ';'), countOf(lower, '"'), countOf(lower, "'"),
    chars.alpha, chars.digit,
    lengths.reduce((a, b) => a + b, 0) / Math.max(tokens.length, 1),
    longest,
    lengths.filter(l => l > 10).length,
    countOf(lower, 'http'), countOf(lower, 'www')
  ];

  const indicators = [
    presentCount(lower, ['title', 'heading', 'header']),
    presentCount(lower, ['description', 'summary', 'about']),
    presentCount(lower, ['tutorial', 'guide', 'how to', 'step']),
    presentCount(lower, ['documentation', 'docs', 'api', 'reference']),
    presentCount(lower, ['learn', 'course', 'lesson', 'education']),
    flag(lower.includes('•') || countOf(lower, '-') > 3),
    flag(lower.includes('code') || lower.includes('function')),
    countOf(lower, '?') / Math.max(tokens.length, 1),
    sentences.length,
    longest
  ];

  return assemble(counts, indicators, hashedTokens('content', tokens.slice(0, 20)));
}
