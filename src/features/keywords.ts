import type { Mission } from '../types/index.js';

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'with', 'about', 'that', 'this', 'from', 'into', 'your', 'their', 'there',
  'then', 'have', 'will', 'should', 'would', 'could', 'what', 'when', 'where', 'why', 'how', 'make',
  'create', 'work', 'task', 'focus', 'session', 'goal', 'doing', 'do', 'on', 'to', 'of', 'in', 'at',
  'a', 'an'
]);

const MAX_DERIVED_KEYWORDS = 20;
const EDGE_PUNCTUATION = /^[.,:;!?'"()[\]{}]+|[.,:;!?'"()[\]{}]+$/g;

/**
 * Keywords used to judge whether page text lines up with the mission: significant words of
 * the mission text, their adjacent pairs, then any explicitly allowed keywords.
 */
export function missionKeywords(mission: Mission | undefined): string[] {
  if (!mission) return [];

  const base = mission.missionText
    .toLowerCase()
    .split(/\s+/)
    .map(token => token.replace(EDGE_PUNCTUATION, ''))
    .filter(token => token.length >= 3 && !STOP_WORDS.has(token));

  const bigrams: string[] = [];
  for (let i = 0; i < base.length - 1; i++) {
    bigrams.push(`${base[i]} ${base[i + 1]}`);
  }

  const derived = [...new Set([...base, ...bigrams])].slice(0, MAX_DERIVED_KEYWORDS);
  const explicit = mission.allowedKeywords.map(k => k.trim().toLowerCase()).filter(Boolean);

  return [...new Set([...derived, ...explicit])];
}

export function textMatchesMission(text: string, keywords: string[]): boolean {
  if (!text) return false;
  const lower = text.toLowerCase();
  return keywords.some(keyword => lower.includes(keyword));
}
