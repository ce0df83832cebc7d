import { describe, it, expect } from 'vitest';
import { DEFAULT_VERDICT, loadPolicyProfile, policyProfileSchema, runRuleTier } from '../index.js';
import { pathPrefixMatches } from '../tier2-infrastructure.js';
import { parseTarget } from '../../features/target.js';
import { missionFromTask, type Mission } from '../../types/index.js';

const policy = loadPolicyProfile();
const rustMission = missionFromTask('learn rust ownership');

function verdict(url: string, mission?: Mission, pageText?: string) {
  return runRuleTier({ target: parseTarget(url), mission, pageText }, policy);
}

describe('runRuleTier', () => {
  it('allows curated educational domains', () => {
    expect(verdict('https://github.com/user/repo')).toEqual({
      action: 'allow',
      tier: 'educational',
      reason: 'educational domain github.com'
    });
  });

  it('blocks short-form video', () => {
    expect(verdict('https://www.youtube.com/shorts/abc123')).toMatchObject({ action: 'block', tier: 'short-form' });
    expect(verdict('https://www.instagram.com/reel/xyz/')).toMatchObject({ action: 'block', tier: 'short-form' });
  });

  it('blocks short-form markers before any platform allow', () => {
    expect(verdict('https://www.youtube.com/watch?v=abc&el=shortspage', rustMission, 'Rust ownership')).toMatchObject({
      action: 'block',
      tier: 'short-form'
    });
  });

  it('allows streaming infrastructure by domain and endpoint', () => {
    expect(verdict('https://i.ytimg.com/vi/abc/hq.jpg')).toMatchObject({ action: 'allow', tier: 'infrastructure' });
    expect(verdict('https://www.youtube.com/embed/xyz')).toEqual({
      action: 'allow',
      tier: 'infrastructure',
      reason: 'infrastructure endpoint youtube.com/embed'
    });
  });

  it('lets an earlier allow tier win over a later block tier', () => {
    expect(verdict('https://gist.github.com/feed')).toMatchObject({ action: 'allow', tier: 'educational' });
  });

  it('blocks distraction domains including subdomains', () => {
    expect(verdict('https://old.reddit.com/r/all')).toEqual({
      action: 'block',
      tier: 'distraction',
      reason: 'distraction domain reddit.com'
    });
  });

  it('blocks feed pages by site prefix and by path segment', () => {
    expect(verdict('https://x.com/home')).toEqual({ action: 'block', tier: 'feed', reason: 'feed page x.com/home' });
    expect(verdict('https://news.example.com/feed')).toEqual({
      action: 'block',
      tier: 'feed',
      reason: 'feed path segment /feed'
    });
  });

  it('does not treat a substring of a path segment as a feed', () => {
    expect(verdict('https://example.com/feedback')).toEqual(DEFAULT_VERDICT);
  });

  describe('platform watch pages', () => {
    const watch = 'https://www.youtube.com/watch?v=abc';

    it('allows pages aligned with the mission', () => {
      expect(verdict(watch, rustMission, 'Rust ownership in depth')).toEqual({
        action: 'allow',
        tier: 'platform',
        reason: 'youtube.com watch page aligned with mission'
      });
    });

    it('blocks pages unrelated to the mission', () => {
      expect(verdict(watch, rustMission, 'Funny cat compilation')).toEqual({
        action: 'block',
        tier: 'platform',
        reason: 'youtube.com watch page not aligned with mission'
      });
    });

    it('allows when there is no page text to judge', () => {
      expect(verdict(watch, rustMission)).toMatchObject({ action: 'allow', tier: 'platform' });
    });

    it('allows when there is no mission', () => {
      expect(verdict(watch, undefined, 'Funny cat compilation')).toEqual({
        action: 'allow',
        tier: 'platform',
        reason: 'youtube.com watch page without mission'
      });
    });

    it('allows educational keywords in the URL', () => {
      expect(verdict('https://www.youtube.com/watch?v=abc&list=tutorial', rustMission, 'Funny cat compilation')).toEqual({
        action: 'allow',
        tier: 'platform',
        reason: 'youtube.com educational keyword "tutorial"'
      });
    });

    it('allows non-watch platform pages', () => {
      expect(verdict('https://www.youtube.com/about')).toMatchObject({ action: 'allow', tier: 'platform' });
    });
  });

  it('allows search engines', () => {
    expect(verdict('https://duckduckgo.com/?q=rust')).toEqual({
      action: 'allow',
      tier: 'search',
      reason: 'search engine duckduckgo.com'
    });
  });

  it('allows domains the mission names', () => {
    const mission: Mission = { missionText: 'write docs', allowedDomains: ['www.Example.com'], allowedKeywords: [] };
    expect(verdict('https://docs.example.com/a', mission)).toEqual({
      action: 'allow',
      tier: 'educational',
      reason: 'mission-allowed domain example.com'
    });
  });

  it('falls through to the default allow', () => {
    expect(verdict('https://example.com/page')).toEqual(DEFAULT_VERDICT);
  });

  it('treats malformed URLs as unknown', () => {
    expect(verdict('not a url at all')).toEqual(DEFAULT_VERDICT);
  });
});

describe('pathPrefixMatches', () => {
  it('matches whole path segments only', () => {
    expect(pathPrefixMatches('youtube.com/c', 'youtube.com/c')).toBe(true);
    expect(pathPrefixMatches('youtube.com/c/somebody', 'youtube.com/c')).toBe(true);
    expect(pathPrefixMatches('youtube.com/codes', 'youtube.com/c')).toBe(false);
  });
});

describe('policyProfileSchema', () => {
  it('normalises domain lists and fills missing sections', () => {
    const profile = policyProfileSchema.parse({
      name: 'minimal',
      version: '0.1.0',
      distraction_domains: [' Example.COM ']
    });
    expect(profile.distraction_domains).toEqual(['example.com']);
    expect(profile.feed).toEqual({ site_prefixes: [], path_segments: [] });
    expect(profile.short_form).toEqual([]);
  });
});
