import { readFileSync, existsSync } from 'fs';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const domainList = z.array(z.string().trim().toLowerCase()).default([]);

export const policyProfileSchema = z.object({
  name: z.string(),
  version: z.string(),
  short_form: z.array(z.object({ domain: z.string().toLowerCase(), markers: domainList })).default([]),
  infrastructure: z
    .object({ domains: domainList, path_prefixes: domainList })
    .default({}),
  educational_domains: domainList,
  distraction_domains: domainList,
  feed: z
    .object({ site_prefixes: domainList, path_segments: domainList })
    .default({}),
  platforms: z
    .array(
      z.object({
        domain: z.string().toLowerCase(),
        watch_paths: domainList,
        educational_keywords: domainList
      })
    )
    .default([]),
  search_engines: domainList
});

export type PolicyProfile = z.infer<typeof policyProfileSchema>;

export const DEFAULT_POLICY_PATH = fileURLToPath(new URL('../../policies/default.yaml', import.meta.url));

export function loadPolicyProfile(path: string = DEFAULT_POLICY_PATH): PolicyProfile {
  const policyPath = existsSync(path) ? path : DEFAULT_POLICY_PATH;
  const content = readFileSync(policyPath, 'utf-8');
  return policyProfileSchema.parse(parseYaml(content));
}
