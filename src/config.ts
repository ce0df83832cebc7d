import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_POLICY_PATH } from './rules/index.js';

const defaultDataDir = resolve(homedir(), '.focus-gate');

export const configSchema = z.object({
  server: z
    .object({
      port: z.number().int().positive().default(8088),
      host: z.string().default('127.0.0.1')
    })
    .default({}),
  auth: z
    .object({
      allowed_origins: z.array(z.string()).default(['http://localhost:*'])
    })
    .default({}),
  rate_limits: z
    .object({
      requests_per_minute: z.number().int().positive().default(6000)
    })
    .default({}),
  data_dir: z.string().default(defaultDataDir),
  policy: z
    .object({
      file: z.string().default(DEFAULT_POLICY_PATH)
    })
    .default({}),
  classifier: z
    .object({
      weights: z.string().optional(),
      threshold: z.number().min(0).max(1).default(0.5)
    })
    .default({}),
  cache: z
    .object({
      ttl_seconds: z.number().positive().default(300)
    })
    .default({}),
  stats: z
    .object({
      flush_every: z.number().int().positive().default(100)
    })
    .default({}),
  fetch: z
    .object({
      timeout_ms: z.number().int().positive().default(2000),
      max_concurrent: z.number().int().positive().default(3)
    })
    .default({}),
  session: z
    .object({
      check_interval_ms: z.number().int().positive().default(5000),
      expiry_interval_ms: z.number().int().positive().default(1000),
      max_restart_attempts: z.number().int().nonnegative().default(10),
      startup_grace_ms: z.number().int().nonnegative().default(3000),
      kill_timeout_ms: z.number().int().positive().default(10000)
    })
    .default({}),
  enforcement: z
    .object({
      command: z.string().default('mitmdump'),
      args: z.array(z.string()).default([]),
      port: z.number().int().positive().default(8080)
    })
    .default({}),
  logging: z
    .object({
      level: z.string().default('info'),
      pretty: z.boolean().default(true)
    })
    .default({})
});

export type FocusGateConfig = z.infer<typeof configSchema>;

export function configPaths(): string[] {
  const paths = [
    resolve(process.cwd(), 'focus-gate.yaml'),
    resolve(homedir(), '.focus-gate', 'config.yaml'),
    resolve(homedir(), '.config', 'focus-gate', 'config.yaml')
  ];
  const explicit = process.env.FOCUS_GATE_CONFIG;
  return explicit ? [resolve(explicit), ...paths] : paths;
}

export function parseConfig(content: string): FocusGateConfig {
  return configSchema.parse(parseYaml(content) ?? {});
}

export function loadConfig(paths: string[] = configPaths()): FocusGateConfig {
  for (const path of paths) {
    if (existsSync(path)) {
      return parseConfig(readFileSync(path, 'utf-8'));
    }
  }

  return configSchema.parse({});
}

export function dataPath(config: FocusGateConfig, ...segments: string[]): string {
  return resolve(config.data_dir, ...segments);
}
