import { z } from 'zod';

export const missionSchema = z.object({
  missionText: z.string().default(''),
  allowedDomains: z.array(z.string()).default([]),
  allowedKeywords: z.array(z.string()).default([])
});

export type Mission = z.infer<typeof missionSchema>;

export function missionFromTask(task: string): Mission {
  return { missionText: task, allowedDomains: [], allowedKeywords: [] };
}
