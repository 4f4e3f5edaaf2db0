import { z } from 'zod';

export const TimeoutsSchema = z.object({
  elementMs: z.number().int().positive().default(10_000),
  spinnerMs: z.number().int().positive().default(120_000),
  extractionMasterMs: z.number().int().positive().default(300_000),
  stabilityDelayMs: z.number().int().positive().default(4_000),
  pollIntervalMs: z.number().int().positive().default(500),
  runMs: z.number().int().positive().default(900_000),
});

export const AutomationConfigSchema = z.object({
  url: z.string().url().default('https://notebooklm.google.com/'),
  headless: z.boolean().default(false),
  profileDir: z.string().default('.profile/notebook'),
  runDir: z.string().default('runs'),
  debug: z.boolean().default(false),
  selectorsPath: z.string().optional(),
  timeouts: TimeoutsSchema.default({}),
});
