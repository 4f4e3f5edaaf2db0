import { readFile } from 'node:fs/promises';
import type { AutomationConfig } from '../types/index.js';
import { AutomationConfigSchema } from '../schemas/index.js';

export const DEFAULT_CONFIG: AutomationConfig = AutomationConfigSchema.parse({});

/**
 * Read a JSON config file and fill in defaults. Without a path the defaults
 * are returned as-is. `overrides` win over the file.
 */
export async function loadAutomationConfig(
  path?: string,
  overrides: Partial<Omit<AutomationConfig, 'timeouts'>> = {},
): Promise<AutomationConfig> {
  const fromFile: unknown = path ? JSON.parse(await readFile(path, 'utf-8')) : {};
  const base = AutomationConfigSchema.parse(fromFile);
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  return AutomationConfigSchema.parse({ ...base, ...defined });
}
