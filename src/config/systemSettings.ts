import { readFile, writeFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { AllocationPolicy } from './allocationPolicy';
import { normalizePalletPolicy, type PalletPolicy } from './palletPolicy';

export const DEFAULT_SYSTEM_SETTINGS_PATH = path.join('data', 'system_config.json');

export const systemSettingsSchema = z.object({
  safetyStock: z.number().int().min(0).optional(),
  palletMaxHeight: z.number().positive().optional(),
  palletMaxWeight: z.number().positive().optional(),
  palletBaseWeight: z.number().min(0).optional()
});

export type SystemSettings = z.infer<typeof systemSettingsSchema>;

export function getSystemSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.SYSTEM_SETTINGS_PATH || DEFAULT_SYSTEM_SETTINGS_PATH;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads the admin settings file. A missing file means no overrides; an
 * unreadable or invalid one is logged and ignored so env defaults apply.
 */
export async function loadSystemSettings(
  filePath: string,
  logger: (message: string, details?: unknown) => void = console.warn
): Promise<SystemSettings> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    logger('SYSTEM_SETTINGS_INVALID', { filePath, message: error instanceof Error ? error.message : String(error) });
    return {};
  }

  const parsed = systemSettingsSchema.safeParse(json);
  if (!parsed.success) {
    logger('SYSTEM_SETTINGS_INVALID', { filePath, details: parsed.error.flatten() });
    return {};
  }
  return parsed.data;
}

export async function saveSystemSettings(filePath: string, settings: SystemSettings): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(settings, null, 2)}\n`, 'utf8');
}

export function applySystemSettings(
  allocation: AllocationPolicy,
  pallet: PalletPolicy,
  settings: SystemSettings
): { allocationPolicy: AllocationPolicy; palletPolicy: PalletPolicy } {
  return {
    allocationPolicy: {
      ...allocation,
      defaultSafetyStock: settings.safetyStock ?? allocation.defaultSafetyStock
    },
    palletPolicy: normalizePalletPolicy({
      ...pallet,
      maxPalletHeight: settings.palletMaxHeight ?? pallet.maxPalletHeight,
      maxPalletWeight: settings.palletMaxWeight ?? pallet.maxPalletWeight,
      palletBaseWeight: settings.palletBaseWeight ?? pallet.palletBaseWeight
    })
  };
}
