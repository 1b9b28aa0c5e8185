import type { AllocationPolicy } from '../config/allocationPolicy';
import type { PalletPolicy } from '../config/palletPolicy';
import {
  applySystemSettings,
  loadSystemSettings,
  saveSystemSettings,
  type SystemSettings
} from '../config/systemSettings';

export type EffectivePolicies = {
  allocationPolicy: AllocationPolicy;
  palletPolicy: PalletPolicy;
};

/** Admin overrides on top of the env-derived policies, persisted to a JSON file. */
export class SystemSettingsService {
  private settings: SystemSettings = {};

  constructor(
    private readonly filePath: string,
    private readonly base: EffectivePolicies
  ) {}

  async load(): Promise<SystemSettings> {
    this.settings = await loadSystemSettings(this.filePath);
    return this.settings;
  }

  get(): SystemSettings {
    return this.settings;
  }

  async update(patch: SystemSettings): Promise<SystemSettings> {
    const next = { ...this.settings, ...patch };
    try {
      await saveSystemSettings(this.filePath, next);
    } catch (error) {
      throw new Error('SETTINGS_SAVE_FAILED', { cause: error });
    }
    this.settings = next;
    return next;
  }

  policies(): EffectivePolicies {
    return applySystemSettings(this.base.allocationPolicy, this.base.palletPolicy, this.settings);
  }
}
