/**
 * Settings Store - provider, model and API key, persisted as JSON in the home directory
 */
import { mkdir, readFile, writeFile, chmod } from 'node:fs/promises';
import { dirname } from 'node:path';
import { isProviderId, type ProviderId } from '../types/chat.js';

export interface Settings {
  provider: ProviderId;
  model: string;
  apiKey: string;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  provider: 'anthropic',
  model: 'claude-3-sonnet-20240229',
  apiKey: '',
});

export type SettingsValidation =
  | { valid: true; settings: Settings }
  | { valid: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a settings payload. Missing fields fall back to `base`.
 */
export function validateSettings(input: unknown, base: Readonly<Settings> = DEFAULT_SETTINGS): SettingsValidation {
  if (!isRecord(input)) {
    return { valid: false, error: 'Settings must be a JSON object' };
  }

  const provider = input.provider ?? base.provider;
  if (typeof provider !== 'string' || !isProviderId(provider)) {
    return { valid: false, error: `Unsupported provider: ${String(provider)}` };
  }

  const model = input.model ?? base.model;
  if (typeof model !== 'string' || model.trim().length === 0) {
    return { valid: false, error: 'Model is required' };
  }

  const apiKey = input.apiKey ?? base.apiKey;
  if (typeof apiKey !== 'string') {
    return { valid: false, error: 'API key must be a string' };
  }

  return { valid: true, settings: { provider, model: model.trim(), apiKey: apiKey.trim() } };
}

export class SettingsStore {
  private current: Readonly<Settings> = DEFAULT_SETTINGS;

  constructor(readonly filePath: string) {}

  /**
   * Read the settings file. A missing file leaves the defaults in place.
   */
  async load(): Promise<Readonly<Settings>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        console.log(`[Settings] No settings file at ${this.filePath}, using defaults`);
        this.current = DEFAULT_SETTINGS;
        return this.current;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Settings file ${this.filePath} is not valid JSON`, { cause: error });
    }

    const result = validateSettings(parsed);
    if (!result.valid) {
      throw new Error(`Settings file ${this.filePath} is invalid: ${result.error}`);
    }
    this.current = Object.freeze(result.settings);
    return this.current;
  }

  /**
   * Snapshot of the settings in effect. Never mutated after it is handed out.
   */
  get(): Readonly<Settings> {
    return this.current;
  }

  async update(partial: unknown): Promise<SettingsValidation> {
    const result = validateSettings(partial, this.current);
    if (!result.valid) return result;

    await this.save(result.settings);
    const reloaded = await this.load();
    return { valid: true, settings: { ...reloaded } };
  }

  async save(settings: Settings = this.current): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(settings, null, 2)}\n`, { mode: 0o600 });
    // mode only applies when the file is created
    await chmod(this.filePath, 0o600);
    this.current = Object.freeze({ ...settings });
    console.log(`[Settings] Saved settings (provider: ${settings.provider}, model: ${settings.model})`);
  }
}
