import { loadConfig, type HarnessConfig } from '../config/index.js';
import { loadSettings, SettingsResolver } from '../settings/index.js';

export interface Session {
  config: HarnessConfig;
  settings: SettingsResolver;
}

/**
 * Environment configuration plus the settings file it points at.
 * An explicit path wins over VIRTWHO_HARNESS_SETTINGS.
 */
export async function openSession(settingsPath?: string): Promise<Session> {
  const config = loadConfig();
  const settings = await loadSettings(settingsPath ?? config.settingsPath);
  return { config, settings: new SettingsResolver(settings) };
}
