import axios from 'axios';
import { z } from 'zod';
import type { AppConfig } from './config';
import { parseStrategyName, StrategyName } from './game/strategies';

type SettingsSource = Pick<AppConfig, 'cloudHostName' | 'packageName' | 'defaultStrategy'>;

interface UserSettings {
  strategy: StrategyName;
}

const settingsResponseSchema = z.object({
  settings: z.array(z.object({
    key: z.string(),
    value: z.unknown(),
  })),
});

// Store user settings in memory
const userSettingsMap = new Map<string, UserSettings>();

function defaultsFor(source: SettingsSource): UserSettings {
  return { strategy: source.defaultStrategy };
}

/**
 * Fetches a user's settings from the cloud and caches them.
 * Falls back to the configured defaults when the request or the payload is bad.
 */
async function fetchSettings(userId: string, source: SettingsSource): Promise<UserSettings> {
  try {
    const response = await axios.get<unknown>(
      `http://${source.cloudHostName}/tpasettings/user/${source.packageName}`,
      { headers: { Authorization: `Bearer ${userId}` } },
    );

    const { settings } = settingsResponseSchema.parse(response.data);
    console.log(`Fetched settings for userId ${userId}:`, settings);

    const strategySetting = settings.find(s => s.key === 'strategy');
    const strategy = typeof strategySetting?.value === 'string'
      ? parseStrategyName(strategySetting.value)
      : null;

    const userSettings: UserSettings = {
      strategy: strategy ?? source.defaultStrategy,
    };

    userSettingsMap.set(userId, userSettings);
    console.log(`Settings for user ${userId}:`, userSettings);

    return userSettings;
  } catch (err) {
    console.error(`Error fetching settings for userId ${userId}:`, err);

    const fallback = defaultsFor(source);
    userSettingsMap.set(userId, fallback);
    return fallback;
  }
}

function getUserSettings(userId: string, source: SettingsSource): UserSettings {
  return userSettingsMap.get(userId) ?? defaultsFor(source);
}

/**
 * Gets the strategy a user picked, or the configured default.
 */
function getUserStrategy(userId: string, source: SettingsSource): StrategyName {
  return getUserSettings(userId, source).strategy;
}

function clearSettings(): void {
  userSettingsMap.clear();
}

export {
  fetchSettings,
  getUserSettings,
  getUserStrategy,
  clearSettings,
  type SettingsSource,
  type UserSettings,
};
