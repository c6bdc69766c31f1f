import { createContext, useContext } from 'react';

import { DEFAULT_SETTINGS, type LauncherSettings } from '../types/settings';

export type LauncherSettingsContextValue = {
  settings: LauncherSettings;
  onSettingChange: (partial: Partial<LauncherSettings>) => Promise<void>;
};

export const LauncherSettingsContext = createContext<LauncherSettingsContextValue>({
  settings: DEFAULT_SETTINGS,
  onSettingChange: async () => {},
});

export function useLauncherSettings() {
  return useContext(LauncherSettingsContext);
}
