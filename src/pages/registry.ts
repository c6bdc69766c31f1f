import type { ComponentType } from 'react';

import { isAppId } from '../lib/appCatalog';
import type { AppId } from '../types/apps';
import { CalculatorPage } from './CalculatorPage';
import { ClockPage } from './ClockPage';
import { ComingSoonScreen } from './ComingSoonScreen';
import type { LeafScreenProps } from './leafScreen';
import { NotesPage } from './NotesPage';
import { SettingsPage } from './SettingsPage';
import { WeatherPage } from './WeatherPage';

export type LeafScreenRegistry = Partial<Record<AppId, ComponentType<LeafScreenProps>>>;

// Apps without an entry open the "coming soon" placeholder; the catalog can
// list an app before its screen exists.
export const LEAF_SCREENS: LeafScreenRegistry = {
  weather: WeatherPage,
  calculator: CalculatorPage,
  notes: NotesPage,
  clock: ClockPage,
  settings: SettingsPage,
};

export function resolveLeafScreen(id: string, registry: LeafScreenRegistry = LEAF_SCREENS) {
  return (isAppId(id) ? registry[id] : undefined) ?? ComingSoonScreen;
}
