import { getDb } from '../db';

import type { LauncherSettings, WallpaperPreset } from '../../types/settings';
import { DEFAULT_SETTINGS } from '../../types/settings';

function clampNumber(value: unknown, min: number, max: number, fallback: number) {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return fallback;
  }

  return Math.min(max, Math.max(min, value));
}

function normalizeBoolean(value: unknown, fallback: boolean) {
  return typeof value === 'boolean' ? value : fallback;
}

function normalizeWallpaper(value: unknown, fallback: WallpaperPreset): WallpaperPreset {
  return value === 'blueViolet' || value === 'sunset' || value === 'graphite' ? value : fallback;
}

export function normalizeSettings(persisted: Partial<Record<keyof LauncherSettings, unknown>>): LauncherSettings {
  return {
    volumeGestureEnabled: normalizeBoolean(persisted.volumeGestureEnabled, DEFAULT_SETTINGS.volumeGestureEnabled),
    // Must stay below one hardware step (1/16) and above float noise.
    volumeEpsilon: clampNumber(persisted.volumeEpsilon, 0.0001, 0.05, DEFAULT_SETTINGS.volumeEpsilon),
    homePageCount: Math.round(clampNumber(persisted.homePageCount, 1, 5, DEFAULT_SETTINGS.homePageCount)),
    showDockLabels: normalizeBoolean(persisted.showDockLabels, DEFAULT_SETTINGS.showDockLabels),
    wallpaper: normalizeWallpaper(persisted.wallpaper, DEFAULT_SETTINGS.wallpaper),
  };
}

export async function getSettings() {
  const db = await getDb();
  const row = await db.get('settings', 'launcher');

  return normalizeSettings(row?.value ?? {});
}

// Read and write share one readwrite transaction; overlapping saves queue.
export async function saveSettings(partial: Partial<LauncherSettings>) {
  const db = await getDb();
  const tx = db.transaction('settings', 'readwrite');
  const row = await tx.store.get('launcher');
  const next = normalizeSettings({
    ...normalizeSettings(row?.value ?? {}),
    ...partial,
  });

  await tx.store.put({
    key: 'launcher',
    value: next,
  });
  await tx.done;

  return next;
}
