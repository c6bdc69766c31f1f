import { IOSSegmentRow, IOSSettingsGroup, IOSSubPageHeader, IOSToggleRow } from '../components/IOSSettings';
import { useLauncherSettings } from '../lib/settingsContext';
import type { WallpaperPreset } from '../types/settings';

const SENSITIVITY_OPTIONS: ReadonlyArray<{ value: number; label: string }> = [
  { value: 0.001, label: 'High' },
  { value: 0.01, label: 'Medium' },
  { value: 0.05, label: 'Low' },
];

const PAGE_COUNT_OPTIONS = [1, 2, 3].map((count) => ({ value: count, label: String(count) }));

const WALLPAPER_OPTIONS: ReadonlyArray<{ value: WallpaperPreset; label: string }> = [
  { value: 'blueViolet', label: 'Blue' },
  { value: 'sunset', label: 'Sunset' },
  { value: 'graphite', label: 'Graphite' },
];

export function SettingsPage() {
  const { settings, onSettingChange } = useLauncherSettings();

  return (
    <main className="h-full overflow-y-auto bg-black px-4 pb-10">
      <IOSSubPageHeader title="Settings" />

      <IOSSettingsGroup
        label="Volume Buttons"
        footer="Any change in output volume returns to the Home Screen, including changes an app makes on its own."
      >
        <IOSToggleRow
          label="Return Home on Volume Press"
          checked={settings.volumeGestureEnabled}
          onChange={(checked) => void onSettingChange({ volumeGestureEnabled: checked })}
        />
        <IOSSegmentRow
          label="Sensitivity"
          options={SENSITIVITY_OPTIONS}
          value={settings.volumeEpsilon}
          onChange={(value) => void onSettingChange({ volumeEpsilon: value })}
          last
        />
      </IOSSettingsGroup>

      <IOSSettingsGroup label="Home Screen">
        <IOSSegmentRow
          label="Pages"
          options={PAGE_COUNT_OPTIONS}
          value={settings.homePageCount}
          onChange={(value) => void onSettingChange({ homePageCount: value })}
        />
        <IOSToggleRow
          label="Dock Labels"
          checked={settings.showDockLabels}
          onChange={(checked) => void onSettingChange({ showDockLabels: checked })}
        />
        <IOSSegmentRow
          label="Wallpaper"
          options={WALLPAPER_OPTIONS}
          value={settings.wallpaper}
          onChange={(value) => void onSettingChange({ wallpaper: value })}
          last
        />
      </IOSSettingsGroup>
    </main>
  );
}
