export type WallpaperPreset = 'blueViolet' | 'sunset' | 'graphite';

export type LauncherSettings = {
  volumeGestureEnabled: boolean;
  volumeEpsilon: number;
  homePageCount: number;
  showDockLabels: boolean;
  wallpaper: WallpaperPreset;
};

export const DEFAULT_SETTINGS: LauncherSettings = {
  volumeGestureEnabled: true,
  volumeEpsilon: 0.001,
  homePageCount: 2,
  showDockLabels: false,
  wallpaper: 'blueViolet',
};

export const WALLPAPER_GRADIENTS: Record<WallpaperPreset, string> = {
  blueViolet: 'linear-gradient(135deg, rgb(51 128 230), rgb(102 51 204))',
  sunset: 'linear-gradient(135deg, #f6d365, #fda085)',
  graphite: 'linear-gradient(135deg, #434343, #1c1c1e)',
};
