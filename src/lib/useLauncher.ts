import { useSyncExternalStore } from 'react';

import type { Launcher } from './launcher';

export function useLauncherState(launcher: Launcher) {
  return useSyncExternalStore(launcher.subscribe, launcher.getState, launcher.getState);
}
