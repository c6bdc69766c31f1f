import type { AppDescriptor, DismissReason, LauncherState } from '../types/apps';
import { warn } from './log';
import { DEFAULT_VOLUME_EPSILON, type VolumeSignal } from './volumeSignal';

export type LauncherOptions = {
  volumeSignal?: VolumeSignal | null;
  volumeEpsilon?: number;
  volumeGestureEnabled?: boolean;
  onDismiss?: (app: AppDescriptor, reason: DismissReason) => void;
};

export type Launcher = {
  getState: () => LauncherState;
  subscribe: (listener: () => void) => () => void;
  launch: (app: AppDescriptor) => boolean;
  dismiss: (reason: DismissReason) => boolean;
  configure: (options: LauncherOptions) => void;
  getBaselineVolume: () => number | null;
  isVolumeGestureActive: () => boolean;
};

const HIDDEN: LauncherState = { status: 'hidden' };

export function createLauncher(initialOptions: LauncherOptions = {}): Launcher {
  let state: LauncherState = HIDDEN;
  let volumeSignal = initialOptions.volumeSignal ?? null;
  let volumeEpsilon = initialOptions.volumeEpsilon ?? DEFAULT_VOLUME_EPSILON;
  let volumeGestureEnabled = initialOptions.volumeGestureEnabled ?? true;
  let onDismiss = initialOptions.onDismiss;
  let baselineVolume: number | null = null;
  let releaseVolume: (() => void) | null = null;
  const listeners = new Set<() => void>();

  function setState(next: LauncherState) {
    state = next;
    for (const listener of [...listeners]) {
      listener();
    }
  }

  function detachVolume() {
    const release = releaseVolume;
    releaseVolume = null;
    baselineVolume = null;
    release?.();
  }

  function onVolumeChange(volume: number) {
    if (state.status !== 'presenting' || baselineVolume === null) return;
    if (Math.abs(volume - baselineVolume) > volumeEpsilon) {
      dismiss('volume');
    }
  }

  // Baseline is read before subscribing so the first change is measured
  // against this session's level, never a previous app's.
  function attachVolume() {
    if (!volumeGestureEnabled || !volumeSignal) return;
    try {
      baselineVolume = volumeSignal.currentVolume();
      releaseVolume = volumeSignal.subscribe(onVolumeChange);
    } catch (error) {
      detachVolume();
      warn('volume signal unavailable, home gesture disabled for this session', error);
    }
  }

  function launch(app: AppDescriptor) {
    if (state.status === 'presenting') {
      return false;
    }
    attachVolume();
    setState({ status: 'presenting', app });
    return true;
  }

  function dismiss(reason: DismissReason) {
    if (state.status === 'hidden') {
      return false;
    }
    const { app } = state;
    detachVolume();
    setState(HIDDEN);
    onDismiss?.(app, reason);
    return true;
  }

  function configure(options: LauncherOptions) {
    if (options.volumeEpsilon !== undefined) {
      volumeEpsilon = options.volumeEpsilon;
    }
    if (options.onDismiss !== undefined) {
      onDismiss = options.onDismiss;
    }

    const signalChanged = options.volumeSignal !== undefined && options.volumeSignal !== volumeSignal;
    const enabledChanged =
      options.volumeGestureEnabled !== undefined && options.volumeGestureEnabled !== volumeGestureEnabled;
    if (options.volumeSignal !== undefined) {
      volumeSignal = options.volumeSignal;
    }
    if (options.volumeGestureEnabled !== undefined) {
      volumeGestureEnabled = options.volumeGestureEnabled;
    }

    if ((signalChanged || enabledChanged) && state.status === 'presenting') {
      detachVolume();
      attachVolume();
    }
  }

  return {
    getState: () => state,
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    launch,
    dismiss,
    configure,
    getBaselineVolume: () => baselineVolume,
    isVolumeGestureActive: () => releaseVolume !== null,
  };
}
