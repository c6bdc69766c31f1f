/**
 * Hardware output volume exposed as an observable scalar in [0, 1].
 *
 * The launcher reads a volume change as a "go home" press because the platform
 * has no event for the volume buttons themselves. Any other cause of a change
 * (a media app adjusting its own level, a script calling `setVolume`) dismisses
 * the foreground app as well; the signal carries no information about the cause.
 */
export type VolumeSignal = {
  currentVolume: () => number;
  subscribe: (onChange: (volume: number) => void) => () => void;
};

export type ManualVolumeSignal = VolumeSignal & {
  setVolume: (volume: number) => void;
};

// iOS moves the output level in sixteen discrete steps per button press.
export const VOLUME_STEP = 1 / 16;
export const DEFAULT_VOLUME_EPSILON = 0.001;

export function clampVolume(value: number) {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

// Browsers do not expose the device output level, so the springboard keeps its
// own and moves it from the simulated side buttons.
export function createManualVolumeSignal(initialVolume = 0.5): ManualVolumeSignal {
  let volume = clampVolume(initialVolume);
  const listeners = new Set<(volume: number) => void>();

  return {
    currentVolume: () => volume,
    subscribe(onChange) {
      listeners.add(onChange);
      return () => {
        listeners.delete(onChange);
      };
    },
    setVolume(next) {
      const clamped = clampVolume(next);
      if (clamped === volume) return;
      volume = clamped;
      for (const listener of [...listeners]) {
        listener(volume);
      }
    },
  };
}
