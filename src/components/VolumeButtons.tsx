import { VOLUME_STEP, type ManualVolumeSignal } from '../lib/volumeSignal';

type VolumeButtonsProps = {
  signal: ManualVolumeSignal;
};

// Simulated side buttons on the device frame; each press moves one hardware step.
export function VolumeButtons({ signal }: VolumeButtonsProps) {
  const step = (direction: 1 | -1) => {
    signal.setVolume(signal.currentVolume() + direction * VOLUME_STEP);
  };

  return (
    <div className="fixed left-0 top-40 z-50 flex flex-col gap-3" aria-label="Volume buttons">
      <button
        type="button"
        onClick={() => step(1)}
        aria-label="Volume up"
        className="h-14 w-1.5 rounded-r-md bg-stone-500/80 transition hover:w-2.5 active:bg-stone-300"
      />
      <button
        type="button"
        onClick={() => step(-1)}
        aria-label="Volume down"
        className="h-14 w-1.5 rounded-r-md bg-stone-500/80 transition hover:w-2.5 active:bg-stone-300"
      />
    </div>
  );
}
