import type { AppDescriptor } from '../types/apps';

type AppIconProps = {
  app: AppDescriptor;
  showLabel?: boolean;
  onLaunch: (app: AppDescriptor) => void;
};

export function AppIcon({ app, showLabel = true, onLaunch }: AppIconProps) {
  return (
    <button
      type="button"
      onClick={() => onLaunch(app)}
      className="flex flex-col items-center gap-1.5 transition active:scale-95"
      aria-label={app.name}
      title={app.name}
    >
      <span
        className="grid h-16 w-16 place-items-center overflow-hidden rounded-2xl shadow-[0_12px_30px_rgba(0,0,0,0.18)]"
        style={{
          background: app.gradient
            ? `linear-gradient(180deg, rgb(255 255 255 / 0.35), transparent), ${app.color}`
            : app.color,
        }}
      >
        <span className="text-3xl leading-none" aria-hidden="true">
          {app.icon}
        </span>
      </span>
      {showLabel && <span className="text-center text-xs text-white drop-shadow">{app.name}</span>}
    </button>
  );
}
