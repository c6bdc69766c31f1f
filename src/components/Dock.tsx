import type { AppDescriptor } from '../types/apps';
import { AppIcon } from './AppIcon';

type DockProps = {
  apps: readonly AppDescriptor[];
  showLabels: boolean;
  onLaunch: (app: AppDescriptor) => void;
};

export function Dock({ apps, showLabels, onLaunch }: DockProps) {
  return (
    <nav aria-label="Dock" className="px-2.5 pb-2">
      <div className="mx-auto w-full rounded-[2.2rem] border border-white/30 bg-white/20 px-4 py-3.5 shadow-[0_18px_48px_rgba(0,0,0,0.14)] backdrop-blur">
        <ul className="grid w-full gap-4" style={{ gridTemplateColumns: `repeat(${apps.length}, 1fr)` }}>
          {apps.map((app) => (
            <li key={app.id} className="flex justify-center">
              <AppIcon app={app} showLabel={showLabels} onLaunch={onLaunch} />
            </li>
          ))}
        </ul>
      </div>
    </nav>
  );
}
