import { useMemo, useState } from 'react';

import { paginateApps } from '../lib/homeLayout';
import type { AppDescriptor } from '../types/apps';
import { AppIcon } from './AppIcon';
import { Dock } from './Dock';
import { SwipePager } from './SwipePager';

type HomeScreenGridProps = {
  homeApps: readonly AppDescriptor[];
  dockApps: readonly AppDescriptor[];
  pageCount: number;
  showDockLabels: boolean;
  onLaunch: (app: AppDescriptor) => void;
};

export function HomeScreenGrid({
  homeApps,
  dockApps,
  pageCount,
  showDockLabels,
  onLaunch,
}: HomeScreenGridProps) {
  const [currentPage, setCurrentPage] = useState(0);
  const pages = useMemo(() => paginateApps(homeApps, undefined, pageCount), [homeApps, pageCount]);
  const activePage = Math.min(currentPage, pages.length - 1);

  return (
    <div className="flex h-full flex-col pt-10">
      <div className="min-h-0 flex-1">
        <SwipePager
          activeIndex={activePage}
          onIndexChange={setCurrentPage}
          pages={pages.map((page) => ({
            id: page.id,
            node: (
              <div className="grid grid-cols-4 content-start gap-x-4 gap-y-6 px-4 pt-6">
                {page.apps.map((app) => (
                  <AppIcon key={app.id} app={app} onLaunch={onLaunch} />
                ))}
              </div>
            ),
          }))}
        />
      </div>

      <div className="flex justify-center gap-2 py-5" role="tablist" aria-label="Home screen pages">
        {pages.map((page, index) => (
          <button
            key={page.id}
            type="button"
            role="tab"
            aria-selected={index === activePage}
            aria-label={`Page ${index + 1}`}
            onClick={() => setCurrentPage(index)}
            className={`h-2 w-2 rounded-full ${index === activePage ? 'bg-white' : 'bg-white/50'}`}
          />
        ))}
      </div>

      <Dock apps={dockApps} showLabels={showDockLabels} onLaunch={onLaunch} />
    </div>
  );
}
