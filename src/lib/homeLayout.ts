import type { AppDescriptor } from '../types/apps';

export const HOME_GRID_COLUMNS = 4;
export const HOME_GRID_ROWS = 6;

export type HomeScreenPage = {
  id: string;
  apps: readonly AppDescriptor[];
};

// Fills pages in catalog order; pages past the last app stay empty so the
// pager keeps the requested count.
export function paginateApps(
  apps: readonly AppDescriptor[],
  perPage = HOME_GRID_COLUMNS * HOME_GRID_ROWS,
  pageCount = 1,
): HomeScreenPage[] {
  const size = Math.max(1, Math.floor(perPage));
  const needed = Math.max(1, Math.ceil(apps.length / size), Math.floor(pageCount));

  return Array.from({ length: needed }, (_, index) => ({
    id: `page-${index + 1}`,
    apps: apps.slice(index * size, (index + 1) * size),
  }));
}
