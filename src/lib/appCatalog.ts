import type { AppDescriptor, AppId } from '../types/apps';

const APP_IDS: readonly AppId[] = [
  'weather',
  'calculator',
  'notes',
  'settings',
  'clock',
  'calendar',
  'photos',
  'messages',
  'phone',
  'safari',
  'mail',
  'music',
  'appStore',
  'camera',
];

const APP_ICONS: Record<AppId, string> = {
  weather: '⛅',
  calculator: '🧮',
  notes: '📝',
  settings: '⚙️',
  clock: '⏰',
  calendar: '📅',
  photos: '🌸',
  messages: '💬',
  phone: '📞',
  safari: '🧭',
  mail: '✉️',
  music: '🎵',
  appStore: '🛍️',
  camera: '📷',
};

const APP_COLORS: Record<AppId, string> = {
  weather: 'rgb(0 122 255 / 0.8)',
  calculator: 'rgb(142 142 147 / 0.3)',
  notes: 'rgb(255 204 0 / 0.9)',
  settings: 'rgb(142 142 147 / 0.5)',
  clock: '#000000',
  calendar: '#ffffff',
  photos: 'rgb(255 59 48 / 0.3)',
  messages: 'rgb(52 199 89 / 0.9)',
  phone: 'rgb(52 199 89 / 0.9)',
  safari: '#007aff',
  mail: '#007aff',
  music: '#ff3b30',
  appStore: '#007aff',
  camera: 'rgb(142 142 147 / 0.5)',
};

const GRADIENT_APPS = new Set<AppId>(['weather', 'messages', 'phone', 'safari', 'mail', 'music', 'appStore']);

const HOME_APP_IDS: readonly AppId[] = [
  'weather',
  'calendar',
  'photos',
  'camera',
  'notes',
  'calculator',
  'settings',
  'mail',
  'clock',
  'appStore',
];

const DOCK_APP_IDS: readonly AppId[] = ['phone', 'safari', 'messages', 'music'];

function toDisplayName(id: AppId) {
  if (id === 'appStore') return 'App Store';
  return `${id.charAt(0).toUpperCase()}${id.slice(1)}`;
}

const DESCRIPTORS: ReadonlyMap<string, AppDescriptor> = new Map(
  APP_IDS.map((id): [string, AppDescriptor] => [
    id,
    Object.freeze<AppDescriptor>({
      id,
      name: toDisplayName(id),
      icon: APP_ICONS[id],
      color: APP_COLORS[id],
      gradient: GRADIENT_APPS.has(id),
    }),
  ]),
);

function pick(ids: readonly AppId[]) {
  return ids.flatMap((id) => {
    const descriptor = DESCRIPTORS.get(id);
    return descriptor ? [descriptor] : [];
  });
}

const HOME_APPS = Object.freeze(pick(HOME_APP_IDS));
const DOCK_APPS = Object.freeze(pick(DOCK_APP_IDS));

export function isAppId(value: unknown): value is AppId {
  return typeof value === 'string' && DESCRIPTORS.has(value);
}

export function getAppDescriptor(id: string) {
  return DESCRIPTORS.get(id);
}

export function listAllApps(): readonly AppDescriptor[] {
  return pick(APP_IDS);
}

export function listHomeApps(): readonly AppDescriptor[] {
  return HOME_APPS;
}

export function listDockApps(): readonly AppDescriptor[] {
  return DOCK_APPS;
}
