import { useCallback, useEffect, useMemo, useRef, useState } from 'react';

import { AppContainer } from './components/AppContainer';
import { HomeScreenGrid } from './components/HomeScreenGrid';
import { VolumeButtons } from './components/VolumeButtons';
import { emitActionToast, subscribeActionToast, type ActionToastKind } from './lib/actionToast';
import { listDockApps, listHomeApps } from './lib/appCatalog';
import { createLauncher } from './lib/launcher';
import { warn } from './lib/log';
import { getSettings, normalizeSettings, saveSettings } from './lib/repositories/settingsRepo';
import { LauncherSettingsContext, type LauncherSettingsContextValue } from './lib/settingsContext';
import { useLauncherState } from './lib/useLauncher';
import { createManualVolumeSignal, type ManualVolumeSignal } from './lib/volumeSignal';
import type { AppDescriptor, DismissReason } from './types/apps';
import { DEFAULT_SETTINGS, WALLPAPER_GRADIENTS, type LauncherSettings } from './types/settings';

type LoadState = 'loading' | 'ready';
type ActionToastState = {
  id: number;
  kind: ActionToastKind;
  message: string;
};

type AppProps = {
  volumeSignal?: ManualVolumeSignal;
};

const homeApps = listHomeApps();
const dockApps = listDockApps();

export function App({ volumeSignal: providedSignal }: AppProps) {
  const [volumeSignal] = useState(() => providedSignal ?? createManualVolumeSignal());
  const [launcher] = useState(() =>
    createLauncher({
      volumeSignal,
      volumeEpsilon: DEFAULT_SETTINGS.volumeEpsilon,
      volumeGestureEnabled: DEFAULT_SETTINGS.volumeGestureEnabled,
      onDismiss: (_app, reason) => {
        if (reason === 'volume') {
          emitActionToast({ message: 'Volume button pressed: back to Home', durationMs: 1200 });
        }
      },
    }),
  );
  const launcherState = useLauncherState(launcher);
  const [settings, setSettings] = useState<LauncherSettings>(DEFAULT_SETTINGS);
  const [loadState, setLoadState] = useState<LoadState>('loading');
  const [actionToast, setActionToast] = useState<ActionToastState | null>(null);
  const actionToastTimerRef = useRef<number | null>(null);

  useEffect(() => {
    let active = true;

    void (async () => {
      try {
        const loaded = await getSettings();
        if (active) setSettings(loaded);
      } catch (error) {
        warn('settings unavailable, using defaults', error);
      } finally {
        if (active) setLoadState('ready');
      }
    })();

    return () => {
      active = false;
    };
  }, []);

  useEffect(() => {
    launcher.configure({
      volumeEpsilon: settings.volumeEpsilon,
      volumeGestureEnabled: settings.volumeGestureEnabled,
    });
  }, [launcher, settings.volumeEpsilon, settings.volumeGestureEnabled]);

  useEffect(() => {
    return subscribeActionToast((payload) => {
      const nextId = Date.now() + Math.floor(Math.random() * 1000);
      const duration = Math.max(900, Math.min(6000, payload.durationMs ?? 1800));
      setActionToast({
        id: nextId,
        kind: payload.kind ?? 'info',
        message: payload.message,
      });

      if (actionToastTimerRef.current !== null) {
        window.clearTimeout(actionToastTimerRef.current);
      }
      actionToastTimerRef.current = window.setTimeout(() => {
        setActionToast((current) => (current?.id === nextId ? null : current));
        actionToastTimerRef.current = null;
      }, duration);
    });
  }, []);

  useEffect(() => {
    return () => {
      if (actionToastTimerRef.current !== null) {
        window.clearTimeout(actionToastTimerRef.current);
      }
    };
  }, []);

  const onSettingChange = useCallback(async (partial: Partial<LauncherSettings>) => {
    setSettings((current) => normalizeSettings({ ...current, ...partial }));
    try {
      await saveSettings(partial);
    } catch (error) {
      warn('failed to save settings', error);
      emitActionToast({ kind: 'error', message: 'Settings could not be saved' });
    }
  }, []);

  const settingsContext = useMemo<LauncherSettingsContextValue>(
    () => ({ settings, onSettingChange }),
    [settings, onSettingChange],
  );

  const onLaunch = useCallback((app: AppDescriptor) => launcher.launch(app), [launcher]);
  const onDismiss = useCallback((reason: DismissReason) => launcher.dismiss(reason), [launcher]);
  const presenting = launcherState.status === 'presenting';

  return (
    <LauncherSettingsContext.Provider value={settingsContext}>
      <div
        className="relative mx-auto h-dvh w-full max-w-md overflow-hidden text-white"
        style={{ background: WALLPAPER_GRADIENTS[settings.wallpaper] }}
      >
        {loadState === 'loading' ? (
          <main className="grid h-full place-items-center" aria-busy="true">
            <span className="h-8 w-8 animate-spin rounded-full border-2 border-white/30 border-t-white" />
            <span className="sr-only">Loading…</span>
          </main>
        ) : (
          <div className="h-full" hidden={presenting}>
            <HomeScreenGrid
              homeApps={homeApps}
              dockApps={dockApps}
              pageCount={settings.homePageCount}
              showDockLabels={settings.showDockLabels}
              onLaunch={onLaunch}
            />
          </div>
        )}

        {launcherState.status === 'presenting' && <AppContainer app={launcherState.app} onDismiss={onDismiss} />}

        <VolumeButtons signal={volumeSignal} />

        {actionToast && (
          <div className="pointer-events-none fixed inset-x-0 bottom-[max(1rem,env(safe-area-inset-bottom))] z-[250] flex justify-center px-4">
            <div
              role="status"
              className={`max-w-[92vw] rounded-2xl border px-4 py-2 text-sm shadow-lg backdrop-blur ${
                actionToast.kind === 'error'
                  ? 'border-rose-300 bg-rose-50/95 text-rose-700'
                  : actionToast.kind === 'success'
                    ? 'border-emerald-300 bg-emerald-50/95 text-emerald-700'
                    : 'border-stone-300 bg-white/95 text-stone-700'
              }`}
            >
              {actionToast.message}
            </div>
          </div>
        )}
      </div>
    </LauncherSettingsContext.Provider>
  );
}

export default App;
