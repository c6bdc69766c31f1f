import { afterEach, expect, test, vi } from 'vitest';

import { getAppDescriptor, listDockApps, listHomeApps } from '../src/lib/appCatalog';
import { createLauncher } from '../src/lib/launcher';
import { createManualVolumeSignal, type VolumeSignal } from '../src/lib/volumeSignal';
import type { AppDescriptor } from '../src/types/apps';

function descriptor(id: string): AppDescriptor {
  const app = getAppDescriptor(id);
  if (!app) throw new Error(`unknown app ${id}`);
  return app;
}

afterEach(() => {
  vi.restoreAllMocks();
});

test('starts hidden', () => {
  expect(createLauncher().getState()).toEqual({ status: 'hidden' });
});

test('every home and dock app can be launched and dismissed with back', () => {
  const launcher = createLauncher();

  for (const app of [...listHomeApps(), ...listDockApps()]) {
    expect(launcher.launch(app)).toBe(true);
    expect(launcher.getState()).toEqual({ status: 'presenting', app });
    expect(launcher.dismiss('back')).toBe(true);
    expect(launcher.getState()).toEqual({ status: 'hidden' });
  }
});

test('launching while presenting is ignored', () => {
  const launcher = createLauncher();
  const weather = descriptor('weather');

  launcher.launch(weather);

  expect(launcher.launch(descriptor('calculator'))).toBe(false);
  expect(launcher.getState()).toEqual({ status: 'presenting', app: weather });
});

test('dismissing while hidden is a no-op', () => {
  const onDismiss = vi.fn();
  const launcher = createLauncher({ onDismiss });

  expect(launcher.dismiss('back')).toBe(false);
  expect(onDismiss).not.toHaveBeenCalled();
});

test('weather, back, then calculator never shows two apps', () => {
  const launcher = createLauncher();
  const seen: string[] = [];
  launcher.subscribe(() => {
    const state = launcher.getState();
    seen.push(state.status === 'presenting' ? state.app.id : 'hidden');
  });

  launcher.launch(descriptor('weather'));
  launcher.dismiss('back');
  launcher.launch(descriptor('calculator'));

  expect(seen).toEqual(['weather', 'hidden', 'calculator']);
});

test('unsubscribed listeners are not notified', () => {
  const launcher = createLauncher();
  const listener = vi.fn();
  const unsubscribe = launcher.subscribe(listener);

  unsubscribe();
  launcher.launch(descriptor('notes'));

  expect(listener).not.toHaveBeenCalled();
});

test('volume drift within epsilon keeps the app, one hardware step dismisses it', () => {
  const signal = createManualVolumeSignal(0.5);
  const onDismiss = vi.fn();
  const launcher = createLauncher({ volumeSignal: signal, onDismiss });
  const weather = descriptor('weather');

  launcher.launch(weather);
  expect(launcher.getBaselineVolume()).toBe(0.5);

  signal.setVolume(0.5005);
  expect(launcher.getState()).toEqual({ status: 'presenting', app: weather });

  signal.setVolume(0.5625);
  expect(launcher.getState()).toEqual({ status: 'hidden' });
  expect(onDismiss).toHaveBeenCalledTimes(1);
  expect(onDismiss).toHaveBeenCalledWith(weather, 'volume');
  expect(launcher.isVolumeGestureActive()).toBe(false);
});

test('a repeated report of the same change dismisses only once', () => {
  let emit: (volume: number) => void = () => {};
  const signal: VolumeSignal = {
    currentVolume: () => 0.5,
    subscribe(onChange) {
      emit = onChange;
      return () => {};
    },
  };
  const onDismiss = vi.fn();
  const launcher = createLauncher({ volumeSignal: signal, onDismiss });

  launcher.launch(descriptor('music'));
  emit(0.6);
  expect(() => emit(0.6)).not.toThrow();

  expect(onDismiss).toHaveBeenCalledTimes(1);
  expect(launcher.getState()).toEqual({ status: 'hidden' });
});

test('each launch measures against a fresh baseline', () => {
  const signal = createManualVolumeSignal(0.5);
  const launcher = createLauncher({ volumeSignal: signal });
  const notes = descriptor('notes');

  launcher.launch(descriptor('weather'));
  launcher.dismiss('back');
  signal.setVolume(0.75);

  launcher.launch(notes);
  expect(launcher.getBaselineVolume()).toBe(0.75);

  signal.setVolume(0.7505);
  expect(launcher.getState()).toEqual({ status: 'presenting', app: notes });
});

test('the volume subscription is released on every dismissal', () => {
  const signal = createManualVolumeSignal(0.5);
  const unsubscribe = vi.fn();
  const subscribe = vi.spyOn(signal, 'subscribe').mockImplementation(() => unsubscribe);
  const launcher = createLauncher({ volumeSignal: signal });

  launcher.launch(descriptor('clock'));
  launcher.dismiss('keyboard');
  launcher.launch(descriptor('mail'));
  launcher.dismiss('back');

  expect(subscribe).toHaveBeenCalledTimes(2);
  expect(unsubscribe).toHaveBeenCalledTimes(2);
});

test('a failing volume signal degrades to back-only dismissal', () => {
  const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  const signal: VolumeSignal = {
    currentVolume: () => {
      throw new Error('audio session unavailable');
    },
    subscribe: () => () => {},
  };
  const launcher = createLauncher({ volumeSignal: signal });
  const camera = descriptor('camera');

  expect(launcher.launch(camera)).toBe(true);
  expect(launcher.getState()).toEqual({ status: 'presenting', app: camera });
  expect(launcher.isVolumeGestureActive()).toBe(false);
  expect(warn).toHaveBeenCalledTimes(1);

  expect(launcher.dismiss('back')).toBe(true);
});

test('turning the gesture off while presenting stops volume dismissal', () => {
  const signal = createManualVolumeSignal(0.5);
  const launcher = createLauncher({ volumeSignal: signal });
  const safari = descriptor('safari');

  launcher.launch(safari);
  launcher.configure({ volumeGestureEnabled: false });
  signal.setVolume(0.25);

  expect(launcher.getState()).toEqual({ status: 'presenting', app: safari });
  expect(launcher.isVolumeGestureActive()).toBe(false);
});

test('epsilon comes from configuration', () => {
  const signal = createManualVolumeSignal(0.5);
  const launcher = createLauncher({ volumeSignal: signal, volumeEpsilon: 0.1 });
  const phone = descriptor('phone');

  launcher.launch(phone);
  signal.setVolume(0.5625);
  expect(launcher.getState()).toEqual({ status: 'presenting', app: phone });

  launcher.configure({ volumeEpsilon: 0.01 });
  signal.setVolume(0.625);
  expect(launcher.getState()).toEqual({ status: 'hidden' });
});
