import { fireEvent, render, screen, waitFor } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { beforeEach, expect, test } from 'vitest';

import { App } from '../src/App';
import { getDb } from '../src/lib/db';
import { getSettings } from '../src/lib/repositories/settingsRepo';
import { createManualVolumeSignal } from '../src/lib/volumeSignal';

beforeEach(async () => {
  const db = await getDb();
  await db.clear('settings');
});

async function renderApp(initialVolume = 0.5) {
  const volumeSignal = createManualVolumeSignal(initialVolume);
  render(<App volumeSignal={volumeSignal} />);
  await screen.findByRole('button', { name: 'Weather' });
  return volumeSignal;
}

test('the home screen and an open app are never visible together', async () => {
  await renderApp();

  fireEvent.click(screen.getByRole('button', { name: 'Weather' }));

  expect(screen.getByRole('dialog', { name: 'Weather' })).toBeInTheDocument();
  expect(screen.queryByRole('button', { name: 'Calculator' })).toBeNull();

  fireEvent.click(screen.getByRole('button', { name: 'Home' }));

  expect(screen.queryByRole('dialog')).toBeNull();
  fireEvent.click(screen.getByRole('button', { name: 'Calculator' }));
  expect(screen.getByRole('dialog', { name: 'Calculator' })).toBeInTheDocument();
});

test('a volume button press returns to the home screen', async () => {
  await renderApp();

  fireEvent.click(screen.getByRole('button', { name: 'Weather' }));
  fireEvent.click(screen.getByRole('button', { name: 'Volume up' }));

  expect(screen.queryByRole('dialog')).toBeNull();
  expect(screen.getByRole('status')).toHaveTextContent('Volume button pressed: back to Home');
  expect(screen.getByRole('button', { name: 'Weather' })).toBeInTheDocument();
});

test('pressing volume on the home screen launches nothing and leaves later sessions intact', async () => {
  const volumeSignal = await renderApp();

  fireEvent.click(screen.getByRole('button', { name: 'Volume down' }));
  expect(volumeSignal.currentVolume()).toBe(0.4375);

  fireEvent.click(screen.getByRole('button', { name: 'Notes' }));
  expect(screen.getByRole('dialog', { name: 'Notes' })).toBeInTheDocument();
});

test('Escape closes the open app', async () => {
  await renderApp();

  fireEvent.click(screen.getByRole('button', { name: 'Clock' }));
  fireEvent.keyDown(window, { key: 'Escape' });

  expect(screen.queryByRole('dialog')).toBeNull();
});

test('turning off the volume gesture in Settings keeps the app open', async () => {
  const user = userEvent.setup();
  await renderApp();

  await user.click(screen.getByRole('button', { name: 'Settings' }));
  const toggle = screen.getByRole('switch', { name: 'Return Home on Volume Press' });
  expect(toggle).toBeChecked();

  await user.click(toggle);
  await waitFor(() => expect(toggle).not.toBeChecked());

  await user.click(screen.getByRole('button', { name: 'Volume up' }));
  expect(screen.getByRole('dialog', { name: 'Settings' })).toBeInTheDocument();
});

test('two quick settings changes are both kept', async () => {
  await renderApp();

  fireEvent.click(screen.getByRole('button', { name: 'Settings' }));
  fireEvent.click(screen.getByRole('switch', { name: 'Dock Labels' }));
  fireEvent.click(screen.getByRole('radio', { name: 'Sunset' }));

  expect(screen.getByRole('switch', { name: 'Dock Labels' })).toBeChecked();
  expect(screen.getByRole('radio', { name: 'Sunset' })).toBeChecked();
  await waitFor(async () => {
    const stored = await getSettings();
    expect(stored.showDockLabels).toBe(true);
    expect(stored.wallpaper).toBe('sunset');
  });
});

test('the calculator works inside the container', async () => {
  await renderApp();

  fireEvent.click(screen.getByRole('button', { name: 'Calculator' }));
  for (const key of ['7', '+', '8', '=']) {
    fireEvent.click(screen.getByRole('button', { name: key }));
  }

  expect(screen.getByLabelText('Display')).toHaveTextContent('15');
});
