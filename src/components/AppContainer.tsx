import { useEffect } from 'react';

import { resolveLeafScreen } from '../pages/registry';
import type { AppDescriptor, DismissReason } from '../types/apps';

type AppContainerProps = {
  app: AppDescriptor;
  onDismiss: (reason: DismissReason) => void;
};

const NON_TEXT_INPUT_TYPES = new Set(['button', 'checkbox', 'radio', 'range', 'reset', 'submit']);

// Escape inside a text field belongs to the field, not the container.
function isEditableTarget(target: EventTarget | null) {
  if (target instanceof HTMLTextAreaElement || target instanceof HTMLSelectElement) return true;
  if (target instanceof HTMLInputElement) return !NON_TEXT_INPUT_TYPES.has(target.type);
  return target instanceof HTMLElement && target.isContentEditable;
}

export function AppContainer({ app, onDismiss }: AppContainerProps) {
  const LeafScreen = resolveLeafScreen(app.id);

  useEffect(() => {
    const onKeyDown = (event: KeyboardEvent) => {
      if (event.key !== 'Escape' || event.defaultPrevented || isEditableTarget(event.target)) return;
      onDismiss('keyboard');
    };

    window.addEventListener('keydown', onKeyDown);
    return () => {
      window.removeEventListener('keydown', onKeyDown);
    };
  }, [onDismiss]);

  return (
    <div className="fixed inset-0 z-30 overflow-hidden" role="dialog" aria-modal="true" aria-label={app.name}>
      <div className="h-full w-full">
        <LeafScreen key={app.id} app={app} onExit={() => onDismiss('back')} />
      </div>

      <button
        type="button"
        onClick={() => {
          navigator.vibrate?.(10);
          onDismiss('back');
        }}
        className="absolute left-3 top-1.5 z-40 px-1.5 pb-2.5 text-[12px] text-current mix-blend-difference drop-shadow transition active:scale-95"
        aria-label="Home"
        title="Back to Home Screen"
      >
        ◀ Home
      </button>
    </div>
  );
}
