export type ActionToastKind = 'success' | 'error' | 'info';

export type ActionToastPayload = {
  message: string;
  kind?: ActionToastKind;
  durationMs?: number;
};

const ACTION_TOAST_EVENT = 'springboard:action-toast';

function isActionToastEvent(event: Event): event is CustomEvent<ActionToastPayload> {
  return event instanceof CustomEvent;
}

export function emitActionToast(payload: ActionToastPayload) {
  if (typeof window === 'undefined') return;
  window.dispatchEvent(new CustomEvent<ActionToastPayload>(ACTION_TOAST_EVENT, { detail: payload }));
}

export function subscribeActionToast(listener: (payload: ActionToastPayload) => void) {
  if (typeof window === 'undefined') {
    return () => {};
  }

  const handler = (event: Event) => {
    if (!isActionToastEvent(event) || !event.detail?.message) return;
    listener(event.detail);
  };

  window.addEventListener(ACTION_TOAST_EVENT, handler);
  return () => {
    window.removeEventListener(ACTION_TOAST_EVENT, handler);
  };
}
