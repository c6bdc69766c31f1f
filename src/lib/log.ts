const PREFIX = '[springboard]';

export function warn(message: string, error?: unknown) {
  if (error === undefined) {
    console.warn(`${PREFIX} ${message}`);
    return;
  }
  console.warn(`${PREFIX} ${message}`, error);
}
