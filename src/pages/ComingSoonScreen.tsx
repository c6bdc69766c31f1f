import type { LeafScreenProps } from './leafScreen';

export function ComingSoonScreen({ app, onExit }: LeafScreenProps) {
  return (
    <main className="grid h-full place-content-center gap-4 bg-white px-6 text-center">
      <p className="text-base text-black">{app.name} coming soon</p>
      <button
        type="button"
        onClick={onExit}
        className="rounded-full bg-black/5 px-4 py-2 text-sm text-blue-500 transition active:scale-95"
      >
        Return to Home Screen
      </button>
    </main>
  );
}
