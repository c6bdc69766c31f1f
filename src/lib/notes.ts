export type Note = {
  id: string;
  content: string;
  lastModified: number;
};

export function noteTitle(note: Note) {
  const trimmed = note.content.trim();
  if (!trimmed) return 'New Note';
  return trimmed.split(/\r?\n/)[0] ?? 'New Note';
}

export function notePreview(note: Note) {
  const lines = note.content.trim().split(/\r?\n/);
  if (lines.length <= 1) return 'No additional text';
  return lines.slice(1).join(' ');
}

export function createSampleNotes(now = Date.now()): Note[] {
  return [
    {
      id: 'note-ideas',
      content: 'Project Ideas 💡\n1. Weather App Clone\n2. Calendar App Clone\n3. Notes App Fixes',
      lastModified: now,
    },
    {
      id: 'note-shopping',
      content: 'Shopping List\nMilk\nCoffee Beans\nEggs',
      lastModified: now - 86_400_000,
    },
  ];
}

// Newest first, matching the Notes list ordering.
export function upsertNote(notes: readonly Note[], note: Note) {
  return [note, ...notes.filter((item) => item.id !== note.id)];
}
