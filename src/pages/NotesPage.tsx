import { useMemo, useState } from 'react';

import { createSampleNotes, notePreview, noteTitle, upsertNote, type Note } from '../lib/notes';

function formatModified(timestamp: number) {
  return new Date(timestamp).toLocaleDateString('en-US', { month: 'numeric', day: 'numeric', year: '2-digit' });
}

export function NotesPage() {
  const [notes, setNotes] = useState<Note[]>(() => createSampleNotes());
  const [editingId, setEditingId] = useState<string | null>(null);
  const editing = useMemo(() => notes.find((note) => note.id === editingId) ?? null, [notes, editingId]);

  function createNote() {
    const note: Note = { id: `note-${Date.now()}`, content: '', lastModified: Date.now() };
    setNotes((current) => upsertNote(current, note));
    setEditingId(note.id);
  }

  function closeEditor() {
    // Empty notes are discarded on close, like the system app.
    setNotes((current) => current.filter((note) => note.id !== editingId || note.content.trim()));
    setEditingId(null);
  }

  if (editing) {
    return (
      <main className="flex h-full flex-col bg-white px-4 pt-14">
        <div className="flex items-center justify-between pb-3">
          <button type="button" onClick={closeEditor} className="text-[17px] text-amber-500">
            ‹ Notes
          </button>
          <button type="button" onClick={closeEditor} className="text-[17px] font-semibold text-amber-500">
            Done
          </button>
        </div>
        <textarea
          aria-label="Note text"
          className="min-h-0 flex-1 resize-none text-[17px] text-black outline-none"
          value={editing.content}
          autoFocus
          onChange={(event) => {
            const content = event.target.value;
            setNotes((current) => upsertNote(current, { ...editing, content, lastModified: Date.now() }));
          }}
        />
      </main>
    );
  }

  return (
    <main className="flex h-full flex-col bg-[#f2f2f7] px-4 pt-14">
      <h1 className="pb-3 text-[34px] font-bold text-black">Notes</h1>
      <ul className="min-h-0 flex-1 overflow-y-auto rounded-xl bg-white">
        {notes.map((note) => (
          <li key={note.id} className="border-b border-black/10 last:border-b-0">
            <button type="button" onClick={() => setEditingId(note.id)} className="w-full px-4 py-2.5 text-left">
              <p className="truncate font-semibold text-black">{noteTitle(note)}</p>
              <p className="truncate text-sm text-black/50">
                {formatModified(note.lastModified)} {notePreview(note)}
              </p>
            </button>
          </li>
        ))}
      </ul>
      <footer className="flex items-center justify-between py-4 text-sm text-black/60">
        <span />
        <span>{notes.length === 1 ? '1 Note' : `${notes.length} Notes`}</span>
        <button type="button" onClick={createNote} aria-label="New note" className="text-2xl text-amber-500">
          ✎
        </button>
      </footer>
    </main>
  );
}
