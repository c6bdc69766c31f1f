import { expect, test } from 'vitest';

import { createSampleNotes, notePreview, noteTitle, upsertNote } from '../src/lib/notes';

test('title is the first line and preview joins the rest', () => {
  const note = { id: 'n1', content: 'Shopping List\nMilk\nCoffee Beans\nEggs', lastModified: 0 };

  expect(noteTitle(note)).toBe('Shopping List');
  expect(notePreview(note)).toBe('Milk Coffee Beans Eggs');
});

test('blank and single-line notes fall back to placeholder text', () => {
  expect(noteTitle({ id: 'n1', content: '  \n ', lastModified: 0 })).toBe('New Note');
  expect(notePreview({ id: 'n2', content: 'Only a title', lastModified: 0 })).toBe('No additional text');
});

test('upsertNote moves the edited note to the top', () => {
  const [ideas, shopping] = createSampleNotes(1_000_000);
  if (!ideas || !shopping) throw new Error('expected two sample notes');

  const edited = { ...shopping, content: 'Groceries', lastModified: 2_000_000 };
  const notes = upsertNote([ideas, shopping], edited);

  expect(notes.map((note) => note.id)).toEqual(['note-shopping', 'note-ideas']);
  expect(notes[0]?.content).toBe('Groceries');
});
