import { z } from 'zod/v4';
import { MemoryPersistence } from './memory-persistence.js';

const NoteSchema = z.object({ text: z.string() });

describe('MemoryPersistence', () => {
  it('lists direct children only, in path order', () => {
    const persistence = new MemoryPersistence();
    persistence.write('/d/b.json', { text: 'b' }, NoteSchema);
    persistence.write('/d/a.json', { text: 'a' }, NoteSchema);
    persistence.write('/d/sub/c.json', { text: 'c' }, NoteSchema);

    expect(persistence.list('/d', NoteSchema)).toEqual([{ text: 'a' }, { text: 'b' }]);
  });

  it('validates on write and throws for missing files', () => {
    const persistence = new MemoryPersistence();
    expect(() => persistence.write('/d/x.json', { text: 1 }, z.object({ text: z.number().max(0) }))).toThrow();
    expect(() => persistence.read('/d/x.json', NoteSchema)).toThrow('File not found: /d/x.json');
    expect(persistence.exists('/d/x.json')).toBe(false);
  });
});
