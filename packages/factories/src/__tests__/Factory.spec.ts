import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryStore, NoteFactory, TagFactory } from '../../test/memory';
import { Factory } from '../Factory';

describe('Factory', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('should be the base of custom factories', () => {
    expect(new TagFactory()).toBeInstanceOf(Factory);
    expect(new TagFactory().clone()).toBeInstanceOf(Factory);
  });

  describe('insertMany', () => {
    it('should insert the requested number of records in order', async () => {
      const tags = await new TagFactory('work').insertMany(3, store);

      expect(tags).toEqual([
        { id: 1, label: 'work' },
        { id: 2, label: 'work' },
        { id: 3, label: 'work' },
      ]);
    });

    it('should return an empty array for a count of 0', async () => {
      const factory = new TagFactory();
      const insert = vi.spyOn(factory, 'insert');

      expect(await factory.insertMany(0, store)).toEqual([]);
      expect(insert).not.toHaveBeenCalled();
    });

    it('should use the factory returned by customize', async () => {
      const customize = vi.fn(
        (_factory: TagFactory, idx: number) => new TagFactory(`tag-${idx}`),
      );

      const tags = await new TagFactory().insertMany(2, store, customize);

      expect(tags.map((tag) => tag.label)).toEqual(['tag-0', 'tag-1']);
      expect(customize).toHaveBeenCalledTimes(2);
      expect(customize.mock.calls.map(([, idx]) => idx)).toEqual([0, 1]);
    });

    it('should pass the receiving factory to customize', async () => {
      const factory = new TagFactory('base');

      await factory.insertMany(1, store, (received) => {
        expect(received).toBe(factory);
        return received;
      });
    });

    it('should stop at the first failing insert', async () => {
      await expect(
        new TagFactory().insertMany(3, store, (factory, idx) => {
          if (idx === 2) {
            store.failing.add('tags');
          }
          return factory;
        }),
      ).rejects.toThrow('insert into tags failed');

      expect(store.tags).toHaveLength(2);
    });

    it('should resolve associations for every record', async () => {
      const notes = await new NoteFactory('todo').insertMany(3, store);

      expect(notes.map((note) => note.tagId)).toEqual([1, 2, 3]);
      expect(store.notes).toHaveLength(3);
    });
  });
});
