import { describe, it, expect, beforeEach, vi } from 'vitest';
import { coordinate } from '../geometry/coordinate';
import { createLineSection } from '../domain/section';
import { SceneActionDetector } from '../eventlist/SceneActionDetector';
import { EventRepository, SectionRepository, TrackRepository } from '../repository';
import { MissingSection, SectionIdAlreadyExists } from '../errors';
import { makeTrack } from './fixtures';

const first = makeTrack(1, [
  { x: 0, y: 0 },
  { x: 1, y: 1 },
]);
const second = makeTrack(2, [
  { x: 2, y: 2 },
  { x: 3, y: 3 },
]);

function line(id: string) {
  return createLineSection({ id, start: coordinate(0, 0), end: coordinate(1, 1) });
}

describe('TrackRepository', () => {
  let repository: TrackRepository;

  beforeEach(() => {
    repository = new TrackRepository();
  });

  it('should store and return tracks', () => {
    repository.addAll([first, second]);

    expect(repository.getFor('1')).toBe(first);
    expect(repository.getFor('3')).toBeUndefined();
    expect(repository.getAll()).toEqual([first, second]);
    expect(repository.getTrackIds()).toEqual(new Set(['1', '2']));
    expect(repository.getTracksFromIds(['2', '9'])).toEqual([second]);
  });

  it('should notify observers once per batch', () => {
    const observer = vi.fn();
    repository.register(observer);

    repository.addAll([first, second]);
    repository.removeMultiple(['1', '5']);

    expect(observer).toHaveBeenCalledTimes(2);
    expect(observer).toHaveBeenNthCalledWith(1, { added: ['1', '2'], removed: [] });
    expect(observer).toHaveBeenNthCalledWith(2, { added: [], removed: ['1'] });
  });

  it('should stop notifying after unsubscribe', () => {
    const observer = vi.fn();
    const unsubscribe = repository.register(observer);
    unsubscribe();

    repository.add(first);
    expect(observer).not.toHaveBeenCalled();
  });

  it('should clear all tracks', () => {
    repository.addAll([first, second]);
    repository.clear();
    expect(repository.isEmpty()).toBe(true);
  });
});

describe('SectionRepository', () => {
  let repository: SectionRepository;

  beforeEach(() => {
    repository = new SectionRepository();
  });

  it('should keep insertion order', () => {
    repository.addAll([line('b'), line('a')]);
    expect(repository.getAll().map(s => s.id)).toEqual(['b', 'a']);
  });

  it('should reject duplicate ids without adding any section of the batch', () => {
    repository.add(line('a'));
    expect(() => repository.addAll([line('b'), line('a')])).toThrow(SectionIdAlreadyExists);
    expect(repository.getSectionIds()).toEqual(new Set(['a']));
  });

  it('should update and remove sections', () => {
    const observer = vi.fn();
    repository.add(line('a'));
    repository.register(observer);

    const renamed = createLineSection({ id: 'a', name: 'North', start: coordinate(0, 0), end: coordinate(2, 2) });
    repository.update(renamed);
    expect(repository.get('a')).toBe(renamed);

    repository.remove('a');
    expect(repository.isEmpty()).toBe(true);
    expect(observer).toHaveBeenNthCalledWith(1, { added: [], removed: [], changed: ['a'] });
    expect(observer).toHaveBeenNthCalledWith(2, { added: [], removed: ['a'], changed: [] });
  });

  it('should fail for unknown sections', () => {
    expect(() => repository.update(line('x'))).toThrow(MissingSection);
    expect(() => repository.remove('x')).toThrow(MissingSection);
    expect(() => repository.updatePluginData('counting', 'x', {})).toThrow(MissingSection);
  });

  it('should merge plugin data per key', () => {
    repository.add(createLineSection({ ...line('a'), pluginData: { counting: { direction: 'north' }, other: 1 } }));

    repository.updatePluginData('counting', 'a', { lane: 2 });

    expect(repository.get('a')?.pluginData).toEqual({ counting: { direction: 'north', lane: 2 }, other: 1 });
  });

  it('should report all ids when cleared', () => {
    const observer = vi.fn();
    repository.addAll([line('a'), line('b')]);
    repository.register(observer);

    repository.clear();
    expect(observer).toHaveBeenCalledWith({ added: [], removed: ['a', 'b'], changed: [] });
  });
});

describe('EventRepository', () => {
  const events = new SceneActionDetector().detect([first]);

  it('should append batches', () => {
    const repository = new EventRepository();
    repository.addAll(events);
    repository.add(events[0]);
    expect(repository.getAll()).toEqual([...events, events[0]]);
  });

  it('should report cleared events as removed', () => {
    const repository = new EventRepository();
    const observer = vi.fn();
    repository.addAll(events);
    repository.register(observer);

    repository.clear();

    expect(repository.isEmpty()).toBe(true);
    expect(observer).toHaveBeenCalledWith({ added: [], removed: events });
  });
});
