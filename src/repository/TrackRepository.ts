import { createStore } from 'zustand/vanilla';
import type { Track, TrackId } from '../domain/track';
import type { RepositoryObserver, TrackRepositoryEvent, Unsubscribe } from './types';

interface TrackRepositoryState {
  tracks: ReadonlyMap<TrackId, Track>;
  lastChange: TrackRepositoryEvent | null;
}

export class TrackRepository {
  private readonly store = createStore<TrackRepositoryState>()(() => ({
    tracks: new Map(),
    lastChange: null,
  }));

  register(observer: RepositoryObserver<TrackRepositoryEvent>): Unsubscribe {
    return this.store.subscribe(state => {
      if (state.lastChange) observer(state.lastChange);
    });
  }

  add(track: Track): void {
    this.addAll([track]);
  }

  /** Adds all tracks and notifies once; a track with a known id replaces the old one */
  addAll(tracks: Iterable<Track>): void {
    this.store.setState(state => {
      const next = new Map(state.tracks);
      const added: TrackId[] = [];
      for (const track of tracks) {
        next.set(track.id, track);
        added.push(track.id);
      }
      return { tracks: next, lastChange: { added, removed: [] } };
    });
  }

  getFor(id: TrackId): Track | undefined {
    return this.store.getState().tracks.get(id);
  }

  getTracksFromIds(ids: Iterable<TrackId>): Track[] {
    const tracks: Track[] = [];
    for (const id of ids) {
      const track = this.getFor(id);
      if (track) tracks.push(track);
    }
    return tracks;
  }

  getAll(): Track[] {
    return [...this.store.getState().tracks.values()];
  }

  getAllWithoutSingleDetections(): Track[] {
    return this.getAll().filter(track => track.detections.length > 1);
  }

  getTrackIds(): Set<TrackId> {
    return new Set(this.store.getState().tracks.keys());
  }

  removeMultiple(ids: Iterable<TrackId>): void {
    this.store.setState(state => {
      const next = new Map(state.tracks);
      const removed: TrackId[] = [];
      for (const id of ids) {
        if (next.delete(id)) removed.push(id);
      }
      return { tracks: next, lastChange: { added: [], removed } };
    });
  }

  clear(): void {
    this.removeMultiple(this.getTrackIds());
  }

  isEmpty(): boolean {
    return this.store.getState().tracks.size === 0;
  }
}
