import type { Track } from '../domain/track';

/** Source of the tracks to analyse, read at call time */
export type GetTracks = () => Iterable<Track>;
