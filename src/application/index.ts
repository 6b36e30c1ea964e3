export { RunIntersect } from './RunIntersect';
export { CreateEvents } from './CreateEvents';
export { TracksIntersectingSections } from './TracksIntersectingSections';
export { CutTracksIntersectingSection, CutTracksWithCuttingSections } from './CutTracksIntersectingSection';
export type { CutTracksResult } from './CutTracksIntersectingSection';
export { ClearAllEvents } from './ClearAllEvents';
export { createAnalysis } from './createAnalysis';
export type { Analysis, AnalysisDependencies } from './createAnalysis';
export type { GetTracks } from './types';
