export { CutTrackSegmentBuilder } from './CutTrackSegmentBuilder';
export { CutTracksWithSection } from './CutTracksWithSection';
