export { SectionActionDetector } from './SectionActionDetector';
export { SceneActionDetector } from './SceneActionDetector';
