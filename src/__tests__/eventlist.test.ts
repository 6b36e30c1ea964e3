import { describe, it, expect } from 'vitest';
import { EventType } from '../domain/eventType';
import { SceneActionDetector } from '../eventlist/SceneActionDetector';
import { VIDEO_NAME, at, makeTrack } from './fixtures';

describe('SceneActionDetector', () => {
  const track = makeTrack(1, [
    { x: 0, y: 5 },
    { x: 10, y: 5 },
  ]);

  it('should create the enter scene event at the first detection', () => {
    const event = new SceneActionDetector().detectEnterScene(track);

    expect(event).toEqual({
      roadUserId: '1',
      roadUserType: 'car',
      hostname: 'myhostname',
      occurrence: at(0),
      frameNumber: 1,
      sectionId: null,
      eventCoordinate: { x: 0, y: 5 },
      eventType: EventType.ENTER_SCENE,
      directionVector: { x: 10, y: 0 },
      videoName: VIDEO_NAME,
    });
  });

  it('should create the leave scene event at the last detection', () => {
    const event = new SceneActionDetector().detectLeaveScene(track);

    expect(event.eventType).toBe(EventType.LEAVE_SCENE);
    expect(event.frameNumber).toBe(2);
    expect(event.occurrence).toEqual(at(1));
    expect(event.eventCoordinate).toEqual({ x: 10, y: 5 });
    expect(event.directionVector).toEqual({ x: 10, y: 0 });
  });

  it('should use the last two detections for the leave direction', () => {
    const bending = makeTrack(2, [
      { x: 0, y: 0 },
      { x: 4, y: 0 },
      { x: 4, y: 3 },
    ]);
    const detector = new SceneActionDetector();

    expect(detector.detectEnterScene(bending).directionVector).toEqual({ x: 4, y: 0 });
    expect(detector.detectLeaveScene(bending).directionVector).toEqual({ x: 0, y: 3 });
  });

  it('should emit enter and leave per track', () => {
    const other = makeTrack(2, [
      { x: 1, y: 1 },
      { x: 2, y: 2 },
    ]);
    const events = new SceneActionDetector().detect([track, other]);

    expect(events.map(e => `${e.roadUserId}:${e.eventType}`)).toEqual([
      '1:enter-scene',
      '1:leave-scene',
      '2:enter-scene',
      '2:leave-scene',
    ]);
  });
});
