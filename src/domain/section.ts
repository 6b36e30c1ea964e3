import type { BBox, Coordinate, Line, RelativeOffsetCoordinate } from '../geometry/types';
import { coordinatesEqual } from '../geometry/coordinate';
import { computeBbox } from '../geometry/SpatialIndex';
import { MissingOffsetError, SectionValidationError } from '../errors';
import type { EventType } from './eventType';

export type SectionId = string;

export type RelativeOffsets = Readonly<Partial<Record<EventType, RelativeOffsetCoordinate>>>;

/** Opaque data of plugins, never interpreted by the analysis */
export type PluginData = Readonly<Record<string, unknown>>;

interface SectionBase {
  readonly id: SectionId;
  readonly name: string;
  readonly relativeOffsetCoordinates: RelativeOffsets;
  readonly pluginData: PluginData;
}

export interface LineSection extends SectionBase {
  readonly type: 'line';
  readonly start: Coordinate;
  readonly end: Coordinate;
}

/** Line used to split tracks into sub-tracks instead of counting */
export interface CuttingSection extends SectionBase {
  readonly type: 'cutting';
  readonly start: Coordinate;
  readonly end: Coordinate;
}

export interface Area extends SectionBase {
  readonly type: 'area';
  readonly coordinates: readonly Coordinate[];
}

export type Section = LineSection | CuttingSection | Area;

export interface SectionInput {
  id: SectionId;
  name?: string;
  relativeOffsetCoordinates?: RelativeOffsets;
  pluginData?: PluginData;
}

function baseOf(input: SectionInput): SectionBase {
  if (input.id.length === 0) {
    throw new SectionValidationError('section id must not be empty');
  }
  return {
    id: input.id,
    name: input.name ?? input.id,
    relativeOffsetCoordinates: Object.freeze({ ...input.relativeOffsetCoordinates }),
    pluginData: Object.freeze({ ...input.pluginData }),
  };
}

function validateLine(start: Coordinate, end: Coordinate): void {
  if (coordinatesEqual(start, end)) {
    throw new SectionValidationError(
      'Start and end point of coordinate must be different to be a line, but are same'
    );
  }
}

export function createLineSection(input: SectionInput & { start: Coordinate; end: Coordinate }): LineSection {
  validateLine(input.start, input.end);
  const section: LineSection = { ...baseOf(input), type: 'line', start: input.start, end: input.end };
  return Object.freeze(section);
}

export function createCuttingSection(input: SectionInput & { start: Coordinate; end: Coordinate }): CuttingSection {
  validateLine(input.start, input.end);
  const section: CuttingSection = { ...baseOf(input), type: 'cutting', start: input.start, end: input.end };
  return Object.freeze(section);
}

export function createArea(input: SectionInput & { coordinates: readonly Coordinate[] }): Area {
  const { coordinates } = input;
  if (coordinates.length < 4) {
    throw new SectionValidationError(
      `Number of coordinates to define a valid area must be greater equal four, but is ${coordinates.length}`
    );
  }
  if (!coordinatesEqual(coordinates[0], coordinates[coordinates.length - 1])) {
    throw new SectionValidationError('Coordinates do not define a closed area');
  }
  const area: Area = { ...baseOf(input), type: 'area', coordinates: Object.freeze([...coordinates]) };
  return Object.freeze(area);
}

export function getOffset(section: Section, eventType: EventType): RelativeOffsetCoordinate {
  const offset = section.relativeOffsetCoordinates[eventType];
  if (offset === undefined) {
    throw new MissingOffsetError(section.id, eventType);
  }
  return offset;
}

export function getSectionCoordinates(section: Section): Line {
  switch (section.type) {
    case 'line':
    case 'cutting':
      return [section.start, section.end];
    case 'area':
      return section.coordinates;
  }
}

export function sectionBbox(section: Section): BBox {
  return computeBbox(getSectionCoordinates(section));
}

export function withPluginData(section: Section, pluginData: PluginData): Section {
  return Object.freeze({ ...section, pluginData: Object.freeze({ ...pluginData }) });
}
