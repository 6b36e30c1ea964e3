import RBush from 'rbush';
import type { BBox, Coordinate } from './types';

export interface IndexedItem {
  id: string;
  bbox: BBox;
}

interface RbushItem extends BBox {
  id: string;
}

export class SpatialIndex {
  private tree: RBush<RbushItem>;

  constructor(maxEntries: number = 16) {
    this.tree = new RBush(maxEntries);
  }

  /** Replaces the whole content by `items` */
  load(items: readonly IndexedItem[]): void {
    this.tree.clear();
    this.tree.load(items.map(item => ({ id: item.id, ...item.bbox })));
  }

  /** Ids of all items whose box touches `bbox` */
  search(bbox: BBox): Set<string> {
    return new Set(this.tree.search(bbox).map(item => item.id));
  }
}

export function computeBbox(points: readonly Coordinate[]): BBox {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.x > maxX) maxX = p.x;
    if (p.y > maxY) maxY = p.y;
  }
  return { minX, minY, maxX, maxY };
}
