/**
 * @fileoverview Game coordinates to image pixels
 *
 * Two strategies; a renderer uses exactly one of them:
 *  - offset/scale onto a blank canvas: pixel = (game + offset) / scale
 *  - proportional mapping onto a base map whose game extents are known
 * Pixel values are truncated toward zero.
 */

export interface PixelPoint {
  px: number;
  py: number;
}

export interface Projection {
  readonly width: number;
  readonly height: number;
  toPixel(x: number, z: number): PixelPoint;
}

export interface OffsetScaleOptions {
  offsetX?: number;
  offsetZ?: number;
  scale?: number;
  width?: number;
  height?: number;
}

export class OffsetScaleProjection implements Projection {
  readonly width: number;
  readonly height: number;
  private readonly offsetX: number;
  private readonly offsetZ: number;
  private readonly scale: number;

  constructor(options: OffsetScaleOptions = {}) {
    this.offsetX = options.offsetX ?? 10500;
    this.offsetZ = options.offsetZ ?? 10500;
    this.scale = options.scale ?? 3.5;
    this.width = options.width ?? 6000;
    this.height = options.height ?? 6000;
    if (this.scale <= 0) throw new RangeError('scale must be positive');
  }

  toPixel(x: number, z: number): PixelPoint {
    return {
      px: Math.trunc((x + this.offsetX) / this.scale),
      py: Math.trunc((z + this.offsetZ) / this.scale),
    };
  }
}

export interface GameExtents {
  xMin: number;
  xMax: number;
  zMin: number;
  zMax: number;
}

/** Playable area of every layer, in game units */
export const WORLD_EXTENTS: GameExtents = { xMin: -6000, xMax: 6000, zMin: -5000, zMax: 5000 };

export class BaseMapProjection implements Projection {
  constructor(
    readonly width: number,
    readonly height: number,
    private readonly extents: GameExtents = WORLD_EXTENTS
  ) {
    if (extents.xMax <= extents.xMin || extents.zMax <= extents.zMin) {
      throw new RangeError('extents must have positive width and height');
    }
  }

  toPixel(x: number, z: number): PixelPoint {
    const { xMin, xMax, zMin, zMax } = this.extents;
    return {
      px: Math.trunc(((x - xMin) / (xMax - xMin)) * this.width),
      py: Math.trunc(((z - zMin) / (zMax - zMin)) * this.height),
    };
  }
}

export function insideCanvas(point: PixelPoint, projection: Projection): boolean {
  return point.px >= 0 && point.py >= 0 && point.px < projection.width && point.py < projection.height;
}
