/**
 * @fileoverview Renders a set of locations as icons on a layer map image
 */

import { access, mkdir } from 'fs/promises';
import * as path from 'path';
import sharp from 'sharp';
import { ErrorCode, SlateError, describeError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';
import { map, speak, type ResponseSegment } from '../protocol/tags.js';
import type { IconLibrary } from './icons.js';
import {
  BaseMapProjection,
  OffsetScaleProjection,
  WORLD_EXTENTS,
  insideCanvas,
  type GameExtents,
  type Projection,
} from './projection.js';
import type { Layer, Location } from './spatial-index.js';

const logger = rootLogger.child('renderer');

export interface Rgba {
  r: number;
  g: number;
  b: number;
  alpha: number;
}

export const CANVAS_BACKGROUND: Rgba = { r: 12, g: 16, b: 33, alpha: 1 };

/**
 * What the icons are drawn onto. A renderer is built with one strategy and
 * uses it for every layer.
 */
export type Backdrop =
  | { kind: 'canvas'; projection: Projection; background: Rgba }
  | { kind: 'base-map'; imageDir: string; extents: GameExtents };

export interface MapRendererOptions {
  outputDir: string;
  icons: IconLibrary;
  backdrop?: Backdrop;
  iconSize?: number;
}

/**
 * "Lookout Landing!" -> "lookout_landing"
 */
export function outputSlug(key: string): string {
  const slug = key
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || 'map';
}

export class MapRenderer {
  private readonly outputDir: string;
  private readonly icons: IconLibrary;
  private readonly backdrop: Backdrop;
  private readonly iconSize: number;
  private readonly iconCache = new Map<string, Promise<Buffer>>();

  constructor(options: MapRendererOptions) {
    this.outputDir = options.outputDir;
    this.icons = options.icons;
    this.backdrop = options.backdrop ?? {
      kind: 'canvas',
      projection: new OffsetScaleProjection(),
      background: CANVAS_BACKGROUND,
    };
    this.iconSize = options.iconSize ?? 60;
  }

  /**
   * Draw every location that has an icon and falls inside the canvas.
   * Returns the written file path, or null when there is nothing to draw.
   */
  async render(locations: Location[], layer: Layer, outputKey: string): Promise<string | null> {
    if (locations.length === 0) {
      logger.debug('Nothing to render', { layer, outputKey });
      return null;
    }

    const outputPath = path.join(this.outputDir, `${layer}_${outputSlug(outputKey)}.png`);
    try {
      const { base, projection } = await this.prepare(layer);
      const overlays = await this.overlays(locations, projection);

      await mkdir(this.outputDir, { recursive: true });
      await base.composite(overlays).png().toFile(outputPath);

      logger.info('Rendered map', { outputPath, markers: overlays.length, requested: locations.length });
      return outputPath;
    } catch (error) {
      throw new SlateError(ErrorCode.INTERNAL, `Map rendering failed: ${describeError(error)}`, {
        layer,
        outputKey,
      });
    }
  }

  private async prepare(layer: Layer): Promise<{ base: sharp.Sharp; projection: Projection }> {
    if (this.backdrop.kind === 'canvas') {
      const { projection, background } = this.backdrop;
      const base = sharp({
        create: { width: projection.width, height: projection.height, channels: 4, background },
      });
      return { base, projection };
    }

    const imagePath = path.join(this.backdrop.imageDir, `${layer}.png`);
    await access(imagePath);
    const base = sharp(imagePath);
    const { width, height } = await base.metadata();
    if (!width || !height) {
      throw new Error(`base map ${imagePath} has no dimensions`);
    }
    return { base, projection: new BaseMapProjection(width, height, this.backdrop.extents) };
  }

  private async overlays(locations: Location[], projection: Projection): Promise<sharp.OverlayOptions[]> {
    const size = this.iconSize;
    const half = Math.trunc(size / 2);
    const overlays: sharp.OverlayOptions[] = [];
    for (const location of locations) {
      const iconPath = this.icons.resolve(location.icon);
      if (!iconPath) {
        logger.debug('No icon for category', { category: location.icon });
        continue;
      }

      const point = projection.toPixel(location.coords.x, location.coords.z);
      if (!insideCanvas(point, projection)) continue;

      // Centred on the point; the part past an edge is cropped off
      const left = point.px - half;
      const top = point.py - half;
      const visible = {
        left: Math.max(0, -left),
        top: Math.max(0, -top),
        width: Math.min(size, projection.width - left) - Math.max(0, -left),
        height: Math.min(size, projection.height - top) - Math.max(0, -top),
      };
      let input = await this.icon(iconPath);
      if (visible.width < size || visible.height < size) {
        input = await sharp(input).extract(visible).toBuffer();
      }
      overlays.push({ input, left: Math.max(0, left), top: Math.max(0, top) });
    }
    return overlays;
  }

  private icon(iconPath: string): Promise<Buffer> {
    let cached = this.iconCache.get(iconPath);
    if (!cached) {
      cached = sharp(iconPath).resize(this.iconSize, this.iconSize, { fit: 'fill' }).png().toBuffer();
      this.iconCache.set(iconPath, cached);
      // A failed read is retried on the next render
      void cached.catch(() => this.iconCache.delete(iconPath));
    }
    return cached;
  }
}

export function baseMapBackdrop(imageDir: string, extents: GameExtents = WORLD_EXTENTS): Backdrop {
  return { kind: 'base-map', imageDir, extents };
}

/**
 * Prose first, then the map marker. No marker when nothing was drawn.
 */
export function mapSegments(description: string, imagePath: string | null): ResponseSegment[] {
  const segments: ResponseSegment[] = [speak(description)];
  if (imagePath) segments.push(map(imagePath));
  return segments;
}
