export { SpatialIndex, loadRegions, parseMarkerFile, inRegion, isLayer, layerFromPath, looseCategory, LAYERS } from './spatial-index.js';
export type { Layer, Location, Region } from './spatial-index.js';
export { OffsetScaleProjection, BaseMapProjection, WORLD_EXTENTS, insideCanvas } from './projection.js';
export type { Projection, PixelPoint, GameExtents, OffsetScaleOptions } from './projection.js';
export { IconLibrary } from './icons.js';
export { MapRenderer, mapSegments, outputSlug, baseMapBackdrop, CANVAS_BACKGROUND } from './renderer.js';
export type { Backdrop, MapRendererOptions, Rgba } from './renderer.js';
