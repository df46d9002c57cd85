// Core geometry and result types shared by detectors, the mapper and the renderer

export interface Point {
  x: number;
  y: number;
}

export interface ImageSize {
  width: number;
  height: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Bounding box of a detection, in pixel coordinates of the source image. */
export type FeatureRect = Rect;

/** Frame of the on-screen surface the image is displayed in (aspect-fit). */
export type ViewRect = Rect;

/** A feature rectangle after conversion to view-local coordinates. */
export type MappedRect = Readonly<Rect>;

export interface AspectFitTransform {
  scale: number;
  offsetX: number;
  offsetY: number;
  imageWidthScaled: number;
  imageHeightScaled: number;
}

export type DetectionResult<T> =
  | { ok: true; features: T[] }
  | { ok: false; reason: string };

/**
 * A picked photo ready to be handed to a detector.
 * `dataUrl` feeds REST backends, `element` feeds in-browser backends.
 */
export interface VisionImage {
  dataUrl: string;
  size: ImageSize;
  element: HTMLImageElement;
}

/** Serializable description of the current picture kept in the store. */
export interface PickedImage {
  dataUrl: string;
  width: number;
  height: number;
  name: string;
}
