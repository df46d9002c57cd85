import type { PickedImage, VisionImage } from '../types';
import { ContractViolationError } from './errors';
import type { ModelPixels } from './ModelManager';

export function readFileAsDataUrl(file: Blob): Promise<string> {
  return new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => {
      if (typeof reader.result === 'string') {
        resolve(reader.result);
      } else {
        reject(new Error('Unexpected file reader result'));
      }
    };
    reader.onerror = () => reject(reader.error ?? new Error('Failed to read file'));
    reader.readAsDataURL(file);
  });
}

export function loadImageElement(src: string): Promise<HTMLImageElement> {
  return new Promise((resolve, reject) => {
    const img = new Image();
    img.onload = () => resolve(img);
    img.onerror = () => reject(new Error('Failed to decode image'));
    img.src = src;
  });
}

/**
 * Wraps a decoded picture for the detectors. Detection requires a loaded
 * image with non-zero dimensions.
 */
export function toVisionImage(picked: PickedImage, element: HTMLImageElement): VisionImage {
  if (!(picked.width > 0 && picked.height > 0)) {
    throw new ContractViolationError(`Image "${picked.name}" has no pixels (${picked.width}x${picked.height})`);
  }
  return {
    dataUrl: picked.dataUrl,
    size: { width: picked.width, height: picked.height },
    element,
  };
}

/** Draws the image into a `size`×`size` canvas and returns its RGBA pixels. */
export function readScaledPixels(element: HTMLImageElement, size: number): ModelPixels {
  const canvas = document.createElement('canvas');
  canvas.width = size;
  canvas.height = size;
  const ctx = canvas.getContext('2d');
  if (!ctx) {
    throw new Error('Canvas 2D context is unavailable');
  }
  ctx.drawImage(element, 0, 0, size, size);
  const { data, width, height } = ctx.getImageData(0, 0, size, size);
  return { data, width, height };
}
