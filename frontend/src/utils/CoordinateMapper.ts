import type {
  AspectFitTransform,
  FeatureRect,
  ImageSize,
  MappedRect,
  ViewRect,
} from '../types';
import { ContractViolationError } from './errors';

function assertPositiveSize(label: string, width: number, height: number): void {
  const valid =
    Number.isFinite(width) && Number.isFinite(height) && width > 0 && height > 0;
  if (!valid) {
    throw new ContractViolationError(
      `${label} must have positive, finite dimensions (got ${width}x${height})`
    );
  }
}

/**
 * Computes how an image is laid out inside a view under aspect-fit scaling:
 * scaled uniformly to fit entirely, centered, with empty margins on the
 * non-binding axis.
 */
export function aspectFitTransform(imageSize: ImageSize, viewRect: ViewRect): AspectFitTransform {
  assertPositiveSize('Image size', imageSize.width, imageSize.height);
  assertPositiveSize('View rect', viewRect.width, viewRect.height);

  const rView = viewRect.width / viewRect.height;
  const rImage = imageSize.width / imageSize.height;

  // View relatively wider than the image: height is the binding axis
  const scale = rView > rImage
    ? viewRect.height / imageSize.height
    : viewRect.width / imageSize.width;

  const imageWidthScaled = imageSize.width * scale;
  const imageHeightScaled = imageSize.height * scale;

  return {
    scale,
    offsetX: (viewRect.width - imageWidthScaled) / 2,
    offsetY: (viewRect.height - imageHeightScaled) / 2,
    imageWidthScaled,
    imageHeightScaled,
  };
}

/**
 * Converts a feature frame from the scale of the original image to the scale
 * of the aspect-fit image on the view.
 *
 * The result is local to the view: `viewRect`'s origin takes no part in it.
 *
 * @throws ContractViolationError when either size has a non-positive side.
 */
export function mapToView(
  featureRect: FeatureRect,
  imageSize: ImageSize,
  viewRect: ViewRect
): MappedRect {
  const { scale, offsetX, offsetY } = aspectFitTransform(imageSize, viewRect);

  return {
    x: offsetX + featureRect.x * scale,
    y: offsetY + featureRect.y * scale,
    width: featureRect.width * scale,
    height: featureRect.height * scale,
  };
}
