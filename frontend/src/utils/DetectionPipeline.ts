import { describeDetector } from '../config/visionConfig';
import type { DetectionResult, FeatureRect, ImageSize, MappedRect, ViewRect } from '../types';
import { type DetectorKind, featureFrame, type VisionFeature } from '../types/features';
import { mapToView } from './CoordinateMapper';
import { describeFeature } from './FeatureLogger';

/** Owns the overlay rectangles currently drawn over the image. */
export interface OverlayRenderer {
  addOverlay(rect: MappedRect): void;
  clearOverlays(): void;
}

export interface DetectionOutcome {
  ok: boolean;
  featureCount: number;
  // Image-space frames behind the drawn overlays
  frames: FeatureRect[];
  resultsText: string | null;
}

/**
 * Text shown in the results view for a successful detection, or null when
 * the detector only draws frames.
 */
export function formatResults(kind: DetectorKind, features: VisionFeature[]): string | null {
  switch (kind) {
    case 'onDeviceText':
    case 'cloudText':
      return features.flatMap(f => (f.kind === 'text' ? [f.text] : [])).join('\n');
    case 'onDeviceLabel':
    case 'cloudLabel':
      return features
        .flatMap(f => (f.kind === 'label' ? [`${f.label} - ${f.confidence}`] : []))
        .join('\n');
    case 'customModel':
      return features
        .flatMap(f => (f.kind === 'label' ? [`${f.label}: ${f.confidence}\n`] : []))
        .join('');
    default:
      return null;
  }
}

/**
 * Replaces the drawn overlays with `frames` mapped into `viewRect`.
 * Called again with the new view box whenever the image is re-laid out.
 */
export function layoutOverlays(
  frames: FeatureRect[],
  imageSize: ImageSize,
  viewRect: ViewRect,
  renderer: OverlayRenderer
): void {
  renderer.clearOverlays();
  for (const frame of frames) {
    renderer.addOverlay(mapToView(frame, imageSize, viewRect));
  }
}

/**
 * Turns one detector response into overlays and a results message.
 * On failure nothing is mapped and the message is "<prefix>: <reason>".
 */
export function applyDetectionResult(
  kind: DetectorKind,
  result: DetectionResult<VisionFeature>,
  imageSize: ImageSize,
  viewRect: ViewRect,
  renderer: OverlayRenderer,
  options: { logFeatures?: boolean } = {}
): DetectionOutcome {
  const { statusPrefix } = describeDetector(kind);

  if (!result.ok) {
    console.warn(`${statusPrefix} failed with error: ${result.reason}`);
    return {
      ok: false,
      featureCount: 0,
      frames: [],
      resultsText: `${statusPrefix}: ${result.reason}`,
    };
  }

  const frames: FeatureRect[] = [];
  for (const feature of result.features) {
    const frame = featureFrame(feature);
    if (frame) {
      frames.push(frame);
      renderer.addOverlay(mapToView(frame, imageSize, viewRect));
    }
    if (options.logFeatures) {
      describeFeature(feature).forEach(line => console.log(line));
    }
  }

  console.log(`🎯 ${statusPrefix}: ${result.features.length} features, ${frames.length} frames drawn`);

  return {
    ok: true,
    featureCount: result.features.length,
    frames,
    resultsText: formatResults(kind, result.features),
  };
}
