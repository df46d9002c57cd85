import { VISION_CONSTANTS } from '../config/visionConfig';
import type { DetectionResult, VisionImage } from '../types';
import type { DetectorKind, VisionFeature } from '../types/features';
import { errorMessage } from './errors';

/**
 * Uniform entry point to every detection backend. `detect` settles exactly
 * once and never rejects: failures and empty results come back as
 * `{ ok: false, reason }`.
 */
export interface VisionDetector<F extends VisionFeature = VisionFeature> {
  readonly kind: DetectorKind;
  detect(image: VisionImage): Promise<DetectionResult<F>>;
}

export async function settleDetection<F>(
  run: () => Promise<F[]>,
  emptyMessage: string = VISION_CONSTANTS.detectionNoResultsMessage
): Promise<DetectionResult<F>> {
  try {
    const features = await run();
    if (features.length === 0) {
      return { ok: false, reason: emptyMessage };
    }
    return { ok: true, features };
  } catch (error) {
    return { ok: false, reason: errorMessage(error, emptyMessage) };
  }
}
