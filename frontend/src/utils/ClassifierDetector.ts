import { type ModelSource, VISION_CONSTANTS } from '../config/visionConfig';
import type { DetectionResult, VisionImage } from '../types';
import type { DetectorKind, LabelFeature } from '../types/features';
import { readScaledPixels } from './imageLoading';
import { ModelManager, type ModelPixels } from './ModelManager';
import { settleDetection, type VisionDetector } from './VisionDetector';

export type PixelReader = (image: VisionImage, size: number) => ModelPixels;

const defaultPixelReader: PixelReader = (image, size) => readScaledPixels(image.element, size);

/**
 * Image labelling through an ONNX classifier. `customModel` runs the
 * user-selected model (with the bundled one as fallback); `onDeviceLabel`
 * always runs the bundled model and keeps only confident labels.
 */
export class ClassifierDetector implements VisionDetector<LabelFeature> {
  private sources: ModelSource[];

  constructor(
    readonly kind: DetectorKind,
    private models: ModelManager,
    sources: ModelSource[],
    private options: {
      inputSize: number;
      minConfidence?: number;
      emptyMessage?: string;
      readPixels?: PixelReader;
    }
  ) {
    this.sources = sources;
  }

  setSources(sources: ModelSource[]): void {
    this.sources = sources;
  }

  /** Loads the first available model; resolves with its name. */
  prepare(): Promise<string> {
    return this.models.load(this.sources);
  }

  detect(image: VisionImage): Promise<DetectionResult<LabelFeature>> {
    const emptyMessage = this.options.emptyMessage ?? VISION_CONSTANTS.detectionNoResultsMessage;
    const readPixels = this.options.readPixels ?? defaultPixelReader;

    return settleDetection(async () => {
      await this.prepare().catch((error: unknown) => {
        console.error('Failed to load custom model:', error);
        throw new Error(VISION_CONSTANTS.failedToLoadModelMessage);
      });
      const pixels = readPixels(image, this.options.inputSize);
      const results = await this.models.classify(pixels, this.options.minConfidence);
      return results.map((result): LabelFeature => ({
        kind: 'label',
        label: result.label,
        confidence: result.confidence,
      }));
    }, emptyMessage);
  }
}
