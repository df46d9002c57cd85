import { VISION_CONSTANTS, type VisionConfig } from '../config/visionConfig';
import type { DetectorKind } from '../types/features';
import { ClassifierDetector, type PixelReader } from './ClassifierDetector';
import { CloudLabelDetector, CloudLandmarkDetector, CloudTextDetector } from './CloudDetectors';
import { CloudVisionClient } from './CloudVisionClient';
import { ModelManager } from './ModelManager';
import {
  browserShapeDetection,
  OnDeviceBarcodeDetector,
  OnDeviceFaceDetector,
  OnDeviceTextDetector,
  type ShapeDetectionApi,
} from './ShapeDetection';
import type { VisionDetector } from './VisionDetector';

export type ModelIndex = 0 | 1;

export interface DetectorServiceDependencies {
  shapeDetection?: ShapeDetectionApi;
  fetchImpl?: typeof fetch;
  modelManager?: ModelManager;
  readPixels?: PixelReader;
}

export interface DetectorService {
  detectors: Record<DetectorKind, VisionDetector>;
  customModel: ClassifierDetector;
  selectModel(index: ModelIndex): void;
}

/**
 * Builds one detector per menu entry. Every variant is reached through the
 * same `VisionDetector` interface, so callers only dispatch on the tag.
 */
export function createDetectorService(
  config: VisionConfig,
  deps: DetectorServiceDependencies = {}
): DetectorService {
  const shapeDetection = deps.shapeDetection ?? browserShapeDetection();
  const modelManager = deps.modelManager ?? new ModelManager(config.classifier, { fetchImpl: deps.fetchImpl });

  const { apiKey } = config.cloudVision;
  const cloudClient = apiKey
    ? new CloudVisionClient({ ...config.cloudVision, apiKey, fetchImpl: deps.fetchImpl })
    : null;
  const provideClient = () => cloudClient;

  const { local, cloud } = config.models;
  const customModel = new ClassifierDetector('customModel', modelManager, [cloud[0], local], {
    inputSize: config.classifier.inputSize,
    emptyMessage: VISION_CONSTANTS.failedToDetectObjectsMessage,
    readPixels: deps.readPixels,
  });
  const onDeviceLabel = new ClassifierDetector('onDeviceLabel', modelManager, [local], {
    inputSize: config.classifier.inputSize,
    minConfidence: VISION_CONSTANTS.labelConfidenceThreshold,
    readPixels: deps.readPixels,
  });

  return {
    detectors: {
      onDeviceText: new OnDeviceTextDetector(shapeDetection),
      barcode: new OnDeviceBarcodeDetector(shapeDetection),
      onDeviceLabel,
      onDeviceFace: new OnDeviceFaceDetector(shapeDetection),
      cloudText: new CloudTextDetector(provideClient),
      cloudLabel: new CloudLabelDetector(provideClient),
      cloudLandmark: new CloudLandmarkDetector(provideClient),
      customModel,
    },
    customModel,
    selectModel(index: ModelIndex) {
      modelManager.resetFailedSources();
      customModel.setSources([cloud[index], local]);
    },
  };
}
