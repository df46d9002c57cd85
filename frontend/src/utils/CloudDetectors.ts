import { VISION_CONSTANTS } from '../config/visionConfig';
import type { DetectionResult, VisionImage } from '../types';
import type { DetectorKind, LabelFeature, LandmarkFeature, TextFeature } from '../types/features';
import { CloudVisionClient } from './CloudVisionClient';
import { settleDetection, type VisionDetector } from './VisionDetector';

type ClientProvider = () => CloudVisionClient | null;

function requireClient(provide: ClientProvider): CloudVisionClient {
  const client = provide();
  if (!client) {
    throw new Error(VISION_CONSTANTS.missingApiKeyMessage);
  }
  return client;
}

export class CloudLabelDetector implements VisionDetector<LabelFeature> {
  readonly kind: DetectorKind = 'cloudLabel';

  constructor(private client: ClientProvider) {}

  detect(image: VisionImage): Promise<DetectionResult<LabelFeature>> {
    return settleDetection(() => requireClient(this.client).detectLabels(image));
  }
}

export class CloudLandmarkDetector implements VisionDetector<LandmarkFeature> {
  readonly kind: DetectorKind = 'cloudLandmark';

  constructor(private client: ClientProvider) {}

  detect(image: VisionImage): Promise<DetectionResult<LandmarkFeature>> {
    return settleDetection(() => requireClient(this.client).detectLandmarks(image));
  }
}

export class CloudTextDetector implements VisionDetector<TextFeature> {
  readonly kind: DetectorKind = 'cloudText';

  constructor(private client: ClientProvider) {}

  detect(image: VisionImage): Promise<DetectionResult<TextFeature>> {
    return settleDetection(async () => {
      const annotation = await requireClient(this.client).detectDocumentText(image);
      if (annotation?.text) {
        console.log('📝 Detected text:', annotation.text);
      }
      return annotation?.blocks ?? [];
    });
  }
}
