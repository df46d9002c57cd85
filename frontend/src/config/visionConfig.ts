import { z } from 'zod';
import type { DetectorKind } from '../types/features';

export type ModelInputType = 'uint8' | 'float32';

export interface ModelSource {
  name: string;
  url: string;
}

export interface ClassifierConfig {
  inputSize: number;
  inputType: ModelInputType;
  maxResults: number;
  minConfidence: number;
  labelsUrl: string;
}

export interface VisionConfig {
  cloudVision: {
    apiKey: string | null;
    endpoint: string;
    maxResults: number;
    model: string;
  };
  models: {
    local: ModelSource;
    cloud: [ModelSource, ModelSource];
  };
  classifier: ClassifierConfig;
  defaultImageUrl: string | null;
}

export const VISION_CONSTANTS = {
  labelConfidenceThreshold: 0.75,
  lineWidth: 3,
  lineColor: '#ffff00',
  fillColor: 'rgba(0, 0, 0, 0)',
  detectionNoResultsMessage: 'No results returned.',
  failedToDetectObjectsMessage: 'Failed to detect objects in image.',
  failedToLoadModelMessage: 'Failed to load custom model.',
  missingApiKeyMessage: 'Cloud Vision API key is not configured.',
} as const;

export interface DetectorDescriptor {
  kind: DetectorKind;
  title: string;
  statusPrefix: string;
}

/** Detection menu entries, in the order they are offered. */
export const DETECTION_MENU: DetectorDescriptor[] = [
  { kind: 'onDeviceText', title: 'On-Device Text Recognition', statusPrefix: 'Text detection' },
  { kind: 'barcode', title: 'Barcode Scanning', statusPrefix: 'Barcode detection' },
  { kind: 'onDeviceLabel', title: 'On-Device Label Detection', statusPrefix: 'Label detection' },
  { kind: 'onDeviceFace', title: 'On-Device Face Detection', statusPrefix: 'Face Detection' },
  { kind: 'cloudText', title: 'Cloud Text Recognition', statusPrefix: 'Text detection' },
  { kind: 'cloudLabel', title: 'Cloud Label Detection', statusPrefix: 'Label detection' },
  { kind: 'cloudLandmark', title: 'Cloud Landmark Detection', statusPrefix: 'Landmark Detection' },
  { kind: 'customModel', title: 'Custom Model Object Detection', statusPrefix: 'Object Detection' },
];

export function describeDetector(kind: DetectorKind): DetectorDescriptor {
  const descriptor = DETECTION_MENU.find(entry => entry.kind === kind);
  if (!descriptor) {
    throw new Error(`Unknown detector kind: ${kind}`);
  }
  return descriptor;
}

export const DEFAULT_VISION_CONFIG: VisionConfig = {
  cloudVision: {
    apiKey: null,
    endpoint: 'https://vision.googleapis.com/v1/images:annotate',
    maxResults: 20,
    model: 'builtin/latest',
  },
  models: {
    local: { name: 'mobilenet', url: '/models/mobilenet_quant_v1_224.onnx' },
    // Replace these with models you host yourself
    cloud: [
      { name: 'invalid_model', url: '/models/invalid_model.onnx' },
      { name: 'image_classification', url: '/models/image_classification.onnx' },
    ],
  },
  classifier: {
    inputSize: 224,
    inputType: 'uint8',
    maxResults: 5,
    minConfidence: 0.1,
    labelsUrl: '/models/labels_quant.txt',
  },
  defaultImageUrl: null,
};

// Empty strings in .env files mean "not set"
const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const VisionEnvSchema = z.object({
  VITE_CLOUD_VISION_API_KEY: optionalString,
  VITE_CLOUD_VISION_ENDPOINT: optionalString.pipe(z.string().url().optional()),
  VITE_LOCAL_MODEL_URL: optionalString,
  VITE_CLOUD_MODEL_1_URL: optionalString,
  VITE_CLOUD_MODEL_2_URL: optionalString,
  VITE_LABELS_URL: optionalString,
  VITE_DEFAULT_IMAGE_URL: optionalString,
  VITE_MODEL_INPUT_TYPE: optionalString.pipe(z.enum(['uint8', 'float32']).optional()),
});

/**
 * Build the runtime configuration from Vite environment variables.
 * Unset variables fall back to DEFAULT_VISION_CONFIG.
 */
export function loadVisionConfig(env: Record<string, unknown>): VisionConfig {
  const parsed = VisionEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid vision configuration: ${issues}`);
  }

  const vars = parsed.data;
  const defaults = DEFAULT_VISION_CONFIG;
  const [cloud1, cloud2] = defaults.models.cloud;

  return {
    cloudVision: {
      ...defaults.cloudVision,
      apiKey: vars.VITE_CLOUD_VISION_API_KEY ?? null,
      endpoint: vars.VITE_CLOUD_VISION_ENDPOINT ?? defaults.cloudVision.endpoint,
    },
    models: {
      local: { ...defaults.models.local, url: vars.VITE_LOCAL_MODEL_URL ?? defaults.models.local.url },
      cloud: [
        { ...cloud1, url: vars.VITE_CLOUD_MODEL_1_URL ?? cloud1.url },
        { ...cloud2, url: vars.VITE_CLOUD_MODEL_2_URL ?? cloud2.url },
      ],
    },
    classifier: {
      ...defaults.classifier,
      inputType: vars.VITE_MODEL_INPUT_TYPE ?? defaults.classifier.inputType,
      labelsUrl: vars.VITE_LABELS_URL ?? defaults.classifier.labelsUrl,
    },
    defaultImageUrl: vars.VITE_DEFAULT_IMAGE_URL ?? null,
  };
}
