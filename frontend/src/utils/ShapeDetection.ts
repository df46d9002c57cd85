/**
 * On-device detectors backed by the browser Shape Detection API
 * (BarcodeDetector, FaceDetector, TextDetector).
 */

import type { DetectionResult, Point, Rect, VisionImage } from '../types';
import type {
  BarcodeFeature,
  DetectorKind,
  FaceFeature,
  FaceLandmarkType,
  TextFeature,
} from '../types/features';
import { parseBarcodeValue } from './BarcodeValueParser';
import { settleDetection, type VisionDetector } from './VisionDetector';

export interface DetectedBarcode {
  boundingBox: Rect;
  cornerPoints: Point[];
  format: string;
  rawValue: string;
}

export interface DetectedFace {
  boundingBox: Rect;
  landmarks?: Array<{ type: FaceLandmarkType; locations: Point[] }> | null;
}

export interface DetectedText {
  boundingBox: Rect;
  cornerPoints: Point[];
  rawValue: string;
}

interface ShapeDetector<T> {
  detect(source: ImageBitmapSource): Promise<T[]>;
}

export type BarcodeDetectorConstructor = new (options?: { formats: string[] }) => ShapeDetector<DetectedBarcode>;
export type FaceDetectorConstructor = new (options?: {
  maxDetectedFaces?: number;
  fastMode?: boolean;
}) => ShapeDetector<DetectedFace>;
export type TextDetectorConstructor = new () => ShapeDetector<DetectedText>;

// Not in TypeScript's DOM lib yet; only some Chromium builds ship them
declare global {
  interface Window {
    BarcodeDetector?: BarcodeDetectorConstructor;
    FaceDetector?: FaceDetectorConstructor;
    TextDetector?: TextDetectorConstructor;
  }
}

export interface ShapeDetectionApi {
  BarcodeDetector?: BarcodeDetectorConstructor;
  FaceDetector?: FaceDetectorConstructor;
  TextDetector?: TextDetectorConstructor;
}

export function browserShapeDetection(): ShapeDetectionApi {
  if (typeof window === 'undefined') {
    return {};
  }
  return {
    BarcodeDetector: window.BarcodeDetector,
    FaceDetector: window.FaceDetector,
    TextDetector: window.TextDetector,
  };
}

function toRect(box: Rect): Rect {
  return { x: box.x, y: box.y, width: box.width, height: box.height };
}

function unsupported(name: string): Error {
  return new Error(`${name} is not supported in this browser.`);
}

export class OnDeviceFaceDetector implements VisionDetector<FaceFeature> {
  readonly kind: DetectorKind = 'onDeviceFace';

  constructor(private api: ShapeDetectionApi, private maxDetectedFaces = 10) {}

  detect(image: VisionImage): Promise<DetectionResult<FaceFeature>> {
    return settleDetection(async () => {
      const Detector = this.api.FaceDetector;
      if (!Detector) throw unsupported('On-device face detection');

      const detector = new Detector({ maxDetectedFaces: this.maxDetectedFaces, fastMode: false });
      const faces = await detector.detect(image.element);

      return faces.map((face): FaceFeature => ({
        kind: 'face',
        frame: toRect(face.boundingBox),
        landmarks: (face.landmarks ?? []).flatMap(landmark =>
          landmark.locations.map(position => ({
            type: landmark.type,
            position: { x: position.x, y: position.y },
          }))
        ),
      }));
    });
  }
}

export class OnDeviceBarcodeDetector implements VisionDetector<BarcodeFeature> {
  readonly kind: DetectorKind = 'barcode';

  constructor(private api: ShapeDetectionApi, private formats: string[] = ['qr_code']) {}

  detect(image: VisionImage): Promise<DetectionResult<BarcodeFeature>> {
    return settleDetection(async () => {
      const Detector = this.api.BarcodeDetector;
      if (!Detector) throw unsupported('Barcode scanning');

      const detector = new Detector({ formats: this.formats });
      const barcodes = await detector.detect(image.element);

      return barcodes.map((barcode): BarcodeFeature => ({
        kind: 'barcode',
        frame: toRect(barcode.boundingBox),
        cornerPoints: barcode.cornerPoints.map(point => ({ x: point.x, y: point.y })),
        format: barcode.format,
        rawValue: barcode.rawValue,
        ...parseBarcodeValue(barcode.rawValue),
      }));
    });
  }
}

export class OnDeviceTextDetector implements VisionDetector<TextFeature> {
  readonly kind: DetectorKind = 'onDeviceText';

  constructor(private api: ShapeDetectionApi) {}

  detect(image: VisionImage): Promise<DetectionResult<TextFeature>> {
    return settleDetection(async () => {
      const Detector = this.api.TextDetector;
      if (!Detector) throw unsupported('On-device text recognition');

      const detector = new Detector();
      const blocks = await detector.detect(image.element);

      return blocks.map((block): TextFeature => {
        const frame = toRect(block.boundingBox);
        const cornerPoints = block.cornerPoints.map(point => ({ x: point.x, y: point.y }));
        return {
          kind: 'text',
          frame,
          text: block.rawValue,
          cornerPoints,
          // The browser reports whole blocks; expose each as a single-element line
          lines: [{ text: block.rawValue, elements: [{ text: block.rawValue, frame, cornerPoints }] }],
        };
      });
    });
  }
}
