import { describe, expect, it } from 'vitest';

import {
  type DetectedBarcode,
  type DetectedFace,
  type DetectedText,
  OnDeviceBarcodeDetector,
  OnDeviceFaceDetector,
  OnDeviceTextDetector,
} from '../ShapeDetection';
import type { VisionImage } from '../../types';

const image: VisionImage = {
  dataUrl: 'data:image/png;base64,AAAA',
  size: { width: 640, height: 480 },
  element: document.createElement('img'),
};

const box = (x: number, y: number, width: number, height: number) => ({ x, y, width, height });

describe('OnDeviceBarcodeDetector', () => {
  it('asks for QR codes and parses each value', async () => {
    const requestedFormats: string[][] = [];

    class FakeBarcodeDetector {
      constructor(options?: { formats: string[] }) {
        requestedFormats.push(options?.formats ?? []);
      }

      async detect(): Promise<DetectedBarcode[]> {
        return [
          {
            boundingBox: box(10, 10, 100, 100),
            cornerPoints: [{ x: 10, y: 10 }, { x: 110, y: 10 }, { x: 110, y: 110 }, { x: 10, y: 110 }],
            format: 'qr_code',
            rawValue: 'https://example.com',
          },
        ];
      }
    }

    const result = await new OnDeviceBarcodeDetector({ BarcodeDetector: FakeBarcodeDetector }).detect(image);

    expect(requestedFormats).toEqual([['qr_code']]);
    expect(result).toEqual({
      ok: true,
      features: [
        {
          kind: 'barcode',
          frame: { x: 10, y: 10, width: 100, height: 100 },
          cornerPoints: [{ x: 10, y: 10 }, { x: 110, y: 10 }, { x: 110, y: 110 }, { x: 10, y: 110 }],
          format: 'qr_code',
          rawValue: 'https://example.com',
          valueType: 'url',
          displayValue: 'https://example.com',
          payload: { type: 'url', url: 'https://example.com' },
        },
      ],
    });
  });

  it('reports missing browser support as a failure', async () => {
    const result = await new OnDeviceBarcodeDetector({}).detect(image);

    expect(result).toEqual({ ok: false, reason: 'Barcode scanning is not supported in this browser.' });
  });
});

describe('OnDeviceFaceDetector', () => {
  it('flattens landmark locations into one landmark per point', async () => {
    class FakeFaceDetector {
      async detect(): Promise<DetectedFace[]> {
        return [
          {
            boundingBox: box(50, 60, 120, 140),
            landmarks: [
              { type: 'eye', locations: [{ x: 80, y: 100 }, { x: 82, y: 101 }] },
              { type: 'mouth', locations: [{ x: 110, y: 170 }] },
            ],
          },
        ];
      }
    }

    const result = await new OnDeviceFaceDetector({ FaceDetector: FakeFaceDetector }).detect(image);

    expect(result).toEqual({
      ok: true,
      features: [
        {
          kind: 'face',
          frame: { x: 50, y: 60, width: 120, height: 140 },
          landmarks: [
            { type: 'eye', position: { x: 80, y: 100 } },
            { type: 'eye', position: { x: 82, y: 101 } },
            { type: 'mouth', position: { x: 110, y: 170 } },
          ],
        },
      ],
    });
  });

  it('treats an empty detection as no results', async () => {
    class EmptyFaceDetector {
      async detect(): Promise<DetectedFace[]> {
        return [];
      }
    }

    const result = await new OnDeviceFaceDetector({ FaceDetector: EmptyFaceDetector }).detect(image);

    expect(result).toEqual({ ok: false, reason: 'No results returned.' });
  });
});

describe('OnDeviceTextDetector', () => {
  it('exposes each block as a single line', async () => {
    class FakeTextDetector {
      async detect(): Promise<DetectedText[]> {
        return [{ boundingBox: box(0, 0, 40, 10), cornerPoints: [], rawValue: 'EXIT' }];
      }
    }

    const result = await new OnDeviceTextDetector({ TextDetector: FakeTextDetector }).detect(image);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.features[0].text).toBe('EXIT');
    expect(result.features[0].lines).toEqual([
      {
        text: 'EXIT',
        elements: [{ text: 'EXIT', frame: { x: 0, y: 0, width: 40, height: 10 }, cornerPoints: [] }],
      },
    ]);
  });

  it('folds detector errors into the result', async () => {
    class BrokenTextDetector {
      async detect(): Promise<DetectedText[]> {
        throw new Error('Text detection service unavailable');
      }
    }

    const result = await new OnDeviceTextDetector({ TextDetector: BrokenTextDetector }).detect(image);

    expect(result).toEqual({ ok: false, reason: 'Text detection service unavailable' });
  });
});
