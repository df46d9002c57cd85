import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { applyDetectionResult, formatResults, layoutOverlays, type OverlayRenderer } from '../DetectionPipeline';
import type { MappedRect } from '../../types';
import type { BarcodeFeature, LabelFeature, TextFeature } from '../../types/features';

function recordingRenderer() {
  const overlays: MappedRect[] = [];
  const renderer: OverlayRenderer = {
    addOverlay: rect => {
      overlays.push(rect);
    },
    clearOverlays: () => {
      overlays.length = 0;
    },
  };
  return { overlays, renderer };
}

const label = (name: string, confidence: number): LabelFeature => ({ kind: 'label', label: name, confidence });

const text = (value: string): TextFeature => ({
  kind: 'text',
  frame: { x: 0, y: 0, width: 10, height: 10 },
  text: value,
  cornerPoints: [],
  lines: [],
});

const barcode: BarcodeFeature = {
  kind: 'barcode',
  frame: { x: 10, y: 20, width: 30, height: 40 },
  cornerPoints: [],
  format: 'qr_code',
  rawValue: 'hello',
  displayValue: 'hello',
  valueType: 'text',
  payload: { type: 'text', text: 'hello' },
};

const imageSize = { width: 100, height: 200 };
const viewRect = { x: 0, y: 0, width: 400, height: 400 };

describe('formatResults', () => {
  it('joins text blocks with newlines', () => {
    expect(formatResults('cloudText', [text('Hello'), text('World')])).toBe('Hello\nWorld');
  });

  it('lists labels with their confidence', () => {
    expect(formatResults('onDeviceLabel', [label('cat', 0.9), label('dog', 0.8)])).toBe('cat - 0.9\ndog - 0.8');
  });

  it('terminates every custom model result with a newline', () => {
    expect(formatResults('customModel', [label('cat', 0.9), label('dog', 0.8)])).toBe('cat: 0.9\ndog: 0.8\n');
  });

  it('shows nothing for frame-only detectors', () => {
    expect(formatResults('barcode', [barcode])).toBeNull();
  });
});

describe('applyDetectionResult', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('maps every framed feature into view coordinates', () => {
    const { overlays, renderer } = recordingRenderer();

    const outcome = applyDetectionResult('barcode', { ok: true, features: [barcode] }, imageSize, viewRect, renderer);

    expect(overlays).toEqual([{ x: 120, y: 40, width: 60, height: 80 }]);
    expect(outcome).toEqual({
      ok: true,
      featureCount: 1,
      frames: [{ x: 10, y: 20, width: 30, height: 40 }],
      resultsText: null,
    });
  });

  it('lists labels without drawing anything', () => {
    const { overlays, renderer } = recordingRenderer();

    const outcome = applyDetectionResult(
      'cloudLabel',
      { ok: true, features: [label('cat', 0.9)] },
      imageSize,
      viewRect,
      renderer
    );

    expect(overlays).toEqual([]);
    expect(outcome).toEqual({ ok: true, featureCount: 1, frames: [], resultsText: 'cat - 0.9' });
  });

  it('prefixes the failure reason with the detector status', () => {
    const { overlays, renderer } = recordingRenderer();

    const outcome = applyDetectionResult(
      'cloudLandmark',
      { ok: false, reason: 'No results returned.' },
      imageSize,
      viewRect,
      renderer
    );

    expect(overlays).toEqual([]);
    expect(outcome.resultsText).toBe('Landmark Detection: No results returned.');
    expect(console.warn).toHaveBeenCalledWith('Landmark Detection failed with error: No results returned.');
  });

  it('logs feature details only when asked to', () => {
    const { renderer } = recordingRenderer();

    applyDetectionResult('cloudLabel', { ok: true, features: [label('cat', 0.9)] }, imageSize, viewRect, renderer);
    expect(console.log).not.toHaveBeenCalledWith('Label cat, entity id: , confidence: 0.9');

    applyDetectionResult('cloudLabel', { ok: true, features: [label('cat', 0.9)] }, imageSize, viewRect, renderer, {
      logFeatures: true,
    });
    expect(console.log).toHaveBeenCalledWith('Label cat, entity id: , confidence: 0.9');
  });
});

describe('layoutOverlays', () => {
  it('re-maps the same frames when the view box changes', () => {
    const { overlays, renderer } = recordingRenderer();
    const frames = [{ x: 10, y: 20, width: 30, height: 40 }];

    layoutOverlays(frames, imageSize, viewRect, renderer);
    expect(overlays).toEqual([{ x: 120, y: 40, width: 60, height: 80 }]);

    layoutOverlays(frames, imageSize, { x: 0, y: 0, width: 200, height: 200 }, renderer);
    expect(overlays).toEqual([{ x: 60, y: 20, width: 30, height: 40 }]);
  });
});
