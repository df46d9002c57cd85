import * as ort from 'onnxruntime-web';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { ClassifierConfig, ModelSource } from '../../config/visionConfig';
import {
  type ClassifierSession,
  configureOnnxRuntime,
  ModelManager,
  type ModelPixels,
  toInputTensorData,
  topClassifications,
} from '../ModelManager';

vi.mock('onnxruntime-web', () => {
  class Tensor {
    constructor(public type: string, public data: Uint8Array | Float32Array, public dims: number[]) {}
  }
  return { Tensor, InferenceSession: { create: vi.fn() }, env: { wasm: {} } };
});

const uint8Config: ClassifierConfig = {
  inputSize: 1,
  inputType: 'uint8',
  maxResults: 5,
  minConfidence: 0.1,
  labelsUrl: '/models/labels.txt',
};

const pixels: ModelPixels = { data: new Uint8ClampedArray([255, 0, 51, 255]), width: 1, height: 1 };

const mobilenet: ModelSource = { name: 'mobilenet', url: '/models/mobilenet.onnx' };
const broken: ModelSource = { name: 'broken', url: '/models/broken.onnx' };

function fakeSession(output: ort.Tensor) {
  const feeds: ort.InferenceSession.FeedsType[] = [];
  const session: ClassifierSession = {
    inputNames: ['input'],
    async run(input) {
      feeds.push(input);
      return { output };
    },
  };
  return { session, feeds };
}

function labelsFetch(text: string) {
  let calls = 0;
  const fetchImpl: typeof fetch = async (): Promise<Response> => {
    calls += 1;
    return new Response(text);
  };
  return { fetchImpl, callCount: () => calls };
}

describe('toInputTensorData', () => {
  it('drops alpha and keeps raw bytes for quantized models', () => {
    expect(Array.from(toInputTensorData(pixels, 'uint8'))).toEqual([255, 0, 51]);
  });

  it('normalizes to [-1, 1] for float models', () => {
    const [r, g, b] = Array.from(toInputTensorData(pixels, 'float32'));
    expect(r).toBeCloseTo(1);
    expect(g).toBeCloseTo(-1);
    expect(b).toBeCloseTo(-0.6);
  });
});

describe('topClassifications', () => {
  it('keeps the best results above the threshold', () => {
    expect(topClassifications([0.1, 0.7, 0.05, 0.9], ['a', 'b', 'c'], 2, 0.1)).toEqual([
      { label: 'class_3', confidence: 0.9 },
      { label: 'b', confidence: 0.7 },
    ]);
  });
});

describe('configureOnnxRuntime', () => {
  it('runs WASM single threaded without a proxy worker', () => {
    configureOnnxRuntime();

    expect(ort.env.wasm.numThreads).toBe(1);
    expect(ort.env.wasm.proxy).toBe(false);
  });
});

describe('ModelManager', () => {
  let fake: ReturnType<typeof fakeSession>;
  let created: string[];
  let createSession: (url: string) => Promise<ClassifierSession>;

  beforeEach(() => {
    fake = fakeSession(new ort.Tensor('uint8', new Uint8Array([0, 204, 51]), [1, 3]));
    created = [];
    createSession = async (url: string) => {
      created.push(url);
      if (url === broken.url) {
        throw new Error('404 Not Found');
      }
      return fake.session;
    };
  });

  it('falls back to the next source when a model fails to load', async () => {
    const manager = new ModelManager(uint8Config, { createSession });

    await expect(manager.load([broken, mobilenet])).resolves.toBe('mobilenet');
    expect(created).toEqual([broken.url, mobilenet.url]);
  });

  it('reuses sessions that are already loaded', async () => {
    const manager = new ModelManager(uint8Config, { createSession });

    await manager.load([mobilenet]);
    await manager.load([mobilenet]);

    expect(created).toEqual([mobilenet.url]);
  });

  it('fails when no source can be loaded', async () => {
    const manager = new ModelManager(uint8Config, { createSession });

    await expect(manager.load([broken])).rejects.toThrow('No model could be loaded from: broken');
  });

  it('does not request a failed source again until failures are reset', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const manager = new ModelManager(uint8Config, { createSession });

    await manager.load([broken, mobilenet]);
    await manager.load([broken, mobilenet]);
    expect(created).toEqual([broken.url, mobilenet.url]);

    manager.resetFailedSources();
    await manager.load([broken, mobilenet]);
    expect(created).toEqual([broken.url, mobilenet.url, broken.url]);
    vi.restoreAllMocks();
  });

  it('drops the current session when every source fails', async () => {
    const labels = labelsFetch('cat\ndog\nbird');
    const manager = new ModelManager(uint8Config, { createSession, fetchImpl: labels.fetchImpl });
    await manager.load([mobilenet]);

    await expect(manager.load([broken])).rejects.toThrow('No model could be loaded from: broken');
    await expect(manager.classify(pixels)).rejects.toThrow('Model not loaded. Call load() first.');
  });

  it('refuses to classify before a model is loaded', async () => {
    const manager = new ModelManager(uint8Config, { createSession });

    await expect(manager.classify(pixels)).rejects.toThrow('Model not loaded. Call load() first.');
  });

  it('classifies with quantized scores and fetches labels once', async () => {
    const labels = labelsFetch('cat\ndog\n\nbird\n');
    const manager = new ModelManager(uint8Config, { createSession, fetchImpl: labels.fetchImpl });
    await manager.load([mobilenet]);

    const first = await manager.classify(pixels);
    await manager.classify(pixels);

    expect(first).toEqual([
      { label: 'dog', confidence: 0.8 },
      { label: 'bird', confidence: 0.2 },
    ]);
    expect(labels.callCount()).toBe(1);
    expect(fake.feeds[0].input).toMatchObject({ type: 'uint8', dims: [1, 1, 1, 3] });
  });

  it('applies a caller supplied confidence threshold', async () => {
    const labels = labelsFetch('cat\ndog\nbird');
    const manager = new ModelManager(uint8Config, { createSession, fetchImpl: labels.fetchImpl });
    await manager.load([mobilenet]);

    await expect(manager.classify(pixels, 0.75)).resolves.toEqual([{ label: 'dog', confidence: 0.8 }]);
  });

  it('feeds float models normalized input', async () => {
    const floatSession = fakeSession(new ort.Tensor('float32', new Float32Array([0.25, 0.5]), [1, 2]));
    const labels = labelsFetch('cat\ndog');
    const manager = new ModelManager(
      { ...uint8Config, inputType: 'float32' },
      { createSession: async () => floatSession.session, fetchImpl: labels.fetchImpl }
    );
    await manager.load([mobilenet]);

    await expect(manager.classify(pixels)).resolves.toEqual([
      { label: 'dog', confidence: 0.5 },
      { label: 'cat', confidence: 0.25 },
    ]);
    expect(floatSession.feeds[0].input).toMatchObject({ type: 'float32', dims: [1, 1, 1, 3] });
  });
});
