import * as ort from 'onnxruntime-web';
import type { ClassifierConfig, ModelInputType, ModelSource } from '../config/visionConfig';

/** RGBA pixels already scaled to the model input size. */
export interface ModelPixels {
  data: Uint8ClampedArray;
  width: number;
  height: number;
}

export interface Classification {
  label: string;
  confidence: number;
}

/** The subset of `ort.InferenceSession` the classifier relies on. */
export interface ClassifierSession {
  readonly inputNames: readonly string[];
  run(feeds: ort.InferenceSession.FeedsType): Promise<ort.InferenceSession.ReturnType>;
}

export interface ModelManagerOptions {
  executionProviders?: string[];
  createSession?: (url: string, options: ort.InferenceSession.SessionOptions) => Promise<ClassifierSession>;
  fetchImpl?: typeof fetch;
}

export function configureOnnxRuntime(): void {
  ort.env.wasm.numThreads = 1; // Single threaded so no cross-origin isolation is needed
  ort.env.wasm.proxy = false;
  console.log('🔧 ONNX Runtime configured for single-threaded WASM');
}

/**
 * Converts RGBA pixels to the NHWC RGB layout image classifiers take.
 * Quantized models get raw bytes, float models values in [-1, 1].
 */
export function toInputTensorData(pixels: ModelPixels, inputType: ModelInputType): Uint8Array | Float32Array {
  const count = pixels.width * pixels.height;
  const out = inputType === 'uint8' ? new Uint8Array(count * 3) : new Float32Array(count * 3);

  for (let i = 0; i < count; i++) {
    for (let c = 0; c < 3; c++) {
      const value = pixels.data[i * 4 + c];
      out[i * 3 + c] = inputType === 'uint8' ? value : (value - 127.5) / 127.5;
    }
  }
  return out;
}

export function topClassifications(
  scores: ArrayLike<number>,
  labels: string[],
  maxResults: number,
  minConfidence: number
): Classification[] {
  const results: Classification[] = [];
  for (let i = 0; i < scores.length; i++) {
    if (scores[i] >= minConfidence) {
      results.push({ label: labels[i] ?? `class_${i}`, confidence: scores[i] });
    }
  }
  return results.sort((a, b) => b.confidence - a.confidence).slice(0, maxResults);
}

function outputScores(output: ort.Tensor | undefined): number[] {
  if (!output) {
    throw new Error('Invalid model output');
  }
  const { data } = output;
  if (data instanceof Uint8Array) {
    return Array.from(data, value => value / 255);
  }
  if (data instanceof Float32Array) {
    return Array.from(data);
  }
  throw new Error(`Unsupported model output type: ${output.type}`);
}

/**
 * Loads image-classifier models through ONNX Runtime Web and runs them.
 *
 * Sessions are cached by model name, so switching back and forth between
 * models only downloads each one once. `load` tries the given sources in
 * order and keeps the first one that loads; sources that failed are skipped
 * until `resetFailedSources` is called.
 */
export class ModelManager {
  private sessions = new Map<string, ClassifierSession>();
  private failedSources = new Set<string>();
  private activeModel: string | null = null;
  private labels: string[] | null = null;
  private config: ClassifierConfig;
  private executionProviders: string[];
  private createSession: (url: string, options: ort.InferenceSession.SessionOptions) => Promise<ClassifierSession>;
  private fetchImpl: typeof fetch;

  constructor(config: ClassifierConfig, options: ModelManagerOptions = {}) {
    this.config = config;
    this.executionProviders = options.executionProviders ?? ['wasm'];
    this.createSession = options.createSession ?? ((url, sessionOptions) => ort.InferenceSession.create(url, sessionOptions));
    this.fetchImpl = options.fetchImpl ?? fetch.bind(globalThis);
  }

  async load(sources: ModelSource[]): Promise<string> {
    for (const source of sources) {
      if (this.sessions.has(source.name)) {
        this.activeModel = source.name;
        return source.name;
      }

      if (this.failedSources.has(source.name)) {
        console.warn(`⏭️ Skipping model ${source.name}, it failed to load earlier`);
        continue;
      }

      try {
        console.log('🚀 Loading model', source.name, 'from', source.url);
        const session = await this.createSession(source.url, {
          executionProviders: this.executionProviders,
          graphOptimizationLevel: 'basic',
        });
        this.sessions.set(source.name, session);
        this.activeModel = source.name;
        console.log('✅ Model loaded:', source.name);
        return source.name;
      } catch (error) {
        this.failedSources.add(source.name);
        console.warn(`⚠️ Model ${source.name} failed to load, trying next source:`, error);
      }
    }

    this.activeModel = null;
    throw new Error(`No model could be loaded from: ${sources.map(s => s.name).join(', ')}`);
  }

  /** Lets sources that failed before be tried again on the next load. */
  resetFailedSources(): void {
    this.failedSources.clear();
  }

  async classify(pixels: ModelPixels, minConfidence = this.config.minConfidence): Promise<Classification[]> {
    const session = this.activeModel ? this.sessions.get(this.activeModel) : undefined;
    if (!session) {
      throw new Error('Model not loaded. Call load() first.');
    }

    const labels = await this.loadLabels();
    const data = toInputTensorData(pixels, this.config.inputType);
    const dims = [1, pixels.height, pixels.width, 3];
    const tensor = data instanceof Uint8Array
      ? new ort.Tensor('uint8', data, dims)
      : new ort.Tensor('float32', data, dims);

    const startTime = performance.now();
    const results = await session.run({ [session.inputNames[0]]: tensor });
    console.log(`Inference completed in ${(performance.now() - startTime).toFixed(2)}ms`);

    const scores = outputScores(Object.values(results)[0]);
    return topClassifications(scores, labels, this.config.maxResults, minConfidence);
  }

  private async loadLabels(): Promise<string[]> {
    if (this.labels) {
      return this.labels;
    }

    const response = await this.fetchImpl(this.config.labelsUrl);
    if (!response.ok) {
      throw new Error(`Failed to load labels (${response.status})`);
    }
    const text = await response.text();
    this.labels = text
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0);
    return this.labels;
  }
}
