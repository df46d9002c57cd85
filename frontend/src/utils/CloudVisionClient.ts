/**
 * Cloud Vision REST client
 *
 * Sends one `images:annotate` request per detection and converts the
 * annotations into app features in image pixel coordinates.
 */

import type { FeatureRect, Point, VisionImage } from '../types';
import {
  type AnnotateImageRequest,
  type AnnotateImageResponse,
  AnnotateImageResponseSchema,
  BatchAnnotateImagesResponseSchema,
  type BoundingPoly,
  type CloudFeatureType,
  type EntityAnnotation,
  ErrorResponseSchema,
  type TextBlock,
  type TextWord,
} from '../types/cloudVision';
import type { LabelFeature, LandmarkFeature, TextFeature, TextLine } from '../types/features';
import { VisionApiError } from './errors';

export interface CloudVisionClientConfig {
  apiKey: string;
  endpoint: string;
  maxResults: number;
  model: string;
  fetchImpl?: typeof fetch;
}

export interface CloudDocumentText {
  text: string;
  blocks: TextFeature[];
}

export class CloudVisionClient {
  private apiKey: string;
  private endpoint: string;
  private maxResults: number;
  private model: string;
  private fetchImpl: typeof fetch;

  constructor(config: CloudVisionClientConfig) {
    this.apiKey = config.apiKey;
    this.endpoint = config.endpoint;
    this.maxResults = config.maxResults;
    this.model = config.model;
    this.fetchImpl = config.fetchImpl ?? fetch.bind(globalThis);
  }

  async detectLabels(image: VisionImage): Promise<LabelFeature[]> {
    const response = await this.annotate(image, 'LABEL_DETECTION');
    return (response.labelAnnotations ?? []).map((annotation): LabelFeature => ({
      kind: 'label',
      label: annotation.description,
      confidence: annotation.score,
      entityId: annotation.mid,
    }));
  }

  async detectLandmarks(image: VisionImage): Promise<LandmarkFeature[]> {
    const response = await this.annotate(image, 'LANDMARK_DETECTION');
    return (response.landmarkAnnotations ?? []).map(toLandmarkFeature);
  }

  async detectDocumentText(image: VisionImage): Promise<CloudDocumentText | null> {
    const response = await this.annotate(image, 'DOCUMENT_TEXT_DETECTION');
    const annotation = response.fullTextAnnotation;
    if (!annotation) {
      return null;
    }

    const blocks: TextFeature[] = [];
    for (const page of annotation.pages) {
      blocks.push(...page.blocks.map(toTextFeature));
    }

    return { text: annotation.text, blocks };
  }

  private async annotate(image: VisionImage, type: CloudFeatureType): Promise<AnnotateImageResponse> {
    const request: AnnotateImageRequest = {
      image: { content: dataUrlToBase64(image.dataUrl) },
      features: [{ type, maxResults: this.maxResults, model: this.model }],
    };

    const url = `${this.endpoint}?key=${encodeURIComponent(this.apiKey)}`;
    console.log(`☁️ Cloud Vision request: ${type}`);

    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ requests: [request] }),
    });

    const body: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const parsedError = ErrorResponseSchema.safeParse(body);
      const message = parsedError.success
        ? parsedError.data.error.message
        : `Cloud Vision request failed with status ${response.status}`;
      throw new VisionApiError(
        message,
        response.status,
        parsedError.success ? parsedError.data.error.code : undefined
      );
    }

    const parsed = BatchAnnotateImagesResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new VisionApiError('Malformed Cloud Vision response', response.status);
    }

    const first = parsed.data.responses[0] ?? AnnotateImageResponseSchema.parse({});
    if (first.error) {
      throw new VisionApiError(first.error.message, response.status, first.error.code);
    }

    return first;
  }
}

/** Strips the `data:<mime>;base64,` prefix, if present. */
export function dataUrlToBase64(dataUrl: string): string {
  const marker = ';base64,';
  const index = dataUrl.indexOf(marker);
  return index >= 0 ? dataUrl.slice(index + marker.length) : dataUrl;
}

export function boundingPolyToRect(poly: BoundingPoly | undefined): FeatureRect {
  const vertices = poly?.vertices ?? [];
  if (vertices.length === 0) {
    return { x: 0, y: 0, width: 0, height: 0 };
  }

  const xs = vertices.map(v => v.x);
  const ys = vertices.map(v => v.y);
  const minX = Math.min(...xs);
  const minY = Math.min(...ys);

  return {
    x: minX,
    y: minY,
    width: Math.max(...xs) - minX,
    height: Math.max(...ys) - minY,
  };
}

function cornerPoints(poly: BoundingPoly | undefined): Point[] {
  return (poly?.vertices ?? []).map(v => ({ x: v.x, y: v.y }));
}

function wordText(word: TextWord): string {
  return word.symbols.map(symbol => symbol.text).join('');
}

function toTextFeature(block: TextBlock): TextFeature {
  const lines: TextLine[] = block.paragraphs.map(paragraph => ({
    text: paragraph.words.map(wordText).join(' '),
    elements: paragraph.words.map(word => ({
      text: wordText(word),
      frame: boundingPolyToRect(word.boundingBox),
      cornerPoints: cornerPoints(word.boundingBox),
    })),
  }));

  return {
    kind: 'text',
    frame: boundingPolyToRect(block.boundingBox),
    text: lines.map(line => line.text).join('\n'),
    cornerPoints: cornerPoints(block.boundingBox),
    lines,
  };
}

function toLandmarkFeature(annotation: EntityAnnotation): LandmarkFeature {
  return {
    kind: 'landmark',
    frame: boundingPolyToRect(annotation.boundingPoly),
    landmark: annotation.description,
    entityId: annotation.mid,
    confidence: annotation.score,
    locations: annotation.locations.flatMap(location =>
      location.latLng ? [{ latitude: location.latLng.latitude, longitude: location.latLng.longitude }] : []
    ),
  };
}
