/**
 * Request/Response schemas for the Cloud Vision `images:annotate` REST endpoint.
 * Only the fields this app reads are modelled; zod drops the rest.
 */

import { z } from 'zod';

export type CloudFeatureType =
  | 'LABEL_DETECTION'
  | 'LANDMARK_DETECTION'
  | 'DOCUMENT_TEXT_DETECTION';

export interface AnnotateImageRequest {
  image: { content: string };
  features: Array<{ type: CloudFeatureType; maxResults?: number; model?: string }>;
}

// ============================================================================
// Geometry
// ============================================================================

// The API omits zero-valued coordinates
export const VertexSchema = z.object({
  x: z.number().default(0),
  y: z.number().default(0),
});

export const BoundingPolySchema = z.object({
  vertices: z.array(VertexSchema).default([]),
});

export type BoundingPoly = z.infer<typeof BoundingPolySchema>;

// ============================================================================
// Entity annotations (labels, landmarks)
// ============================================================================

export const LocationInfoSchema = z.object({
  latLng: z
    .object({
      latitude: z.number().default(0),
      longitude: z.number().default(0),
    })
    .optional(),
});

export const EntityAnnotationSchema = z.object({
  mid: z.string().optional(),
  description: z.string().default(''),
  score: z.number().default(0),
  boundingPoly: BoundingPolySchema.optional(),
  locations: z.array(LocationInfoSchema).default([]),
});

export type EntityAnnotation = z.infer<typeof EntityAnnotationSchema>;

// ============================================================================
// Document text
// ============================================================================

export const SymbolSchema = z.object({
  text: z.string().default(''),
  confidence: z.number().optional(),
  boundingBox: BoundingPolySchema.optional(),
});

export const WordSchema = z.object({
  symbols: z.array(SymbolSchema).default([]),
  confidence: z.number().optional(),
  boundingBox: BoundingPolySchema.optional(),
});

export const ParagraphSchema = z.object({
  words: z.array(WordSchema).default([]),
  boundingBox: BoundingPolySchema.optional(),
});

export const BlockSchema = z.object({
  paragraphs: z.array(ParagraphSchema).default([]),
  boundingBox: BoundingPolySchema.optional(),
  confidence: z.number().optional(),
});

export const PageSchema = z.object({
  width: z.number().optional(),
  height: z.number().optional(),
  blocks: z.array(BlockSchema).default([]),
});

export const TextAnnotationSchema = z.object({
  text: z.string().default(''),
  pages: z.array(PageSchema).default([]),
});

export type TextBlock = z.infer<typeof BlockSchema>;
export type TextWord = z.infer<typeof WordSchema>;
export type TextAnnotation = z.infer<typeof TextAnnotationSchema>;

// ============================================================================
// Response envelope
// ============================================================================

export const StatusSchema = z.object({
  code: z.number().optional(),
  message: z.string().default('Unknown error'),
});

export const AnnotateImageResponseSchema = z.object({
  labelAnnotations: z.array(EntityAnnotationSchema).optional(),
  landmarkAnnotations: z.array(EntityAnnotationSchema).optional(),
  fullTextAnnotation: TextAnnotationSchema.optional(),
  error: StatusSchema.optional(),
});

export type AnnotateImageResponse = z.infer<typeof AnnotateImageResponseSchema>;

export const BatchAnnotateImagesResponseSchema = z.object({
  responses: z.array(AnnotateImageResponseSchema).default([]),
});

export const ErrorResponseSchema = z.object({
  error: StatusSchema,
});
