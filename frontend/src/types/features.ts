import type { FeatureRect, Point } from '../types';

export type DetectorKind =
  | 'onDeviceText'
  | 'barcode'
  | 'onDeviceLabel'
  | 'onDeviceFace'
  | 'cloudText'
  | 'cloudLabel'
  | 'cloudLandmark'
  | 'customModel';

export type FaceLandmarkType = 'eye' | 'mouth' | 'nose';

export interface FaceLandmark {
  type: FaceLandmarkType;
  position: Point;
}

export interface FaceFeature {
  kind: 'face';
  frame: FeatureRect;
  landmarks: FaceLandmark[];
}

export interface TextElement {
  text: string;
  frame: FeatureRect;
  cornerPoints: Point[];
}

export interface TextLine {
  text: string;
  elements: TextElement[];
}

export interface TextFeature {
  kind: 'text';
  frame: FeatureRect;
  text: string;
  cornerPoints: Point[];
  lines: TextLine[];
}

export interface LabelFeature {
  kind: 'label';
  label: string;
  confidence: number;
  entityId?: string;
}

export interface GeoLocation {
  latitude: number;
  longitude: number;
}

export interface LandmarkFeature {
  kind: 'landmark';
  frame: FeatureRect;
  landmark: string;
  entityId?: string;
  confidence: number;
  locations: GeoLocation[];
}

export type BarcodeValueType =
  | 'text'
  | 'url'
  | 'email'
  | 'phone'
  | 'sms'
  | 'wifi'
  | 'geo'
  | 'contactInfo';

export type WifiEncryption = 'open' | 'wep' | 'wpa';

export type BarcodePayload =
  | { type: 'text'; text: string }
  | { type: 'url'; url: string; title?: string }
  | { type: 'email'; address: string; subject?: string; body?: string }
  | { type: 'phone'; number: string }
  | { type: 'sms'; phoneNumber: string; message?: string }
  | { type: 'wifi'; ssid: string; password?: string; encryption: WifiEncryption; hidden: boolean }
  | { type: 'geo'; latitude: number; longitude: number }
  | {
      type: 'contactInfo';
      name?: string;
      phones: string[];
      emails: string[];
      urls: string[];
      address?: string;
      organization?: string;
    };

export interface BarcodeFeature {
  kind: 'barcode';
  frame: FeatureRect;
  cornerPoints: Point[];
  format: string;
  rawValue: string;
  displayValue: string;
  valueType: BarcodeValueType;
  payload: BarcodePayload;
}

export type VisionFeature =
  | FaceFeature
  | TextFeature
  | LabelFeature
  | LandmarkFeature
  | BarcodeFeature;

/** Labels are listed, never drawn; every other feature carries a frame. */
export function featureFrame(feature: VisionFeature): FeatureRect | undefined {
  return feature.kind === 'label' ? undefined : feature.frame;
}
