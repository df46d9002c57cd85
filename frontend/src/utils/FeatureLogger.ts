import type { Point } from '../types';
import type { BarcodeFeature, VisionFeature } from '../types/features';

const rect = (r: { x: number; y: number; width: number; height: number }) =>
  `(${r.x}, ${r.y}, ${r.width}, ${r.height})`;

const point = (p: Point) => `(${p.x}, ${p.y})`;

function describeBarcodePayload(barcode: BarcodeFeature): string[] {
  const { payload } = barcode;
  switch (payload.type) {
    case 'email':
      return [
        `Barcode email address: ${payload.address}`,
        `Barcode email subject: ${payload.subject ?? ''}`,
        `Barcode email body: ${payload.body ?? ''}`,
      ];
    case 'phone':
      return [`Barcode phone number: ${payload.number}`];
    case 'sms':
      return [`Barcode sms phone number: ${payload.phoneNumber}`, `Barcode sms message: ${payload.message ?? ''}`];
    case 'url':
      return [`Barcode url title: ${payload.title ?? ''}`, `Barcode url: ${payload.url}`];
    case 'wifi':
      return [
        `Barcode wifi ssid: ${payload.ssid}`,
        `Barcode wifi password: ${payload.password ?? ''}`,
        `Barcode wifi type: ${payload.encryption}`,
      ];
    case 'geo':
      return [`Barcode geoPoint latitude: ${payload.latitude}`, `Barcode geoPoint longitude: ${payload.longitude}`];
    case 'contactInfo':
      return [
        `Barcode contact info name: ${payload.name ?? ''}`,
        ...payload.phones.map(phone => `Barcode contact info phone number: ${phone}`),
        ...payload.emails.map(email => `Barcode contact info email address: ${email}`),
        ...payload.urls.map(url => `Barcode contact info url: ${url}`),
        `Barcode contact info address: ${payload.address ?? ''}`,
        `Barcode contact info organization: ${payload.organization ?? ''}`,
      ];
    case 'text':
      return [];
  }
}

/** Human-readable dump of everything a detector reported for one feature. */
export function describeFeature(feature: VisionFeature): string[] {
  switch (feature.kind) {
    case 'face':
      return [
        `Face frame: ${rect(feature.frame)}`,
        ...feature.landmarks.map(l => `Position for face landmark: ${l.type} is: ${point(l.position)}`),
      ];
    case 'text':
      return [
        `Detected text: ${feature.text}, frame: ${rect(feature.frame)}`,
        `Detected text has: ${feature.cornerPoints.length} corner points.`,
        `Detected text block has ${feature.lines.length} lines.`,
        ...feature.lines.flatMap(line => line.elements.map(e => `Detected text element says: ${e.text}`)),
      ];
    case 'label':
      return [`Label ${feature.label}, entity id: ${feature.entityId ?? ''}, confidence: ${feature.confidence}`];
    case 'landmark':
      return [
        `Landmark text: ${feature.landmark}`,
        `Landmark frame: ${rect(feature.frame)}`,
        `Landmark entityID: ${feature.entityId ?? ''}`,
        `Landmark confidence: ${feature.confidence}`,
        ...feature.locations.map(
          loc => `Landmark location latitude: ${loc.latitude}, longitude: ${loc.longitude}`
        ),
      ];
    case 'barcode':
      return [
        `Detected barcode's bounding box: ${rect(feature.frame)}`,
        ...feature.cornerPoints.map(p => `Corner point is located at: ${point(p)}`),
        `Barcode display value: ${feature.displayValue}`,
        `Barcode format: ${feature.format}`,
        `Barcode raw value: ${feature.rawValue}`,
        `Barcode value type: ${feature.valueType}`,
        ...describeBarcodePayload(feature),
      ];
  }
}
