import type { BarcodePayload, BarcodeValueType, WifiEncryption } from '../types/features';

export interface ParsedBarcodeValue {
  valueType: BarcodeValueType;
  displayValue: string;
  payload: BarcodePayload;
}

/**
 * Splits `KEY:value;KEY:value;;` bodies used by WIFI:, MECARD:, MATMSG: and
 * MEBKM: payloads. A backslash escapes the next character.
 */
export function parseKeyedFields(body: string): Array<[string, string]> {
  const fields: Array<[string, string]> = [];
  let current = '';
  let escaped = false;

  const flush = () => {
    const separator = current.indexOf(':');
    if (separator > 0) {
      fields.push([current.slice(0, separator).toUpperCase(), current.slice(separator + 1)]);
    }
    current = '';
  };

  for (const char of body) {
    if (escaped) {
      current += char;
      escaped = false;
    } else if (char === '\\') {
      escaped = true;
    } else if (char === ';') {
      flush();
    } else {
      current += char;
    }
  }
  flush();

  return fields;
}

function firstField(fields: Array<[string, string]>, key: string): string | undefined {
  return fields.find(([name]) => name === key)?.[1];
}

function allFields(fields: Array<[string, string]>, key: string): string[] {
  return fields.filter(([name]) => name === key).map(([, value]) => value);
}

function stripScheme(value: string, scheme: string): string | null {
  return value.toLowerCase().startsWith(scheme.toLowerCase())
    ? value.slice(scheme.length)
    : null;
}

function parseWifi(body: string): ParsedBarcodeValue {
  const fields = parseKeyedFields(body);
  const ssid = firstField(fields, 'S') ?? '';
  const type = (firstField(fields, 'T') ?? '').toUpperCase();
  const encryption: WifiEncryption =
    type === 'WEP' ? 'wep' : type.startsWith('WPA') ? 'wpa' : 'open';

  return {
    valueType: 'wifi',
    displayValue: ssid,
    payload: {
      type: 'wifi',
      ssid,
      password: firstField(fields, 'P'),
      encryption,
      hidden: (firstField(fields, 'H') ?? '').toLowerCase() === 'true',
    },
  };
}

function parseMailto(rest: string): ParsedBarcodeValue {
  const [address, query = ''] = rest.split('?', 2);
  const params = new URLSearchParams(query);
  const decodedAddress = decodeURIComponent(address);

  return {
    valueType: 'email',
    displayValue: decodedAddress,
    payload: {
      type: 'email',
      address: decodedAddress,
      subject: params.get('subject') ?? undefined,
      body: params.get('body') ?? undefined,
    },
  };
}

function parseSms(rest: string): ParsedBarcodeValue {
  // SMSTO:number:message and sms:number?body=message
  const queryIndex = rest.indexOf('?');
  if (queryIndex >= 0) {
    const phoneNumber = rest.slice(0, queryIndex);
    const message = new URLSearchParams(rest.slice(queryIndex + 1)).get('body') ?? undefined;
    return { valueType: 'sms', displayValue: phoneNumber, payload: { type: 'sms', phoneNumber, message } };
  }

  const separator = rest.indexOf(':');
  const phoneNumber = separator >= 0 ? rest.slice(0, separator) : rest;
  const message = separator >= 0 ? rest.slice(separator + 1) : undefined;
  return {
    valueType: 'sms',
    displayValue: phoneNumber,
    payload: { type: 'sms', phoneNumber, message: message || undefined },
  };
}

function parseGeo(rest: string): ParsedBarcodeValue | null {
  const [coordinates] = rest.split(/[?;]/, 1);
  const [lat, lng] = coordinates.split(',');
  const latitude = Number(lat);
  const longitude = Number(lng);
  if (lat === undefined || lng === undefined || !Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    return null;
  }

  return {
    valueType: 'geo',
    displayValue: `${latitude},${longitude}`,
    payload: { type: 'geo', latitude, longitude },
  };
}

function parseMecard(body: string): ParsedBarcodeValue {
  const fields = parseKeyedFields(body);
  const rawName = firstField(fields, 'N');
  // MECARD names are "Last,First"
  const name = rawName
    ?.split(',')
    .map(part => part.trim())
    .filter(Boolean)
    .reverse()
    .join(' ');
  const phones = allFields(fields, 'TEL');
  const emails = allFields(fields, 'EMAIL');

  return {
    valueType: 'contactInfo',
    displayValue: name || emails[0] || phones[0] || '',
    payload: {
      type: 'contactInfo',
      name: name || undefined,
      phones,
      emails,
      urls: allFields(fields, 'URL'),
      address: firstField(fields, 'ADR'),
      organization: firstField(fields, 'ORG'),
    },
  };
}

function parseMatmsg(body: string): ParsedBarcodeValue {
  const fields = parseKeyedFields(body);
  const address = firstField(fields, 'TO') ?? '';

  return {
    valueType: 'email',
    displayValue: address,
    payload: {
      type: 'email',
      address,
      subject: firstField(fields, 'SUB'),
      body: firstField(fields, 'BODY'),
    },
  };
}

function parseMebkm(body: string): ParsedBarcodeValue {
  const fields = parseKeyedFields(body);
  const url = firstField(fields, 'URL') ?? '';

  return {
    valueType: 'url',
    displayValue: url,
    payload: { type: 'url', url, title: firstField(fields, 'TITLE') },
  };
}

/**
 * Classify a raw QR payload the way mobile barcode scanners do and pull out
 * its structured fields. Unrecognised payloads are plain text.
 */
export function parseBarcodeValue(rawValue: string): ParsedBarcodeValue {
  const value = rawValue.trim();

  const wifi = stripScheme(value, 'WIFI:');
  if (wifi !== null) return parseWifi(wifi);

  const mailto = stripScheme(value, 'mailto:');
  if (mailto !== null) return parseMailto(mailto);

  const matmsg = stripScheme(value, 'MATMSG:');
  if (matmsg !== null) return parseMatmsg(matmsg);

  const tel = stripScheme(value, 'tel:');
  if (tel !== null) {
    return { valueType: 'phone', displayValue: tel, payload: { type: 'phone', number: tel } };
  }

  const smsto = stripScheme(value, 'SMSTO:') ?? stripScheme(value, 'sms:');
  if (smsto !== null) return parseSms(smsto);

  const geo = stripScheme(value, 'geo:');
  if (geo !== null) {
    const parsed = parseGeo(geo);
    if (parsed) return parsed;
  }

  const mecard = stripScheme(value, 'MECARD:');
  if (mecard !== null) return parseMecard(mecard);

  const mebkm = stripScheme(value, 'MEBKM:');
  if (mebkm !== null) return parseMebkm(mebkm);

  if (/^https?:\/\//i.test(value)) {
    return { valueType: 'url', displayValue: value, payload: { type: 'url', url: value } };
  }

  return { valueType: 'text', displayValue: rawValue, payload: { type: 'text', text: rawValue } };
}
