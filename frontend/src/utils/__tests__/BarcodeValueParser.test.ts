import { describe, expect, it } from 'vitest';

import { parseBarcodeValue, parseKeyedFields } from '../BarcodeValueParser';

describe('parseKeyedFields', () => {
  it('honours backslash escapes', () => {
    expect(parseKeyedFields('S:My\\;Net;P:a\\\\b;;')).toEqual([
      ['S', 'My;Net'],
      ['P', 'a\\b'],
    ]);
  });
});

describe('parseBarcodeValue', () => {
  it('reads wifi credentials', () => {
    const result = parseBarcodeValue('WIFI:T:WPA;S:Home Net;P:pa\\;ss;H:true;;');

    expect(result).toEqual({
      valueType: 'wifi',
      displayValue: 'Home Net',
      payload: {
        type: 'wifi',
        ssid: 'Home Net',
        password: 'pa;ss',
        encryption: 'wpa',
        hidden: true,
      },
    });
  });

  it('treats a wifi code without a type as open', () => {
    const result = parseBarcodeValue('WIFI:S:Cafe;;');

    expect(result.payload).toEqual({
      type: 'wifi',
      ssid: 'Cafe',
      password: undefined,
      encryption: 'open',
      hidden: false,
    });
  });

  it('reads mailto links with subject and body', () => {
    const result = parseBarcodeValue('mailto:someone@example.com?subject=Hello%20there&body=Hi');

    expect(result.valueType).toBe('email');
    expect(result.payload).toEqual({
      type: 'email',
      address: 'someone@example.com',
      subject: 'Hello there',
      body: 'Hi',
    });
  });

  it('reads MATMSG emails', () => {
    const result = parseBarcodeValue('MATMSG:TO:team@example.com;SUB:Status;BODY:All good;;');

    expect(result.displayValue).toBe('team@example.com');
    expect(result.payload).toEqual({
      type: 'email',
      address: 'team@example.com',
      subject: 'Status',
      body: 'All good',
    });
  });

  it('reads phone numbers', () => {
    expect(parseBarcodeValue('tel:+15550100').payload).toEqual({ type: 'phone', number: '+15550100' });
  });

  it('reads SMSTO payloads', () => {
    expect(parseBarcodeValue('SMSTO:+15550100:See you soon').payload).toEqual({
      type: 'sms',
      phoneNumber: '+15550100',
      message: 'See you soon',
    });
  });

  it('reads sms URIs with a body parameter', () => {
    expect(parseBarcodeValue('sms:+15550100?body=Ping').payload).toEqual({
      type: 'sms',
      phoneNumber: '+15550100',
      message: 'Ping',
    });
  });

  it('reads geo points', () => {
    const result = parseBarcodeValue('geo:48.8584,2.2945');

    expect(result.valueType).toBe('geo');
    expect(result.displayValue).toBe('48.8584,2.2945');
    expect(result.payload).toEqual({ type: 'geo', latitude: 48.8584, longitude: 2.2945 });
  });

  it('falls back to text for an unreadable geo point', () => {
    expect(parseBarcodeValue('geo:north').valueType).toBe('text');
  });

  it('reads MECARD contacts', () => {
    const result = parseBarcodeValue(
      'MECARD:N:Doe,Jane;TEL:5550100;TEL:5550101;EMAIL:jane@example.com;ORG:Acme;;'
    );

    expect(result.displayValue).toBe('Jane Doe');
    expect(result.payload).toEqual({
      type: 'contactInfo',
      name: 'Jane Doe',
      phones: ['5550100', '5550101'],
      emails: ['jane@example.com'],
      urls: [],
      address: undefined,
      organization: 'Acme',
    });
  });

  it('reads bookmarks and plain URLs', () => {
    expect(parseBarcodeValue('MEBKM:TITLE:Docs;URL:https\\://example.com/docs;;').payload).toEqual({
      type: 'url',
      url: 'https://example.com/docs',
      title: 'Docs',
    });
    expect(parseBarcodeValue('https://example.com').valueType).toBe('url');
  });

  it('keeps anything else as text', () => {
    expect(parseBarcodeValue('order #42')).toEqual({
      valueType: 'text',
      displayValue: 'order #42',
      payload: { type: 'text', text: 'order #42' },
    });
  });
});
