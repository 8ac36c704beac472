import { describe, expect, it } from 'vitest';

import { InvalidIdentifierFormat } from '../src/error';
import {
  EMPTY_SPAN_ID,
  EMPTY_TRACE_ID,
  generateSpanId,
  generateTraceId,
  isSpanId,
  isTraceId,
  parseSpanId,
  parseTraceId,
} from '../src/ids';

describe('identifiers', () => {
  it('generates lowercase hex ids of the canonical length', () => {
    const traceId = generateTraceId();
    const spanId = generateSpanId();

    expect(traceId).toMatch(/^[0-9a-f]{32}$/);
    expect(spanId).toMatch(/^[0-9a-f]{16}$/);
    expect(isTraceId(traceId)).toBe(true);
    expect(isSpanId(spanId)).toBe(true);
  });

  it('generates a different trace id every time', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateTraceId()));
    expect(ids.size).toBe(50);
  });

  it('parses the canonical form unchanged', () => {
    const traceId = generateTraceId();
    const spanId = generateSpanId();

    expect(parseTraceId(traceId)).toBe(traceId);
    expect(parseSpanId(spanId)).toBe(spanId);
  });

  it('normalizes uppercase hex to lowercase', () => {
    expect(parseTraceId('771A43A4192642F0B136D5159A501700')).toBe(
      '771a43a4192642f0b136d5159a501700',
    );
    expect(parseSpanId('ABCDEF0123456789')).toBe('abcdef0123456789');
  });

  it.each([
    ['too short', '771a43a4192642f0b136d5159a5017'],
    ['too long', '771a43a4192642f0b136d5159a50170000'],
    ['non-hex characters', '771a43a4192642f0b136d5159a50170z'],
    ['empty', ''],
  ])('rejects a trace id that is %s', (_label, value) => {
    expect(() => parseTraceId(value)).toThrow(InvalidIdentifierFormat);
  });

  it.each([
    ['too short', '100000000000000'],
    ['too long', '10000000000000000'],
    ['non-hex characters', '100000000000000g'],
  ])('rejects a span id that is %s', (_label, value) => {
    expect(() => parseSpanId(value)).toThrow(InvalidIdentifierFormat);
  });

  it('reports which kind of identifier was invalid', () => {
    try {
      parseSpanId('nope');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidIdentifierFormat);
      expect(error).toMatchObject({ kind: 'span', value: 'nope' });
    }
  });

  it('exposes all-zero ids for spans that are never reported', () => {
    expect(EMPTY_TRACE_ID).toBe('00000000000000000000000000000000');
    expect(EMPTY_SPAN_ID).toBe('0000000000000000');
  });

  it('does not treat uppercase ids as canonical', () => {
    expect(isTraceId('771A43A4192642F0B136D5159A501700')).toBe(false);
    expect(isSpanId(42)).toBe(false);
  });
});
