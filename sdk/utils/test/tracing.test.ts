import { afterEach, describe, expect, it, vi } from 'vitest';

import { InvalidIdentifierFormat, MalformedTraceHeader } from '../src/error';
import { generateSpanId, generateTraceId } from '../src/ids';
import { logger } from '../src/logger';
import {
  SENTRY_TRACE_HEADER,
  decodeTraceHeader,
  encodeTraceHeader,
  extractTraceparentData,
} from '../src/tracing';

const TRACE_ID = '771a43a4192642f0b136d5159a501700';
const SPAN_ID = '1000000000000000';

describe('decodeTraceHeader', () => {
  it('decodes a header with a sampled flag', () => {
    expect(decodeTraceHeader(`${TRACE_ID}-${SPAN_ID}-1`)).toEqual({
      traceId: TRACE_ID,
      parentSpanId: SPAN_ID,
      parentSampled: true,
    });
  });

  it('decodes a negative sampling decision', () => {
    expect(decodeTraceHeader(`${TRACE_ID}-${SPAN_ID}-0`).parentSampled).toBe(
      false,
    );
  });

  it('leaves the sampling decision unknown without a third segment', () => {
    const decoded = decodeTraceHeader(`${TRACE_ID}-${SPAN_ID}`);
    expect(decoded.traceId).toBe(TRACE_ID);
    expect(decoded.parentSpanId).toBe(SPAN_ID);
    expect(decoded.parentSampled).toBeUndefined();
  });

  it('ignores surrounding blanks', () => {
    expect(decodeTraceHeader(` \t${TRACE_ID}-${SPAN_ID}-1 `)).toEqual({
      traceId: TRACE_ID,
      parentSpanId: SPAN_ID,
      parentSampled: true,
    });
  });

  it('rejects "bad-header"', () => {
    expect(() => decodeTraceHeader('bad-header')).toThrow(
      MalformedTraceHeader,
    );
  });

  it('keeps the identifier error as the cause', () => {
    try {
      decodeTraceHeader(`${TRACE_ID}-xyz`);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedTraceHeader);
      const cause = error instanceof Error ? error.cause : undefined;
      expect(cause).toBeInstanceOf(InvalidIdentifierFormat);
    }
  });

  it.each([
    ['a single segment', TRACE_ID],
    ['four segments', `${TRACE_ID}-${SPAN_ID}-1-1`],
    ['an unknown sampled flag', `${TRACE_ID}-${SPAN_ID}-2`],
    ['a sampled flag that is not one character', `${TRACE_ID}-${SPAN_ID}-10`],
    ['an empty sampled flag', `${TRACE_ID}-${SPAN_ID}-`],
    ['a short span id', `${TRACE_ID}-100000000000000-1`],
    ['an empty value', ''],
  ])('rejects %s', (_label, value) => {
    expect(() => decodeTraceHeader(value)).toThrow(MalformedTraceHeader);
  });
});

describe('encodeTraceHeader', () => {
  it('appends the sampled flag when it is known', () => {
    expect(
      encodeTraceHeader({ traceId: TRACE_ID, spanId: SPAN_ID, sampled: true }),
    ).toBe(`${TRACE_ID}-${SPAN_ID}-1`);
    expect(
      encodeTraceHeader({ traceId: TRACE_ID, spanId: SPAN_ID, sampled: false }),
    ).toBe(`${TRACE_ID}-${SPAN_ID}-0`);
  });

  it('omits the sampled flag when it is unknown', () => {
    expect(encodeTraceHeader({ traceId: TRACE_ID, spanId: SPAN_ID })).toBe(
      `${TRACE_ID}-${SPAN_ID}`,
    );
  });

  it('decodes back to the encoded identity', () => {
    for (const sampled of [true, false, undefined]) {
      const traceId = generateTraceId();
      const spanId = generateSpanId();

      expect(
        decodeTraceHeader(encodeTraceHeader({ traceId, spanId, sampled })),
      ).toEqual({ traceId, parentSpanId: spanId, parentSampled: sampled });
    }
  });
});

describe('extractTraceparentData', () => {
  afterEach(() => {
    logger.disable();
  });

  it('uses the conventional header name', () => {
    expect(SENTRY_TRACE_HEADER).toBe('sentry-trace');
  });

  it('returns undefined for a missing header', () => {
    expect(extractTraceparentData(undefined)).toBeUndefined();
    expect(extractTraceparentData(null)).toBeUndefined();
    expect(extractTraceparentData('')).toBeUndefined();
  });

  it('uses the first value of a repeated header', () => {
    expect(
      extractTraceparentData([`${TRACE_ID}-${SPAN_ID}-1`, 'bad-header']),
    ).toEqual({ traceId: TRACE_ID, parentSpanId: SPAN_ID, parentSampled: true });
  });

  it('logs and returns undefined for a malformed header', () => {
    logger.enable();
    const warn = vi.spyOn(logger, 'warn');

    expect(extractTraceparentData('bad-header')).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toBe(
      '[Tracing] Ignoring incoming trace header:',
    );
  });
});
