import type { Event } from '@lantern-monitor/types';
import { describe, expect, it, vi } from 'vitest';

import { Hub } from '@lantern-monitor/core';

import { NodeClient } from '../src/client';
import { extractRequestData, tracingHandler } from '../src/handlers/tracing';
import { makeRecordingTransport } from '../../core/test/mocks/client';
import { makeRequestResponse } from './helpers';

const TRACE_ID = '771a43a4192642f0b136d5159a501700';
const PARENT_SPAN_ID = '1000000000000000';

function makeHub(sent: Event[], tracesSampleRate?: number): Hub {
  return new Hub(
    new NodeClient({
      transport: makeRecordingTransport(sent),
      transportOptions: { url: 'http://localhost:9000/api/events' },
      tracesSampleRate,
    }),
  );
}

describe('tracingHandler', () => {
  it('creates one transaction per request', () => {
    const sent: Event[] = [];
    const hub = makeHub(sent, 1);
    const { req, res } = makeRequestResponse('get', '/orders?page=2');
    const next = vi.fn();

    tracingHandler(hub)(req, res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(req.lanternHub).toBeDefined();
    expect(req.lanternHub).not.toBe(hub);
    expect(hub.getScope().getTransaction()).toBeUndefined();

    res.statusCode = 200;
    res.emit('finish');

    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({
      type: 'transaction',
      transaction: 'GET /orders',
      transaction_info: { source: 'url' },
      request: {
        url: 'http://localhost:3000/orders?page=2',
        method: 'GET',
        query_string: 'page=2',
      },
      contexts: {
        trace: {
          op: 'http.server',
          status: 'ok',
          tags: { 'http.status_code': '200' },
        },
      },
    });
  });

  it('continues the trace from the incoming header', () => {
    const sent: Event[] = [];
    const hub = makeHub(sent, 0);
    const { req, res } = makeRequestResponse('POST', '/orders', {
      'sentry-trace': `${TRACE_ID}-${PARENT_SPAN_ID}-1`,
    });

    tracingHandler(hub)(req, res, () => undefined);
    res.statusCode = 201;
    res.emit('finish');

    expect(sent[0]).toMatchObject({
      contexts: {
        trace: {
          trace_id: TRACE_ID,
          parent_span_id: PARENT_SPAN_ID,
          sampled: true,
        },
      },
    });
  });

  it('starts a new trace when the incoming header is malformed', () => {
    const sent: Event[] = [];
    const hub = makeHub(sent, 1);
    const { req, res } = makeRequestResponse('GET', '/orders', {
      'sentry-trace': 'bad-header',
    });

    tracingHandler(hub)(req, res, () => undefined);
    res.emit('finish');

    const event = sent[0];
    const trace = event && event.contexts && event.contexts.trace;
    expect(trace && trace.trace_id).toMatch(/^[0-9a-f]{32}$/);
    expect(trace && trace.parent_span_id).toBeUndefined();
    expect(trace && trace.sampled).toBe(true);
  });

  it('renames the transaction after the matched route', () => {
    const sent: Event[] = [];
    const hub = makeHub(sent, 1);
    const { req, res } = makeRequestResponse('GET', '/api/product/12');

    tracingHandler(hub)(req, res, () => {
      req.baseUrl = '/api';
      req.route = { path: '/product/:id' };
    });
    res.statusCode = 404;
    res.emit('finish');

    expect(sent[0]).toMatchObject({
      transaction: 'GET /api/product/:id',
      transaction_info: { source: 'route' },
      contexts: { trace: { status: 'not_found' } },
    });
  });

  it('uses a custom route provider', () => {
    const sent: Event[] = [];
    const hub = makeHub(sent, 1);
    const { req, res } = makeRequestResponse('DELETE', '/users/7');

    tracingHandler(hub, { routeProvider: () => '/users/{id}' })(
      req,
      res,
      () => undefined,
    );
    res.statusCode = 500;
    res.emit('finish');

    expect(sent[0]).toMatchObject({
      transaction: 'DELETE /users/{id}',
      contexts: { trace: { status: 'internal_error' } },
    });
  });

  it('links errors captured during the request to its transaction', () => {
    const sent: Event[] = [];
    const hub = makeHub(sent, 1);
    const { req, res } = makeRequestResponse('GET', '/orders');

    tracingHandler(hub)(req, res, () => {
      req.lanternHub?.captureException(new Error('lookup failed'));
    });
    res.emit('finish');

    expect(sent).toHaveLength(2);
    const [error, transaction] = sent;
    const transactionTrace =
      transaction && transaction.contexts && transaction.contexts.trace;
    expect(error).toMatchObject({
      type: 'event',
      transaction: 'GET /orders',
      request: { method: 'GET' },
    });
    expect(error && error.contexts && error.contexts.trace).toEqual({
      trace_id: transactionTrace && transactionTrace.trace_id,
      span_id: transactionTrace && transactionTrace.span_id,
      op: 'http.server',
      sampled: true,
    });
  });

  it('cancels the transaction when the connection closes early', () => {
    const sent: Event[] = [];
    const hub = makeHub(sent, 1);
    const { req, res } = makeRequestResponse('GET', '/reports');

    tracingHandler(hub)(req, res, vi.fn());
    res.emit('close');
    res.emit('close');

    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({
      transaction: 'GET /reports',
      contexts: { trace: { status: 'cancelled' } },
    });
  });

  it('ignores close after the response has finished', () => {
    const sent: Event[] = [];
    const hub = makeHub(sent, 1);
    const { req, res } = makeRequestResponse('GET', '/reports');

    tracingHandler(hub)(req, res, vi.fn());
    res.statusCode = 404;
    res.emit('finish');
    res.emit('close');

    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({
      contexts: { trace: { status: 'not_found' } },
    });
  });

  it('leaves credentials out of the transaction request', () => {
    const sent: Event[] = [];
    const hub = makeHub(sent, 1);
    const { req, res } = makeRequestResponse('GET', '/account', {
      authorization: 'Bearer test-secret',
      cookie: 'session=test-session',
    });

    tracingHandler(hub)(req, res, vi.fn());
    res.statusCode = 200;
    res.emit('finish');

    expect(sent[0]?.request?.headers).toEqual({ host: 'localhost:3000' });
  });

  it('only calls next when the hub is disabled', () => {
    const hub = new Hub();
    const { req, res } = makeRequestResponse('GET', '/orders');
    const next = vi.fn();

    tracingHandler(hub)(req, res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(req.lanternHub).toBeUndefined();
  });
});

describe('extractRequestData', () => {
  it('describes the request', () => {
    const { req } = makeRequestResponse('post', '/checkout?step=2', {
      'x-request-id': 'abc',
    });

    expect(extractRequestData(req)).toEqual({
      url: 'http://localhost:3000/checkout?step=2',
      method: 'POST',
      query_string: 'step=2',
      headers: { host: 'localhost:3000', 'x-request-id': 'abc' },
    });
  });

  it('drops identifying headers by default', () => {
    const { req } = makeRequestResponse('GET', '/account', {
      authorization: 'Bearer test-secret',
      cookie: 'session=test-session',
      'x-forwarded-for': '10.0.0.1',
      accept: 'application/json',
    });

    expect(extractRequestData(req).headers).toEqual({
      host: 'localhost:3000',
      accept: 'application/json',
    });
  });

  it('keeps identifying headers with sendDefaultPii', () => {
    const { req } = makeRequestResponse('GET', '/account', {
      authorization: 'Bearer test-secret',
      cookie: 'session=test-session',
    });

    expect(extractRequestData(req, { sendDefaultPii: true }).headers).toEqual({
      host: 'localhost:3000',
      authorization: 'Bearer test-secret',
      cookie: 'session=test-session',
    });
  });
});
