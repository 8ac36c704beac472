import type {
  ClientOptions,
  ErrorEvent,
  Event,
  EventHint,
  SeverityLevel,
  Transport,
} from '@lantern-monitor/types';

import { BaseClient } from '../../src/baseclient';

export type TestClientOptions = ClientOptions;

/**
 * 记录所有发送出去的事件，不发生任何网络请求
 */
export function makeRecordingTransport(sent: Event[]): () => Transport {
  return () => ({
    send(event: Event) {
      sent.push(event);
      return Promise.resolve({ statusCode: 200 });
    },
    flush() {
      return Promise.resolve(true);
    },
  });
}

export function getDefaultTestClientOptions(
  options: Partial<TestClientOptions> = {},
): TestClientOptions {
  return {
    transport: makeRecordingTransport([]),
    transportOptions: {},
    ...options,
  };
}

export class TestClient extends BaseClient<TestClientOptions> {
  public constructor(options: TestClientOptions) {
    super(options);
  }

  public eventFromException(exception: unknown, hint?: EventHint): ErrorEvent {
    return {
      type: 'event',
      event_id: hint && hint.event_id,
      exception: {
        values: [
          {
            type: exception instanceof Error ? exception.name : 'Error',
            value:
              exception instanceof Error ? exception.message : String(exception),
          },
        ],
      },
    };
  }

  public eventFromMessage(
    message: string,
    level: SeverityLevel = 'info',
  ): ErrorEvent {
    return { type: 'event', message, level };
  }
}

/**
 * 创建一个把事件记录到 sent 中的 client
 */
export function makeTestClient(
  sent: Event[],
  options: Partial<TestClientOptions> = {},
): TestClient {
  return new TestClient(
    getDefaultTestClientOptions({
      transport: makeRecordingTransport(sent),
      ...options,
    }),
  );
}
