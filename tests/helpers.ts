/**
 * Shared fakes for the test suite
 */

import { Express } from 'express';
import { AddressInfo } from 'net';
import { QueryResult, QueryResultRow } from 'pg';
import { QueryFn } from '../src/config/database';
import { CompletionRequest, CompletionResult, ChatModel } from '../src/services/ai/OpenAIService';
import { MessageSender } from '../src/services/whatsapp';
import { Logger } from '../src/utils/logger';

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

/**
 * Clock that only moves when told to.
 */
export class ManualClock {
  private current: number;

  constructor(start: string | number = '2024-03-01T10:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): Date {
    this.current += ms;
    return this.now();
  }
}

/**
 * Answers chat completions from a queue; JSON-mode requests get the extraction answer.
 */
export class FakeChatModel implements ChatModel {
  requests: CompletionRequest[] = [];
  replies: string[] = [];
  extraction = '{"memories": []}';
  failWith?: Error;

  async createCompletion(request: CompletionRequest): Promise<CompletionResult> {
    this.requests.push(request);
    if (this.failWith) {
      throw this.failWith;
    }
    if (request.jsonResponse) {
      return { content: this.extraction, model: 'fake-extractor' };
    }
    return { content: this.replies.shift() ?? 'OK', model: request.model ?? 'fake-model' };
  }

  chatRequests(): CompletionRequest[] {
    return this.requests.filter(request => !request.jsonResponse);
  }
}

export class FakeSender implements MessageSender {
  sent: Array<{ to: string; message: string }> = [];
  read: string[] = [];

  async sendMessage(to: string, message: string): Promise<void> {
    this.sent.push({ to, message });
  }

  async markAsRead(messageId: string): Promise<void> {
    this.read.push(messageId);
  }
}

export interface RecordedQuery {
  text: string;
  params: unknown[];
}

export interface FakeQueryResponse {
  rows?: QueryResultRow[];
  rowCount?: number;
}

export type FakeQueryHandler = (text: string, params: unknown[]) => FakeQueryResponse | Error;

/**
 * In-process stand-in for the pg query function. Records every call and answers
 * with whatever the handler returns; an Error is thrown as the driver would.
 */
export function createFakeQuery(handler: FakeQueryHandler = () => ({})): { query: QueryFn; calls: RecordedQuery[] } {
  const calls: RecordedQuery[] = [];

  function query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>>;
  async function query(text: string, params: unknown[] = []): Promise<QueryResult<QueryResultRow>> {
    calls.push({ text, params });
    const response = handler(text, params);
    if (response instanceof Error) {
      throw response;
    }
    const rows = response.rows ?? [];
    return { command: '', oid: 0, fields: [], rows, rowCount: response.rowCount ?? rows.length };
  }

  return { query, calls };
}

/**
 * Error shaped like the ones pg raises, with a SQLSTATE or errno code.
 */
export function databaseError(message: string, fields: { code: string; constraint?: string; detail?: string }): Error {
  return Object.assign(new Error(message), fields);
}

export interface RunningServer {
  url: string;
  close(): Promise<void>;
}

/**
 * Starts the app on an ephemeral local port.
 */
export function listen(app: Express): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      if (typeof address !== 'object' || address === null) {
        reject(new Error('Server did not bind to a TCP port'));
        return;
      }
      resolve({
        url: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>((done, fail) => server.close(error => (error ? fail(error) : done())))
      });
    });
    server.on('error', reject);
  });
}
