import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { ManageValues } from './ManageValues.js';
import type { HttpResponse, RequestDescriptor } from '../../domain/ports/IHttpTransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { RestClient } from '../../infrastructure/http/RestClient.js';

const BASE = 'https://conversation.example.test/api';
const PAGINATION = { refresh_url: '/v1/workspaces?version=2017-05-26' };

describe('ManageValues', () => {
  let send: Mock<(request: RequestDescriptor) => Promise<HttpResponse>>;
  let mockLogger: ILogger;
  let useCase: ManageValues;

  const respond = (status: number, body: unknown): void => {
    send.mockResolvedValue({ status, body: body === undefined ? '' : JSON.stringify(body), headers: {} });
  };
  const lastRequest = (): RequestDescriptor | undefined => send.mock.calls.at(-1)?.[0];

  beforeEach(() => {
    send = vi.fn<(request: RequestDescriptor) => Promise<HttpResponse>>();

    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };

    const rest = new RestClient({ serviceUrl: BASE, version: '2017-05-26' }, { send }, mockLogger);
    useCase = new ManageValues(rest, mockLogger);
  });

  it('should list the values of an entity', async () => {
    respond(200, { values: [{ value: 'large', synonyms: ['big', 'huge'] }], pagination: PAGINATION });

    const result = await useCase.list({ workspaceId: 'ws-1', entity: 'size', export: true });

    expect(lastRequest()?.url).toBe(`${BASE}/v1/workspaces/ws-1/entities/size/values?version=2017-05-26&export=true`);
    expect(result.values).toEqual([{ value: 'large', synonyms: ['big', 'huge'] }]);
  });

  it('should create a value with metadata', async () => {
    respond(201, { value: 'large', metadata: { inches: 16 } });

    const value = await useCase.create({ workspaceId: 'ws-1', entity: 'size', value: 'large', metadata: { inches: 16 } });

    expect(lastRequest()).toMatchObject({
      method: 'POST',
      path: '/v1/workspaces/ws-1/entities/size/values',
      body: '{"value":"large","metadata":{"inches":16}}',
    });
    expect(value.metadata).toEqual({ inches: 16 });
  });

  it('should address a value by its encoded name', async () => {
    respond(200, { value: 'extra large' });

    await useCase.get({ workspaceId: 'ws-1', entity: 'size', value: 'extra large' });

    expect(lastRequest()?.url).toBe(`${BASE}/v1/workspaces/ws-1/entities/size/values/extra%20large?version=2017-05-26`);
  });

  it('should update and delete a value', async () => {
    respond(200, { value: 'large', synonyms: ['massive'] });

    await useCase.update({ workspaceId: 'ws-1', entity: 'size', value: 'large', changes: { synonyms: ['massive'] } });
    expect(lastRequest()).toMatchObject({
      method: 'POST',
      path: '/v1/workspaces/ws-1/entities/size/values/large',
      body: '{"synonyms":["massive"]}',
    });

    await useCase.delete({ workspaceId: 'ws-1', entity: 'size', value: 'large' });
    expect(lastRequest()).toMatchObject({ method: 'DELETE', path: '/v1/workspaces/ws-1/entities/size/values/large' });
  });
});
