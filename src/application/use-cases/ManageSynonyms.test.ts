import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { ManageSynonyms } from './ManageSynonyms.js';
import type { HttpResponse, RequestDescriptor } from '../../domain/ports/IHttpTransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { RestClient } from '../../infrastructure/http/RestClient.js';

const BASE = 'https://conversation.example.test/api';

describe('ManageSynonyms', () => {
  let send: Mock<(request: RequestDescriptor) => Promise<HttpResponse>>;
  let mockLogger: ILogger;
  let useCase: ManageSynonyms;

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
    useCase = new ManageSynonyms(rest, mockLogger);
  });

  it('should list synonyms and expose the next cursor', async () => {
    respond(200, {
      synonyms: [{ synonym: 'big' }],
      pagination: {
        refresh_url: '/v1/workspaces/ws-1/entities/size/values/large/synonyms?version=2017-05-26',
        next_url: '/v1/workspaces/ws-1/entities/size/values/large/synonyms?cursor=abc&version=2017-05-26',
        next_cursor: 'abc',
      },
    });

    const result = await useCase.list({ workspaceId: 'ws-1', entity: 'size', value: 'large', pageLimit: 1 });

    expect(lastRequest()?.url).toBe(
      `${BASE}/v1/workspaces/ws-1/entities/size/values/large/synonyms?version=2017-05-26&page_limit=1`
    );
    expect(result.synonyms).toEqual([{ synonym: 'big' }]);
    expect(result.pagination.nextCursor).toBe('abc');
  });

  it('should create a synonym', async () => {
    respond(201, { synonym: 'huge' });

    await useCase.create({ workspaceId: 'ws-1', entity: 'size', value: 'large', synonym: 'huge' });

    expect(lastRequest()).toMatchObject({
      method: 'POST',
      path: '/v1/workspaces/ws-1/entities/size/values/large/synonyms',
      body: '{"synonym":"huge"}',
    });
  });

  it('should get, update and delete a synonym', async () => {
    const path = '/v1/workspaces/ws-1/entities/size/values/large/synonyms/huge';
    respond(200, { synonym: 'giant' });

    await useCase.get({ workspaceId: 'ws-1', entity: 'size', value: 'large', synonym: 'huge' });
    expect(lastRequest()).toMatchObject({ method: 'GET', path });

    const updated = await useCase.update({
      workspaceId: 'ws-1',
      entity: 'size',
      value: 'large',
      synonym: 'huge',
      changes: { synonym: 'giant' },
    });
    expect(lastRequest()).toMatchObject({ method: 'POST', path, body: '{"synonym":"giant"}' });
    expect(updated.synonym).toBe('giant');

    await useCase.delete({ workspaceId: 'ws-1', entity: 'size', value: 'large', synonym: 'huge' });
    expect(lastRequest()).toMatchObject({ method: 'DELETE', path });
  });
});
