import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { ListLogs } from './ListLogs.js';
import type { HttpResponse, RequestDescriptor } from '../../domain/ports/IHttpTransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { RestClient } from '../../infrastructure/http/RestClient.js';

const BASE = 'https://conversation.example.test/api';

describe('ListLogs', () => {
  let send: Mock<(request: RequestDescriptor) => Promise<HttpResponse>>;
  let mockLogger: ILogger;
  let useCase: ListLogs;

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
    useCase = new ListLogs(rest, mockLogger);
  });

  it('should send log options in order after the version', async () => {
    respond(200, { logs: [], pagination: {} });

    const result = await useCase.execute({
      workspaceId: 'ws-1',
      sort: '-request_timestamp',
      filter: 'response_timestamp>=2017-05-01',
      pageLimit: 20,
      cursor: 'c1',
    });

    expect(lastRequest()?.query).toEqual([
      ['version', '2017-05-26'],
      ['sort', '-request_timestamp'],
      ['filter', 'response_timestamp>=2017-05-01'],
      ['page_limit', '20'],
      ['cursor', 'c1'],
    ]);
    expect(lastRequest()?.url).toBe(
      `${BASE}/v1/workspaces/ws-1/logs?version=2017-05-26&sort=-request_timestamp&filter=response_timestamp%3E%3D2017-05-01&page_limit=20&cursor=c1`
    );
    expect(result).toEqual({ logs: [], pagination: {} });
  });

  it('should log and rethrow when the service rejects the filter', async () => {
    respond(400, { error: 'Invalid filter' });

    await expect(useCase.execute({ workspaceId: 'ws-1', filter: 'bogus' })).rejects.toThrow('Invalid filter');
    expect(mockLogger.error).toHaveBeenCalledWith('Error in listLogs', expect.any(Error), {
      workspaceId: 'ws-1',
      filter: 'bogus',
    });
  });
});
