import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { ReliefClient } from '../src/client.js';
import {
  AuthenticationError,
  ConflictError,
  InvalidResponseError,
  NetworkError,
  NotFoundError,
  ServerError,
  ValidationError,
} from '../src/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function ok(data: unknown, status = 200): Response {
  return jsonResponse({ success: true, data, requestId: 'r-1' }, status);
}

function fail(status: number, code: string, message: string, details?: Record<string, unknown>): Response {
  return jsonResponse(
    { success: false, error: { code, message, ...(details && { details }) }, requestId: 'r-1' },
    status
  );
}

const timestamp = '2026-03-01T12:00:00.000Z';

const rescueRequest = {
  requestId: 'req_0000000001_abcdefghijkl',
  location: { name: 'Riverside district' },
  imagery: { preEvent: ['s3://imagery/pre.tif'], postEvent: ['s3://imagery/post.tif'] },
  status: 'submitted',
  createdAt: timestamp,
  updatedAt: timestamp,
};

const emptyPage = { items: [], total: 0, limit: 20, offset: 0, hasMore: false };

describe('ReliefClient', () => {
  let mockFetch: Mock<typeof fetch>;
  let client: ReliefClient;

  beforeEach(() => {
    mockFetch = vi.fn<typeof fetch>();
    client = new ReliefClient({
      baseUrl: 'http://localhost:3000',
      apiKey: 'test-secret',
      timeout: 5000,
      fetch: mockFetch,
    });
  });

  describe('constructor', () => {
    it('should remove trailing slash from baseUrl', async () => {
      const c = new ReliefClient({ baseUrl: 'http://localhost:3000/', fetch: mockFetch });
      mockFetch.mockResolvedValueOnce(ok(emptyPage));

      await c.requests.list();

      expect(mockFetch).toHaveBeenCalledWith(
        'http://localhost:3000/api/v1/requests',
        expect.objectContaining({ method: 'GET' })
      );
    });
  });

  describe('request headers', () => {
    it('should send only the API key on a GET', async () => {
      mockFetch.mockResolvedValueOnce(ok(emptyPage));

      await client.requests.list();

      expect(mockFetch).toHaveBeenCalledWith(
        expect.any(String),
        expect.objectContaining({ headers: { 'X-API-Key': 'test-secret' } })
      );
    });

    it('should send no headers without an API key or body', async () => {
      const anonymous = new ReliefClient({ baseUrl: 'http://localhost:3000', fetch: mockFetch });
      mockFetch.mockResolvedValueOnce(ok(emptyPage));

      await anonymous.requests.list();

      expect(mockFetch).toHaveBeenCalledWith(
        expect.any(String),
        expect.objectContaining({ headers: {} })
      );
    });
  });

  describe('requests resource', () => {
    it('should submit a request as JSON', async () => {
      const ack = { requestId: rescueRequest.requestId, status: 'submitted', triggered: true };
      mockFetch.mockResolvedValueOnce(ok(ack, 202));

      const body = {
        location: { name: 'Riverside district' },
        imagery: { preEvent: ['s3://imagery/pre.tif'], postEvent: ['s3://imagery/post.tif'] },
      };
      const result = await client.requests.submit(body);

      expect(result).toEqual(ack);
      expect(mockFetch).toHaveBeenCalledWith(
        'http://localhost:3000/api/v1/requests',
        expect.objectContaining({
          method: 'POST',
          body: JSON.stringify(body),
          headers: { 'Content-Type': 'application/json', 'X-API-Key': 'test-secret' },
        })
      );
    });

    it('should list requests with filters', async () => {
      mockFetch.mockResolvedValueOnce(ok({ ...emptyPage, limit: 5, offset: 10 }));

      await client.requests.list({ limit: 5, offset: 10, status: 'failed' });

      expect(mockFetch).toHaveBeenCalledWith(
        'http://localhost:3000/api/v1/requests?limit=5&offset=10&status=failed',
        expect.anything()
      );
    });

    it('should return the combined status view', async () => {
      const view = {
        requestId: rescueRequest.requestId,
        progress: 'intake',
        request: rescueRequest,
        damageReport: null,
        logisticsPlan: null,
      };
      mockFetch.mockResolvedValueOnce(ok(view));

      const result = await client.requests.get(rescueRequest.requestId);

      expect(result).toEqual(view);
      expect(mockFetch).toHaveBeenCalledWith(
        `http://localhost:3000/api/v1/requests/${rescueRequest.requestId}`,
        expect.objectContaining({ method: 'GET' })
      );
    });

    it('should encode the request id in the path', async () => {
      mockFetch.mockResolvedValueOnce(fail(404, 'NOT_FOUND', 'Request not found: a/b'));

      await expect(client.requests.get('a/b')).rejects.toThrow(NotFoundError);
      expect(mockFetch).toHaveBeenCalledWith(
        'http://localhost:3000/api/v1/requests/a%2Fb',
        expect.anything()
      );
    });

    it('should post the stage to reprocess', async () => {
      const ack = { requestId: 'req_1', stage: 'damage', attempt: 1, messageId: 'msg_1' };
      mockFetch.mockResolvedValueOnce(ok(ack, 202));

      const result = await client.requests.reprocess('req_1', 'damage');

      expect(result).toEqual(ack);
      expect(mockFetch).toHaveBeenCalledWith(
        'http://localhost:3000/api/v1/requests/req_1/reprocess',
        expect.objectContaining({ method: 'POST', body: '{"stage":"damage"}' })
      );
    });
  });

  describe('operator resource', () => {
    it('should reconcile without a dry run by default', async () => {
      const report = { dryRun: false, scannedAt: timestamp, stuck: [], applied: 0 };
      mockFetch.mockResolvedValueOnce(ok(report));

      const result = await client.operator.reconcile();

      expect(result).toEqual(report);
      expect(mockFetch).toHaveBeenCalledWith(
        'http://localhost:3000/api/v1/reconcile',
        expect.objectContaining({ method: 'POST', body: '{"dryRun":false}' })
      );
    });

    it('should list dead letters', async () => {
      const deadLetter = {
        messageId: 'msg_1',
        topic: 'damage-analysis',
        requestId: null,
        deliveryCount: 1,
        reason: 'malformed trigger payload',
        publishedAt: timestamp,
        deadLetteredAt: timestamp,
      };
      mockFetch.mockResolvedValueOnce(ok([deadLetter]));

      await expect(client.operator.deadLetters()).resolves.toEqual([deadLetter]);
    });

    it('should fetch the audit trail', async () => {
      const event = {
        id: 'evt_1',
        requestId: 'req_1',
        eventType: 'request_submitted',
        timestamp,
        details: { location: 'Riverside district' },
      };
      mockFetch.mockResolvedValueOnce(ok([event]));

      await expect(client.operator.audit('req_1')).resolves.toEqual([event]);
      expect(mockFetch).toHaveBeenCalledWith(
        'http://localhost:3000/api/v1/audit/req_1',
        expect.anything()
      );
    });
  });

  describe('error handling', () => {
    it('should throw ValidationError with details for 400 status', async () => {
      mockFetch.mockResolvedValueOnce(
        fail(400, 'VALIDATION_ERROR', 'Invalid rescue request', { issues: [{ path: 'imagery' }] })
      );

      const error = await client.operator.deadLetters().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: 'Invalid rescue request',
        details: { issues: [{ path: 'imagery' }] },
      });
    });

    it('should throw AuthenticationError for 401 status', async () => {
      mockFetch.mockResolvedValueOnce(fail(401, 'UNAUTHORIZED', 'Invalid API key'));

      await expect(client.operator.reconcile()).rejects.toThrow(AuthenticationError);
    });

    it('should throw ConflictError for 409 status', async () => {
      mockFetch.mockResolvedValueOnce(
        fail(409, 'CONFLICT', 'damage stage of req_1 is complete, not failed')
      );

      await expect(client.requests.reprocess('req_1', 'damage')).rejects.toThrow(
        'damage stage of req_1 is complete, not failed'
      );
    });

    it('should keep the status and code of a 503', async () => {
      mockFetch.mockResolvedValueOnce(fail(503, 'SERVICE_UNAVAILABLE', 'Trigger bus unavailable'));

      const error = await client.requests.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({ status: 503, code: 'SERVICE_UNAVAILABLE' });
    });

    it('should throw ServerError for a non-JSON error body', async () => {
      mockFetch.mockResolvedValueOnce(new Response('Bad Gateway', { status: 502 }));

      await expect(client.requests.list()).rejects.toThrow('HTTP 502 with a non-JSON body');
    });

    it('should throw InvalidResponseError when data does not match', async () => {
      mockFetch.mockResolvedValueOnce(ok({ items: 'nope' }));

      await expect(client.requests.list()).rejects.toThrow(InvalidResponseError);
    });

    it('should throw NetworkError for fetch failures', async () => {
      mockFetch.mockRejectedValueOnce(new Error('socket hang up'));

      await expect(client.requests.list()).rejects.toThrow(
        new NetworkError('Request failed: socket hang up')
      );
    });

    it('should throw NetworkError for timeout', async () => {
      mockFetch.mockRejectedValueOnce(
        Object.assign(new Error('This operation was aborted'), { name: 'AbortError' })
      );

      await expect(client.requests.list()).rejects.toThrow('Request timed out after 5000ms');
    });

    it('should pass an abort signal to fetch', async () => {
      mockFetch.mockResolvedValueOnce(ok(emptyPage));

      await client.requests.list();

      expect(mockFetch).toHaveBeenCalledWith(
        expect.any(String),
        expect.objectContaining({ signal: expect.any(AbortSignal) })
      );
    });
  });
});
