/**
 * Unit tests for HttpToolEndpoint
 *
 * fetch is replaced by a spy; nothing leaves the process.
 */

import { ERROR_CODES } from '../../../src/errors/codes';
import { RequestCancelledError, ToolInvocationError } from '../../../src/errors/types';
import { HttpToolEndpoint } from '../../../src/tools/http-endpoint';
import type { ToolCallRequest } from '../../../src/tools/types';
import { quietLogger, TEST_TOOLS } from '../../helpers/fakes';

const IBT = TEST_TOOLS[0];

const REQUEST: ToolCallRequest = {
  query: 'What are my dental benefits?',
  parameters: { planId: 'PLAN-7' },
  callerContext: { memberId: 'M-100' },
  executionContext: {},
};

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function hangUntilAborted(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
  });
}

describe('HttpToolEndpoint', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  let endpoint: HttpToolEndpoint;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    endpoint = new HttpToolEndpoint({ timeoutMs: 1000 }, quietLogger());
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should POST the request as JSON to the catalog endpoint', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ ok: true, payload: { answer: 'covered' } }));

    await endpoint.invoke(IBT, REQUEST);

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('http://tools.test/ibt');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Accept: 'application/json' });
    expect(JSON.parse(String(init?.body))).toEqual(REQUEST);
  });

  it('should return the decoded response', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ ok: true, payload: { answer: 'covered', planId: 'PLAN-7' } }));

    await expect(endpoint.invoke(IBT, REQUEST)).resolves.toEqual({
      ok: true,
      payload: { answer: 'covered', planId: 'PLAN-7' },
    });
  });

  it('should pass an ok:false response through', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ ok: false, payload: { error: 'plan not found' } }));

    await expect(endpoint.invoke(IBT, REQUEST)).resolves.toEqual({ ok: false, payload: { error: 'plan not found' } });
  });

  it('should treat a missing or null payload as empty', async () => {
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ ok: true, payload: null }))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));

    await expect(endpoint.invoke(IBT, REQUEST)).resolves.toEqual({ ok: true, payload: {} });
    await expect(endpoint.invoke(IBT, REQUEST)).resolves.toEqual({ ok: true, payload: {} });
  });

  it('should fail on a non-2xx status', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ message: 'unavailable' }, 503));

    const result = endpoint.invoke(IBT, REQUEST);

    await expect(result).rejects.toBeInstanceOf(ToolInvocationError);
    await expect(result).rejects.toThrow("Tool 'IBTAgent' returned HTTP 503");
  });

  it('should fail on a body that is not JSON', async () => {
    fetchSpy.mockResolvedValue(new Response('<html>oops</html>', { status: 200 }));

    await expect(endpoint.invoke(IBT, REQUEST)).rejects.toThrow(
      "Tool 'IBTAgent' returned an invalid response: body is not valid JSON"
    );
  });

  it('should fail on a body without the ok flag', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ answer: 'covered' }));

    await expect(endpoint.invoke(IBT, REQUEST)).rejects.toMatchObject({
      code: ERROR_CODES.TOOL_BAD_RESPONSE,
      message: "Tool 'IBTAgent' returned an invalid response: ok: Required",
    });
  });

  it('should wrap transport errors', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

    await expect(endpoint.invoke(IBT, REQUEST)).rejects.toThrow("Tool 'IBTAgent' request failed: fetch failed");
  });

  it('should time out a slow tool', async () => {
    endpoint = new HttpToolEndpoint({ timeoutMs: 20 }, quietLogger());
    fetchSpy.mockImplementation(hangUntilAborted);

    await expect(endpoint.invoke(IBT, REQUEST)).rejects.toMatchObject({
      code: ERROR_CODES.TOOL_TIMEOUT,
      message: "Tool 'IBTAgent' timed out after 20ms",
    });
  });

  it('should report cancellation of the request separately from a timeout', async () => {
    fetchSpy.mockImplementation(hangUntilAborted);
    const controller = new AbortController();

    const pending = endpoint.invoke(IBT, REQUEST, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
  });
});
