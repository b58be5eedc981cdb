import * as assert from 'assert';
import sinon from 'sinon';
import type { InternalAxiosRequestConfig } from 'axios';
import { SiteflowHttpClient } from '../../core/http/SiteflowHttpClient';
import { NetworkError } from '../../errors';
import { FakeSiteflowServer, createTestConfig } from '../testSetup';

suite('SiteflowHttpClient', () => {
    let server: FakeSiteflowServer;

    function createClient(overrides: Parameters<typeof createTestConfig>[0] = {}): SiteflowHttpClient {
        return new SiteflowHttpClient({ ...createTestConfig(overrides), adapter: server.adapter });
    }

    setup(() => {
        server = new FakeSiteflowServer();
    });

    teardown(() => {
        sinon.restore();
    });

    test('sends default headers, base URL, timeout and bearer token', async () => {
        let seen: InternalAxiosRequestConfig | undefined;
        const http = new SiteflowHttpClient({
            ...createTestConfig({ timeoutMs: 1234 }),
            adapter: async (config) => {
                seen = config;
                return { data: '{"ok":true}', status: 200, statusText: 'OK', headers: {}, config };
            },
        });

        const response = await http.send({ method: 'GET', path: '/ext/api/2.0/flows', token: 'abc' });

        assert.deepStrictEqual(response, { status: 200, data: { ok: true } });
        assert.ok(seen);
        assert.strictEqual(seen.baseURL, 'https://siteflow.test');
        assert.strictEqual(seen.timeout, 1234);
        assert.strictEqual(seen.headers.Authorization, 'Bearer abc');
        assert.strictEqual(seen.headers.Origin, 'https://siteflow.test');
        assert.strictEqual(seen.headers.Referer, 'https://siteflow.test');
    });

    test('resolves non-2xx responses instead of throwing', async () => {
        server.queueResponse('GET', '/ext/api/2.0/flows', 404, { message: 'nope' });
        const http = createClient();

        const response = await http.send({ method: 'GET', path: '/ext/api/2.0/flows' });

        assert.deepStrictEqual(response, { status: 404, data: { message: 'nope' } });
    });

    test('keeps a non-JSON body as raw text', async () => {
        server.queueResponse('GET', '/ext/api/2.0/flows', 502, '<html>Bad Gateway</html>', true);
        const http = createClient();

        const response = await http.send({ method: 'GET', path: '/ext/api/2.0/flows' });

        assert.strictEqual(response.data, '<html>Bad Gateway</html>');
    });

    test('retries GET requests on 5xx up to maxRetries', async () => {
        server.queueResponse('GET', '/ext/api/2.0/flows', 503, { message: 'busy' });
        server.queueResponse('GET', '/ext/api/2.0/flows', 500, { message: 'busy' });
        server.queueResponse('GET', '/ext/api/2.0/flows', 200, { data: [] });
        const http = createClient({ maxRetries: 2 });

        const response = await http.send({ method: 'GET', path: '/ext/api/2.0/flows' });

        assert.deepStrictEqual(response, { status: 200, data: { data: [] } });
        assert.strictEqual(server.requestsTo('GET', '/ext/api/2.0/flows').length, 3);
    });

    test('returns the last response when retries run out', async () => {
        server.queueResponse('GET', '/ext/api/2.0/flows', 503, { attempt: 1 });
        server.queueResponse('GET', '/ext/api/2.0/flows', 503, { attempt: 2 });
        const http = createClient({ maxRetries: 1 });

        const response = await http.send({ method: 'GET', path: '/ext/api/2.0/flows' });

        assert.deepStrictEqual(response, { status: 503, data: { attempt: 2 } });
        assert.strictEqual(server.requestsTo('GET', '/ext/api/2.0/flows').length, 2);
    });

    test('retries GET requests on network failures', async () => {
        server.queueNetworkFailure('GET', '/ext/api/2.0/flows', 'ECONNRESET');
        server.queueResponse('GET', '/ext/api/2.0/flows', 200, { data: [] });
        const http = createClient({ maxRetries: 1 });

        const response = await http.send({ method: 'GET', path: '/ext/api/2.0/flows' });

        assert.strictEqual(response.status, 200);
    });

    test('does not retry on 4xx', async () => {
        server.queueResponse('GET', '/ext/api/2.0/flows', 400, { message: 'bad' });
        const http = createClient({ maxRetries: 3 });

        const response = await http.send({ method: 'GET', path: '/ext/api/2.0/flows' });

        assert.strictEqual(response.status, 400);
        assert.strictEqual(server.requests.length, 1);
    });

    test('never retries POST or PATCH', async () => {
        server.queueResponse('POST', '/ext/api/2.0/flows/bulk-create', 503, { message: 'busy' });
        server.queueNetworkFailure('PATCH', '/ext/api/2.0/steps/S/update-text-block');
        const http = createClient({ maxRetries: 3 });

        const post = await http.send({ method: 'POST', path: '/ext/api/2.0/flows/bulk-create', body: { data: [] } });
        await assert.rejects(
            http.send({ method: 'PATCH', path: '/ext/api/2.0/steps/S/update-text-block', body: { data: '' } }),
            (error: unknown) => error instanceof NetworkError && error.reason === 'unreachable' && error.code === 'ECONNREFUSED'
        );

        assert.strictEqual(post.status, 503);
        assert.strictEqual(server.requests.length, 2);
    });

    test('maps timeouts to NetworkError with reason timeout', async () => {
        server.queueNetworkFailure('GET', '/ext/api/2.0/flows', 'ECONNABORTED');
        const http = createClient();

        await assert.rejects(
            http.send({ method: 'GET', path: '/ext/api/2.0/flows' }),
            (error: unknown) => error instanceof NetworkError && error.reason === 'timeout' && error.method === 'GET'
        );
    });

    test('an aborted signal cancels without sending', async () => {
        const controller = new AbortController();
        controller.abort();
        const http = createClient({ maxRetries: 3 });

        await assert.rejects(
            http.send({ method: 'GET', path: '/ext/api/2.0/flows', signal: controller.signal }),
            (error: unknown) => error instanceof NetworkError && error.reason === 'cancelled'
        );
        assert.strictEqual(server.requests.length, 0);
    });

    test('aborting during backoff stops further attempts', async () => {
        server.queueNetworkFailure('GET', '/ext/api/2.0/flows');
        const http = createClient({ maxRetries: 3, retryDelayMs: 10_000 });
        const controller = new AbortController();

        const pending = http.send({ method: 'GET', path: '/ext/api/2.0/flows', signal: controller.signal });
        setTimeout(() => controller.abort(), 20);

        await assert.rejects(
            pending,
            (error: unknown) => error instanceof NetworkError && error.reason === 'cancelled'
        );
        assert.strictEqual(server.requests.length, 1);
    });

    test('debug tracing goes to stderr and never includes the token', async () => {
        const errorStub = sinon.stub(console, 'error');
        const http = createClient({ debug: true });
        server.queueResponse('GET', '/ext/api/2.0/flows', 200, { data: [] });

        await http.send({ method: 'GET', path: '/ext/api/2.0/flows', token: 'secret-token' });

        sinon.assert.calledOnceWithExactly(errorStub, '[siteflow] GET /ext/api/2.0/flows -> 200 (attempt 1)');
    });
});
