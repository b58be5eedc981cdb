import * as assert from 'assert';
import { NetworkError, UnsupportedCommandError, ValidationError } from '../../errors';
import { FakeSiteflowServer, TEST_PROJECT_ID } from '../testSetup';

suite('CommandDispatcher', () => {
    let server: FakeSiteflowServer;
    let clock: number;

    setup(() => {
        server = new FakeSiteflowServer();
        clock = 1_700_000_000_000;
    });

    test('authenticate reports the project and token expiry', async () => {
        const { dispatcher } = server.createClient({}, () => clock);

        const result = await dispatcher.execute('authenticate');

        assert.deepStrictEqual(result, {
            command: { name: 'authenticate' },
            data: { authenticated: true, projectId: TEST_PROJECT_ID, expiresAt: '2023-11-14T23:13:20.000Z' },
        });
        assert.strictEqual(server.authenticationCount, 1);
    });

    test('commands after authenticate reuse the cached token', async () => {
        const { dispatcher } = server.createClient({}, () => clock);

        await dispatcher.execute('authenticate');
        await dispatcher.execute('create_flow', { flow_name: 'Audit', project_id: TEST_PROJECT_ID });
        await dispatcher.execute('get_flows');
        await dispatcher.execute('get_flow_phases', { flow_id: 'flow-1' });
        await dispatcher.execute('add_phase_to_flow', { flow_id: 'flow-1', phase_name: 'Prep' });
        await dispatcher.execute('add_step_to_phase', { phase_id: 'phase-2', step_name: 'Check' });
        await dispatcher.execute('update_step_text', { step_id: 'step-3', text_content: 'Done' });

        assert.strictEqual(server.authenticationCount, 1);
        assert.strictEqual(server.forwardedRequests.length, 6);
        assert.ok(server.forwardedRequests.every(request => request.authorization === 'Bearer token-1'));
    });

    test('the first command authenticates on demand', async () => {
        const { dispatcher } = server.createClient();

        const result = await dispatcher.execute('get_flows');

        assert.deepStrictEqual(result.data, { data: [] });
        assert.strictEqual(server.authenticationCount, 1);
        const [request] = server.requestsTo('GET', '/ext/api/2.0/flows');
        assert.deepStrictEqual(request.params, { projectId: TEST_PROJECT_ID });
    });

    test('create_flow falls back to the configured family ID', async () => {
        const { dispatcher } = server.createClient({ familyId: 'family-9' });

        await dispatcher.execute('create_flow', { flow_name: 'A', project_id: TEST_PROJECT_ID });
        await dispatcher.execute('create_flow', { flow_name: 'B', project_id: TEST_PROJECT_ID, family_id: 'family-2' });

        const bodies = server.requestsTo('POST', '/ext/api/2.0/flows/bulk-create').map(request => request.body);
        assert.deepStrictEqual(bodies, [
            {
                data: [{
                    flowProperties: { name: 'A', type: 'GENERIC', familyIdentifier: 'family-9' },
                    projectIdentifier: TEST_PROJECT_ID,
                }],
            },
            {
                data: [{
                    flowProperties: { name: 'B', type: 'GENERIC', familyIdentifier: 'family-2' },
                    projectIdentifier: TEST_PROJECT_ID,
                }],
            },
        ]);
    });

    test('update_step_text sends one PATCH and returns the response unchanged', async () => {
        const reply = { success: true, step: { identifier: 's1', blocks: [1, 2] } };
        server.queueResponse('PATCH', '/ext/api/2.0/steps/s1/update-text-block', 200, reply);
        const { dispatcher } = server.createClient();

        const result = await dispatcher.execute('update_step_text', { step_id: 's1', text_content: '<p>hi</p>' });

        assert.deepStrictEqual(result.data, reply);
        const patches = server.forwardedRequests;
        assert.strictEqual(patches.length, 1);
        assert.strictEqual(patches[0].method, 'PATCH');
        assert.deepStrictEqual(patches[0].body, { data: '<p>hi</p>' });
    });

    test('an expired token triggers exactly one new exchange', async () => {
        const { dispatcher } = server.createClient({ tokenTtlSeconds: 600 }, () => clock);
        await dispatcher.execute('authenticate');

        clock += 600 * 1000;
        await dispatcher.execute('get_flows');
        await dispatcher.execute('get_flows');

        assert.strictEqual(server.authenticationCount, 2);
        const calls = server.requestsTo('GET', '/ext/api/2.0/flows');
        assert.deepStrictEqual(calls.map(call => call.authorization), ['Bearer token-2', 'Bearer token-2']);
    });

    test('concurrent commands share one authentication', async () => {
        const { dispatcher } = server.createClient();

        const results = await Promise.all([
            dispatcher.execute('get_flows'),
            dispatcher.execute('get_flows'),
            dispatcher.execute('get_flows'),
        ]);

        assert.strictEqual(results.length, 3);
        assert.strictEqual(server.authenticationCount, 1);
        assert.strictEqual(server.requestsTo('GET', '/ext/api/2.0/flows').length, 3);
    });

    test('cancelling one command does not cancel a concurrent one', async () => {
        const { dispatcher } = server.createClient();
        const controller = new AbortController();

        const cancelled = dispatcher.execute('get_flows', {}, { signal: controller.signal });
        const unaffected = dispatcher.execute('get_flows');
        controller.abort();

        await assert.rejects(
            cancelled,
            (error: unknown) => error instanceof NetworkError && error.reason === 'cancelled'
        );
        assert.deepStrictEqual((await unaffected).data, { data: [] });
        assert.strictEqual(server.authenticationCount, 1);
    });

    test('a token shorter-lived than the refresh margin is still reused', async () => {
        server.expiresIn = 30;
        const { dispatcher } = server.createClient({}, () => clock);

        await dispatcher.execute('authenticate');
        await dispatcher.execute('get_flows');
        await dispatcher.execute('get_flows');

        assert.strictEqual(server.authenticationCount, 1);
    });

    test('invalid input fails before any request', async () => {
        const { dispatcher } = server.createClient();

        await assert.rejects(dispatcher.execute('add_phase_to_flow', { flow_id: 'flow-1' }), ValidationError);
        await assert.rejects(dispatcher.execute('archive_flow', {}), UnsupportedCommandError);

        assert.strictEqual(server.requests.length, 0);
    });

    test('a cancelled signal aborts without contacting the server', async () => {
        const { dispatcher } = server.createClient();
        const controller = new AbortController();
        controller.abort();

        await assert.rejects(
            dispatcher.execute('get_flows', {}, { signal: controller.signal }),
            (error: unknown) => error instanceof NetworkError && error.reason === 'cancelled'
        );
        assert.strictEqual(server.requests.length, 0);
    });

    test('dispatch() accepts an already parsed command', async () => {
        server.addFlow({ identifier: 'flow-a', name: 'A', projectIdentifier: TEST_PROJECT_ID });
        const { dispatcher } = server.createClient();

        const result = await dispatcher.dispatch({ name: 'get_flow_phases', flowId: 'flow-a' });

        assert.deepStrictEqual(result, { command: { name: 'get_flow_phases', flowId: 'flow-a' }, data: { data: [] } });
    });
});
