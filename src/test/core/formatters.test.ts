import * as assert from 'assert';
import { extractIdentifier, extractItems, formatCommandResult } from '../../core/format/formatters';

suite('Formatters', () => {
    suite('extractItems', () => {
        test('reads items from a data wrapper or a bare array', () => {
            assert.deepStrictEqual(extractItems({ data: [{ a: 1 }, 'skip'] }), [{ a: 1 }]);
            assert.deepStrictEqual(extractItems([{ b: 2 }]), [{ b: 2 }]);
        });

        test('returns nothing for other shapes', () => {
            assert.deepStrictEqual(extractItems({ data: 'x' }), []);
            assert.deepStrictEqual(extractItems('text'), []);
        });
    });

    suite('extractIdentifier', () => {
        test('finds the identifier in an object, an array or a data array', () => {
            assert.strictEqual(extractIdentifier({ identifier: 'f1' }), 'f1');
            assert.strictEqual(extractIdentifier([{ identifier: 42 }]), '42');
            assert.strictEqual(extractIdentifier({ data: [{ identifier: 'p9' }] }), 'p9');
        });

        test('falls back to Unknown', () => {
            assert.strictEqual(extractIdentifier({}), 'Unknown');
            assert.strictEqual(extractIdentifier([]), 'Unknown');
            assert.strictEqual(extractIdentifier(undefined), 'Unknown');
        });
    });

    suite('formatCommandResult', () => {
        test('authenticate', () => {
            assert.strictEqual(
                formatCommandResult({ command: { name: 'authenticate' }, data: {} }, 'p1'),
                'Authentication successful! Working with project ID: p1'
            );
        });

        test('get_flows lists flows with placeholders for missing fields', () => {
            const output = formatCommandResult({
                command: { name: 'get_flows' },
                data: { data: [{ identifier: 'f1', name: 'Audit', type: 'GENERIC' }, {}] },
            }, 'p1');

            assert.strictEqual(output, [
                '=== Available Flows for Project p1 ===',
                '1. Audit (ID: f1, Type: GENERIC)',
                '2. Unnamed Flow (ID: Unknown, Type: Unknown Type)',
            ].join('\n'));
        });

        test('get_flows with no flows', () => {
            assert.strictEqual(
                formatCommandResult({ command: { name: 'get_flows' }, data: { data: [] } }, 'p1'),
                'No flows found for project ID: p1'
            );
        });

        test('get_flow_phases renders properties, actions and transitions', () => {
            const output = formatCommandResult({
                command: { name: 'get_flow_phases', flowId: 'f1' },
                data: {
                    data: [{
                        identifier: 'ph1',
                        name: 'Prep',
                        orderingNumber: 1,
                        managementProperties: { isEnabled: true, autoAdvance: false },
                        properties: { color: 'blue' },
                        actions: [{ identifier: 'a1', name: 'Start' }],
                        transitions: [{ targetPhase: 'ph2' }],
                    }],
                },
            }, 'p1');

            assert.strictEqual(output, [
                '=== Flow Phases for Flow f1 in Project p1 ===',
                '',
                '1. Prep (ID: ph1, Order: 1)',
                '   Enabled: true',
                '   Auto-advance: false',
                '   Can be skipped: false',
                '',
                '   Properties:',
                '     - color: blue',
                '',
                '   Available Actions:',
                '     - Start (ID: a1)',
                '',
                '   Transitions:',
                '     - To: ph2, Condition: No condition',
            ].join('\n'));
        });

        test('get_flow_phases with no phases', () => {
            assert.strictEqual(
                formatCommandResult({ command: { name: 'get_flow_phases', flowId: 'f1' }, data: [] }, 'p1'),
                'No phases found for flow ID: f1 in project: p1'
            );
        });

        test('create_flow', () => {
            const output = formatCommandResult({
                command: { name: 'create_flow', flowName: 'Audit', projectId: 'p2', flowType: 'CORE' },
                data: [{ identifier: 'flow-7' }],
            }, 'p1');

            assert.strictEqual(output, "Successfully created flow 'Audit'.\nFlow ID: flow-7\nFlow Type: CORE\nProject ID: p2");
        });

        test('add_phase_to_flow', () => {
            const output = formatCommandResult({
                command: { name: 'add_phase_to_flow', flowId: 'f1', phaseName: 'Prep', autoAdvance: true, canBeSkipped: false },
                data: { identifier: 'ph3' },
            }, 'p1');

            assert.strictEqual(
                output,
                "Successfully added phase 'Prep' to flow f1.\nPhase ID: ph3\nAuto-advance: true\nCan be skipped: false"
            );
        });

        test('add_step_to_phase', () => {
            const output = formatCommandResult({
                command: {
                    name: 'add_step_to_phase',
                    phaseId: 'ph3',
                    stepName: 'Check',
                    enabledThematicBlocks: ['INSTRUCTION', 'FORM'],
                },
                data: {},
            }, 'p1');

            assert.strictEqual(
                output,
                "Successfully added step 'Check' to phase ph3.\nStep ID: Unknown\nEnabled thematic blocks: INSTRUCTION, FORM"
            );
        });

        test('update_step_text', () => {
            assert.strictEqual(
                formatCommandResult({ command: { name: 'update_step_text', stepId: 's1', textContent: 'x' }, data: {} }, 'p1'),
                'Successfully updated text for step s1.'
            );
        });
    });
});
