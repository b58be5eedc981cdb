/**
 * Enumerated values accepted by the Siteflow API.
 */

import type { ValidationResult } from '../../utils';

export const FLOW_TYPES = ['CORE', 'HEAD', 'GENERIC', 'FORM'] as const;
export type FlowType = (typeof FLOW_TYPES)[number];

export const THEMATIC_BLOCKS = ['INSTRUCTION', 'CHECKLIST', 'FORM', 'SIGNATURE'] as const;
export type ThematicBlock = (typeof THEMATIC_BLOCKS)[number];

export function isFlowType(value: string): value is FlowType {
    return (FLOW_TYPES as readonly string[]).includes(value);
}

export function isThematicBlock(value: string): value is ThematicBlock {
    return (THEMATIC_BLOCKS as readonly string[]).includes(value);
}

/**
 * Validates a list of thematic block names.
 *
 * Every entry must be one of THEMATIC_BLOCKS and the list cannot be empty.
 * Names are compared as given; callers normalise case first.
 */
export function validateThematicBlocks(blocks: readonly string[]): ValidationResult {
    if (blocks.length === 0) {
        return { valid: false, error: 'At least one thematic block is required' };
    }

    const invalid = blocks.filter(block => !isThematicBlock(block));
    if (invalid.length > 0) {
        return {
            valid: false,
            error: `Invalid block types: ${invalid.join(', ')}. Valid types are: ${THEMATIC_BLOCKS.join(', ')}`
        };
    }

    return { valid: true };
}
