/**
 * Validation module barrel export.
 *
 * @example
 * ```ts
 * import { validateIdentifier } from './validation';
 *
 * const validation = validateIdentifier(flowId, 'flow_id');
 * if (!validation.valid) {
 *   throw new ValidationError('flow_id', flowId, validation.error);
 * }
 * ```
 */

export type { ValidationResult } from '../../utils';

export { validateIdentifier, validateConfigString } from './validators';

export {
    FLOW_TYPES,
    THEMATIC_BLOCKS,
    isFlowType,
    isThematicBlock,
    validateThematicBlocks,
    type FlowType,
    type ThematicBlock
} from './schemas';
