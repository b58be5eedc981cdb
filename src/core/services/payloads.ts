/**
 * Request bodies for the Siteflow write endpoints.
 *
 * The shapes are the remote API's contract; optional fields are only
 * included when a value was supplied.
 */

import type { FlowType, ThematicBlock } from '../validation';

export interface CreateFlowInput {
    flowName: string;
    projectId: string;
    flowType: FlowType;
    description?: string;
    categoryId?: string;
    familyId?: string;
    familyCustomCode?: string;
    reference?: string;
}

export interface AddPhaseInput {
    flowId: string;
    phaseName: string;
    phaseDescription?: string;
    orderingNumber?: number;
    autoAdvance: boolean;
    canBeSkipped: boolean;
}

export interface AddStepInput {
    phaseId: string;
    stepName: string;
    stepDescription?: string;
    orderingNumber?: number;
    enabledThematicBlocks: readonly ThematicBlock[];
}

export interface BulkPayload<T> {
    data: T[];
}

export interface FlowPayload {
    flowProperties: {
        name: string;
        type: FlowType;
        description?: string;
        categoryIdentifier?: string;
        familyIdentifier?: string;
        familyCustomCode?: string;
        reference?: string;
    };
    projectIdentifier: string;
}

export interface PhasePayload {
    name: string;
    managementProperties: { isEnabled: boolean };
    internalInformation?: string;
    customOrderingNumber?: string;
    usageProperties?: { autoAdvance?: boolean; canBeSkipped?: boolean };
}

export interface StepPayload {
    name: string;
    managementProperties: { listEnabledThematicBlocks: ThematicBlock[] };
    internalInformation?: string;
    customOrderingNumber?: string;
}

export function buildCreateFlowPayload(input: CreateFlowInput): BulkPayload<FlowPayload> {
    const flowProperties: FlowPayload['flowProperties'] = {
        name: input.flowName,
        type: input.flowType,
    };
    if (input.description) {
        flowProperties.description = input.description;
    }
    if (input.categoryId) {
        flowProperties.categoryIdentifier = input.categoryId;
    }
    if (input.familyId) {
        flowProperties.familyIdentifier = input.familyId;
    }
    if (input.familyCustomCode) {
        flowProperties.familyCustomCode = input.familyCustomCode;
    }
    if (input.reference) {
        flowProperties.reference = input.reference;
    }

    return { data: [{ flowProperties, projectIdentifier: input.projectId }] };
}

export function buildAddPhasePayload(input: AddPhaseInput): BulkPayload<PhasePayload> {
    const phase: PhasePayload = {
        name: input.phaseName,
        managementProperties: { isEnabled: true },
    };
    if (input.phaseDescription) {
        phase.internalInformation = input.phaseDescription;
    }
    if (input.orderingNumber !== undefined) {
        phase.customOrderingNumber = String(input.orderingNumber);
    }
    // usageProperties only carries flags that are switched on
    if (input.autoAdvance || input.canBeSkipped) {
        const usage: NonNullable<PhasePayload['usageProperties']> = {};
        if (input.autoAdvance) {
            usage.autoAdvance = true;
        }
        if (input.canBeSkipped) {
            usage.canBeSkipped = true;
        }
        phase.usageProperties = usage;
    }

    return { data: [phase] };
}

export function buildAddStepPayload(input: AddStepInput): BulkPayload<StepPayload> {
    const step: StepPayload = {
        name: input.stepName,
        managementProperties: {
            listEnabledThematicBlocks: input.enabledThematicBlocks.length > 0
                ? [...input.enabledThematicBlocks]
                : ['INSTRUCTION'],
        },
    };
    if (input.stepDescription) {
        step.internalInformation = input.stepDescription;
    }
    if (input.orderingNumber !== undefined) {
        step.customOrderingNumber = String(input.orderingNumber);
    }

    return { data: [step] };
}
