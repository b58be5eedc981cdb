export {
    COMMAND_NAMES,
    isCommandName,
    type CommandName,
    type CommandResult,
    type SiteflowCommand,
    type AuthenticateCommand,
    type GetFlowsCommand,
    type GetFlowPhasesCommand,
    type CreateFlowCommand,
    type AddPhaseToFlowCommand,
    type AddStepToPhaseCommand,
    type UpdateStepTextCommand,
} from './types';
export {
    getCommandDefinition,
    listCommandDefinitions,
    type ArgumentType,
    type CommandArgument,
    type CommandDefinition,
} from './catalog';
export { parseCommand, parseKeyValueArgs, type RawArguments } from './parser';
export { CommandDispatcher, type DispatchOptions, type AuthenticationSummary } from './CommandDispatcher';
