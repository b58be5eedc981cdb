import { SiteflowError } from './SiteflowError';

/**
 * Error thrown when the host names a command that does not exist.
 */
export class UnsupportedCommandError extends SiteflowError {
    public readonly kind = 'command' as const;

    public readonly command: string;

    public readonly supported: readonly string[];

    constructor(command: string, supported: readonly string[]) {
        const message = `Unsupported command "${command}"`;
        super(message, `${message}. Supported commands: ${supported.join(', ')}`);

        this.name = 'UnsupportedCommandError';
        this.command = command;
        this.supported = supported;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, UnsupportedCommandError);
        }
    }

    public override details(): Record<string, unknown> {
        return { command: this.command, supported: this.supported };
    }
}
