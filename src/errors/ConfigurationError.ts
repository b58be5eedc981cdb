import { SiteflowError } from './SiteflowError';

/**
 * Error thrown at startup when the environment configuration is incomplete
 * or malformed. Fatal: no command may run without a valid configuration.
 */
export class ConfigurationError extends SiteflowError {
    public readonly kind = 'config' as const;

    /**
     * The environment variables at fault, in the order they were checked.
     */
    public readonly variables: string[];

    /**
     * @param variables - The offending environment variable names
     * @param reason - What is wrong with them
     */
    constructor(variables: string[], reason: string) {
        const message = `Invalid Siteflow configuration (${variables.join(', ')}): ${reason}`;
        super(message, `${reason}. Set ${variables.join(', ')} in the environment or in your .env file.`);

        this.name = 'ConfigurationError';
        this.variables = variables;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, ConfigurationError);
        }
    }

    public override details(): Record<string, unknown> {
        return { variables: this.variables };
    }
}
