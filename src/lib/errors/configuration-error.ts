/**
 * ConfigurationError - a miswired record, validator or endpoint
 *
 * Thrown while definitions are being built at start-up (unknown field names,
 * unsupported kinds, unknown rule tags, bad rule parameters, bad environment
 * values). Never thrown for bad request input.
 */
export class ConfigurationError extends Error {
    public readonly name = 'ConfigurationError';

    constructor(
        message: string,
        public readonly subject?: string
    ) {
        super(subject ? `${subject}: ${message}` : message);

        // Maintain proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
    return error instanceof ConfigurationError;
}
