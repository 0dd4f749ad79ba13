/**
 * Field-level error reported to clients, in field declaration order
 */
export interface ValidationError {
    field: string;
    message: string;
    /** Offending raw value; omitted when empty */
    value?: string;
}

/**
 * Body of every 400/422 response produced by the request pipeline
 */
export interface ErrorResponse {
    code: number;
    message: string;
    errors: ValidationError[];
}

export function validationError(field: string, message: string, value?: string): ValidationError {
    return value === undefined || value === '' ? { field, message } : { field, message, value };
}
