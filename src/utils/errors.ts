// Error taxonomy shared by services and the CLI exit path

export class AdminError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * An AWS SDK or HTTP API call failed. The original error is kept as `cause`.
 */
export class RemoteServiceError extends AdminError {
    readonly service: string;
    readonly operation: string;
    readonly statusCode?: number;

    constructor(
        service: string,
        operation: string,
        message: string,
        options?: { cause?: unknown; statusCode?: number }
    ) {
        super(`${service}.${operation} failed: ${message}`, { cause: options?.cause });
        this.service = service;
        this.operation = operation;
        this.statusCode = options?.statusCode;
    }
}

export class ValidationError extends AdminError {}

export class NotFoundError extends AdminError {}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Run a remote call and convert any failure that is not already part of the
 * taxonomy into a RemoteServiceError.
 */
export async function callRemote<T>(
    service: string,
    operation: string,
    fn: () => Promise<T>
): Promise<T> {
    try {
        return await fn();
    } catch (error) {
        if (error instanceof AdminError) {
            throw error;
        }
        throw new RemoteServiceError(service, operation, errorMessage(error), { cause: error });
    }
}

/**
 * Exit code for the CLI: 2 for bad input, 1 for everything else.
 */
export function exitCodeFor(error: unknown): number {
    return error instanceof ValidationError ? 2 : 1;
}
