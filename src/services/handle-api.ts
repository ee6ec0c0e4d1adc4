import type { BackendSession } from './backend-session.js';
import { requestJson } from './http.js';
import { ValidationError } from '../utils/errors.js';

export interface HandleRequest {
    uri: string;
    prefix?: string;
    suffix?: string;
}

/**
 * Prefix and suffix from the last two path segments of a handle URL,
 * e.g. https://hdl.handle.net/11250.1/39053933 gives ["11250.1", "39053933"].
 */
export function splitHandle(handle: string): { prefix: string; suffix: string } {
    const segments = handle.split('/').filter((segment) => segment.length > 0);
    const suffix = segments.pop();
    const prefix = segments.pop();
    if (!prefix || !suffix) {
        throw new ValidationError(`Handle ${handle} has no prefix/suffix`);
    }
    return { prefix, suffix };
}

export class HandleApi {
    constructor(private readonly session: BackendSession) {}

    async createHandle(request: HandleRequest): Promise<unknown> {
        return requestJson('handle-api', 'CreateHandle', this.session.url('handle/'), {
            method: 'POST',
            headers: await this.session.authHeaders(),
            body: request,
        });
    }
}
