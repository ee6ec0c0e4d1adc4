// JSON over fetch, with failures mapped to RemoteServiceError
import { RemoteServiceError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface JsonRequest {
    method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
    headers?: Record<string, string>;
    body?: unknown;
    form?: Record<string, string>;
}

export async function requestJson(
    service: string,
    operation: string,
    url: string,
    request: JsonRequest = {}
): Promise<unknown> {
    const headers: Record<string, string> = { Accept: 'application/json', ...request.headers };
    let body: string | undefined;
    if (request.form) {
        headers['Content-Type'] = 'application/x-www-form-urlencoded';
        body = new URLSearchParams(request.form).toString();
    } else if (request.body !== undefined) {
        headers['Content-Type'] ??= 'application/json';
        body = JSON.stringify(request.body);
    }

    const method = request.method ?? 'GET';
    logger.debug(`${method} ${url}`, { service, operation });

    let res: Response;
    try {
        res = await fetch(url, { method, headers, body });
    } catch (error) {
        throw new RemoteServiceError(service, operation, errorMessage(error), { cause: error });
    }

    const text = await res.text();
    if (!res.ok) {
        throw new RemoteServiceError(service, operation, `HTTP ${res.status}: ${text}`, {
            statusCode: res.status,
        });
    }
    if (text.length === 0) {
        return null;
    }
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new RemoteServiceError(service, operation, `Response is not JSON: ${errorMessage(error)}`, {
            cause: error,
            statusCode: res.status,
        });
    }
}
