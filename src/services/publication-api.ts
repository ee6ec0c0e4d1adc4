import type { BackendSession } from './backend-session.js';
import { requestJson } from './http.js';
import { RemoteServiceError } from '../utils/errors.js';
import { isJsonObject } from '../utils/json.js';
import { logger } from '../utils/logger.js';
import type { JsonObject } from '../types/index.js';

function expectObject(value: unknown, operation: string): JsonObject {
    if (!isJsonObject(value)) {
        throw new RemoteServiceError('publication-api', operation, 'Expected a JSON object in the response');
    }
    return value;
}

/**
 * Request body for creating a copy of `publication` as a new draft.
 * Artifacts are not copied; server-assigned fields are dropped.
 */
export function toCopyRequest(publication: JsonObject): JsonObject {
    const { identifier: _identifier, id: _id, '@context': _context, ...rest } = publication;
    return { ...rest, associatedArtifacts: [] };
}

export class PublicationApi {
    constructor(private readonly session: BackendSession) {}

    uri(identifier: string): string {
        return this.session.url(`publication/${identifier}`);
    }

    async fetchPublication(identifier: string): Promise<JsonObject> {
        const raw = await requestJson('publication-api', 'GetPublication', `${this.uri(identifier)}?doNotRedirect=true`, {
            headers: await this.session.authHeaders(),
        });
        return expectObject(raw, 'GetPublication');
    }

    async createPublication(body: JsonObject): Promise<JsonObject> {
        const raw = await requestJson('publication-api', 'CreatePublication', this.session.url('publication'), {
            method: 'POST',
            headers: await this.session.authHeaders(),
            body,
        });
        return expectObject(raw, 'CreatePublication');
    }

    /**
     * Copy a publication without its files; returns the new publication.
     */
    async copyPublication(identifier: string): Promise<JsonObject> {
        const source = await this.fetchPublication(identifier);
        const created = await this.createPublication(toCopyRequest(source));
        logger.info(`Copied publication ${identifier}`, { newIdentifier: created.identifier });
        return created;
    }
}
