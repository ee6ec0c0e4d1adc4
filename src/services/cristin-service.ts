// Person registry client (basic auth plus bot-filter bypass header)
import { z } from 'zod';
import { getJsonSecret, getParameter } from './account-service.js';
import { requestJson } from './http.js';
import { getConfig } from '../utils/config.js';
import type { AwsContext, JsonObject } from '../types/index.js';

// Fields the registry does not accept in a patch
const READ_ONLY_PERSON_FIELDS = ['cristin_person_id', 'norwegian_national_id'];

const basicAuthSchema = z.object({
    username: z.string(),
    password: z.string(),
});

export interface PersonRegistryOptions {
    baseUrl: string;
    basicAuth: string;
    bypassHeader: { name: string; value: string };
    representingInstitution: string;
}

export function withoutReadOnlyFields(person: JsonObject): JsonObject {
    return Object.fromEntries(Object.entries(person).filter(([key]) => !READ_ONLY_PERSON_FIELDS.includes(key)));
}

export class CristinService {
    constructor(private readonly options: PersonRegistryOptions) {}

    static async forAccount(ctx: AwsContext): Promise<CristinService> {
        const config = getConfig();
        const [host, bypassName, bypassValue, credentials] = await Promise.all([
            getParameter(ctx, config.parameters.personRegistryApi),
            getParameter(ctx, config.parameters.personRegistryBypassHeaderName),
            getParameter(ctx, config.parameters.personRegistryBypassHeaderValue),
            getJsonSecret(ctx, config.secrets.personRegistryBasicAuth, basicAuthSchema),
        ]);
        return new CristinService({
            baseUrl: `https://${host}`,
            basicAuth: Buffer.from(`${credentials.username}:${credentials.password}`, 'utf8').toString('base64'),
            bypassHeader: { name: bypassName, value: bypassValue },
            representingInstitution: config.personRegistryInstitution,
        });
    }

    private headers(contentType: string): Record<string, string> {
        return {
            'Content-Type': contentType,
            Authorization: `Basic ${this.options.basicAuth}`,
            [this.options.bypassHeader.name]: this.options.bypassHeader.value,
            'Cristin-Representing-Institution': this.options.representingInstitution,
        };
    }

    async addPerson(person: JsonObject): Promise<unknown> {
        return requestJson('cristin', 'AddPerson', `${this.options.baseUrl}/persons`, {
            method: 'POST',
            headers: this.headers('application/json'),
            body: person,
        });
    }

    async updatePerson(personId: string, person: JsonObject): Promise<unknown> {
        return requestJson('cristin', 'UpdatePerson', `${this.options.baseUrl}/persons/${encodeURIComponent(personId)}`, {
            method: 'PATCH',
            headers: this.headers('application/merge-patch+json'),
            body: withoutReadOnlyFields(person),
        });
    }
}
