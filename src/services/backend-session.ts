// Client-credentials access to the internal backend APIs
import { z } from 'zod';
import { getJsonSecret, getParameter } from './account-service.js';
import { requestJson } from './http.js';
import { RemoteServiceError } from '../utils/errors.js';
import { getConfig } from '../utils/config.js';
import type { AwsContext } from '../types/index.js';

// Refresh this long before the token actually expires
const EXPIRY_MARGIN_MS = 30_000;

export const clientCredentialsSchema = z.object({
    backendClientId: z.string().min(1),
    backendClientSecret: z.string().min(1),
});

export type ClientCredentials = z.infer<typeof clientCredentialsSchema>;

const tokenResponseSchema = z.object({
    access_token: z.string(),
    expires_in: z.number(),
});

export interface BackendSessionOptions {
    apiDomain: string;
    cognitoUri: string;
    credentials: ClientCredentials;
    now?: () => number;
}

export class BackendSession {
    readonly apiDomain: string;
    private readonly cognitoUri: string;
    private readonly credentials: ClientCredentials;
    private readonly now: () => number;
    private token?: string;
    private expiresAt = 0;

    constructor(options: BackendSessionOptions) {
        this.apiDomain = options.apiDomain;
        this.cognitoUri = options.cognitoUri;
        this.credentials = options.credentials;
        this.now = options.now ?? Date.now;
    }

    /**
     * Resolve API domain, token endpoint and client credentials for an account.
     */
    static async forAccount(ctx: AwsContext): Promise<BackendSession> {
        const config = getConfig();
        const [apiDomain, cognitoUri, credentials] = await Promise.all([
            getParameter(ctx, config.parameters.apiDomain),
            getParameter(ctx, config.parameters.cognitoUri),
            getJsonSecret(ctx, config.secrets.backendClientCredentials, clientCredentialsSchema),
        ]);
        return new BackendSession({ apiDomain, cognitoUri, credentials });
    }

    url(path: string): string {
        return `https://${this.apiDomain}/${path.replace(/^\//, '')}`;
    }

    isTokenExpired(): boolean {
        return this.token === undefined || this.now() > this.expiresAt - EXPIRY_MARGIN_MS;
    }

    async getToken(): Promise<string> {
        if (this.token !== undefined && !this.isTokenExpired()) {
            return this.token;
        }
        const raw = await requestJson('cognito', 'oauth2/token', `${this.cognitoUri}/oauth2/token`, {
            method: 'POST',
            form: {
                grant_type: 'client_credentials',
                client_id: this.credentials.backendClientId,
                client_secret: this.credentials.backendClientSecret,
            },
        });
        const parsed = tokenResponseSchema.safeParse(raw);
        if (!parsed.success) {
            throw new RemoteServiceError('cognito', 'oauth2/token', 'Token response is missing access_token or expires_in');
        }
        this.token = parsed.data.access_token;
        this.expiresAt = this.now() + parsed.data.expires_in * 1000;
        return parsed.data.access_token;
    }

    async authHeaders(): Promise<Record<string, string>> {
        return { Authorization: `Bearer ${await this.getToken()}` };
    }
}
