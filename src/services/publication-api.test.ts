import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BackendSession } from './backend-session.js';
import { PublicationApi, toCopyRequest } from './publication-api.js';

const mockFetch = vi.fn<typeof fetch>();

function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status });
}

describe('toCopyRequest', () => {
    it('drops server-assigned fields and artifacts', () => {
        const source = {
            '@context': 'https://example.org/context',
            id: 'https://api.example.org/publication/018b',
            identifier: '018b',
            entityDescription: { mainTitle: 'Title' },
            associatedArtifacts: [{ type: 'File', name: 'a.pdf' }],
        };

        expect(toCopyRequest(source)).toEqual({ entityDescription: { mainTitle: 'Title' }, associatedArtifacts: [] });
        expect(source.identifier).toBe('018b');
    });
});

describe('PublicationApi.copyPublication', () => {
    beforeEach(() => {
        mockFetch.mockReset();
        vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('fetches the source and posts a copy with the bearer token', async () => {
        mockFetch
            .mockResolvedValueOnce(json({ access_token: 'token-1', expires_in: 3600 }))
            .mockResolvedValueOnce(json({ identifier: '018b', entityDescription: { mainTitle: 'Title' } }))
            .mockResolvedValueOnce(json({ identifier: '019c' }, 201));
        const session = new BackendSession({
            apiDomain: 'api.example.org',
            cognitoUri: 'https://auth.example.org',
            credentials: { backendClientId: 'test-client', backendClientSecret: 'test-secret' },
        });

        const created = await new PublicationApi(session).copyPublication('018b');

        expect(created).toEqual({ identifier: '019c' });
        expect(mockFetch.mock.calls[1][0]).toBe('https://api.example.org/publication/018b?doNotRedirect=true');
        const [postUrl, postInit] = mockFetch.mock.calls[2];
        expect(postUrl).toBe('https://api.example.org/publication');
        expect(postInit?.method).toBe('POST');
        expect(postInit?.headers).toMatchObject({ Authorization: 'Bearer token-1' });
        expect(postInit?.body).toBe(JSON.stringify({ entityDescription: { mainTitle: 'Title' }, associatedArtifacts: [] }));
    });
});
