import { ListUsersCommand, type UserType } from '@aws-sdk/client-cognito-identity-provider';
import { getParameter } from './account-service.js';
import { getCognitoClient } from './aws-clients.js';
import { collectPages } from './pagination.js';
import { matchAllWords } from './reconcile.js';
import { getConfig } from '../utils/config.js';
import type { AwsContext } from '../types/index.js';

export function attributeText(user: UserType): string {
    return (user.Attributes ?? []).map((attribute) => attribute.Value ?? '').join(' ');
}

export class CognitoService {
    constructor(private readonly ctx: AwsContext) {}

    async listUsers(userPoolId: string): Promise<UserType[]> {
        return collectPages({
            service: 'cognito-idp',
            operation: 'ListUsers',
            fetchPage: async (token: string | undefined) => {
                const response = await getCognitoClient(this.ctx).send(
                    new ListUsersCommand({ UserPoolId: userPoolId, PaginationToken: token })
                );
                return { items: response.Users, nextToken: response.PaginationToken };
            },
        });
    }

    /**
     * Users whose attribute values together contain every search word.
     */
    async search(searchTerm: string): Promise<UserType[]> {
        const userPoolId = await getParameter(this.ctx, getConfig().parameters.userPoolId, true);
        const users = await this.listUsers(userPoolId);
        return matchAllWords(users, searchTerm, attributeText);
    }
}
