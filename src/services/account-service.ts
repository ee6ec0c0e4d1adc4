// Account-level lookups: alias, SSM parameters, secrets
import { ListAccountAliasesCommand } from '@aws-sdk/client-iam';
import { GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { GetParameterCommand } from '@aws-sdk/client-ssm';
import { z } from 'zod';
import { getIAMClient, getSecretsManagerClient, getSSMClient } from './aws-clients.js';
import { NotFoundError, ValidationError, callRemote, errorMessage } from '../utils/errors.js';
import type { AwsContext } from '../types/index.js';

/**
 * First IAM account alias, or undefined when the account has none.
 */
export async function getAccountAlias(ctx: AwsContext): Promise<string | undefined> {
    const response = await callRemote('iam', 'ListAccountAliases', () =>
        getIAMClient(ctx).send(new ListAccountAliasesCommand({}))
    );
    return response.AccountAliases?.[0];
}

/**
 * Alias when there is one, otherwise the profile name
 */
export async function describeAccount(ctx: AwsContext): Promise<string> {
    return (await getAccountAlias(ctx)) ?? ctx.profile ?? 'default';
}

export async function getParameter(ctx: AwsContext, name: string, withDecryption = false): Promise<string> {
    const response = await callRemote('ssm', 'GetParameter', () =>
        getSSMClient(ctx).send(new GetParameterCommand({ Name: name, WithDecryption: withDecryption }))
    );
    const value = response.Parameter?.Value;
    if (value === undefined) {
        throw new NotFoundError(`SSM parameter ${name} has no value`);
    }
    return value;
}

/**
 * Read a JSON secret and validate its shape.
 */
export async function getJsonSecret<T>(
    ctx: AwsContext,
    secretId: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
    const response = await callRemote('secretsmanager', 'GetSecretValue', () =>
        getSecretsManagerClient(ctx).send(new GetSecretValueCommand({ SecretId: secretId }))
    );
    if (!response.SecretString) {
        throw new NotFoundError(`Secret ${secretId} has no string value`);
    }

    let json: unknown;
    try {
        json = JSON.parse(response.SecretString);
    } catch (error) {
        throw new ValidationError(`Secret ${secretId} is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
        throw new ValidationError(`Secret ${secretId} has an unexpected shape: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`);
    }
    return parsed.data;
}
