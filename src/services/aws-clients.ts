// AWS SDK client construction
// One client per service and profile/region, reused for the whole CLI run

import { CodePipelineClient } from '@aws-sdk/client-codepipeline';
import { CognitoIdentityProviderClient } from '@aws-sdk/client-cognito-identity-provider';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { IAMClient } from '@aws-sdk/client-iam';
import { LambdaClient } from '@aws-sdk/client-lambda';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { SQSClient } from '@aws-sdk/client-sqs';
import { SSMClient } from '@aws-sdk/client-ssm';
import { defaultProvider } from '@aws-sdk/credential-provider-node';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { getConfig } from '../utils/config.js';
import type { AwsContext } from '../types/index.js';

function clientConfig(ctx: AwsContext) {
    const config = getConfig();
    return {
        region: ctx.region || config.region,
        maxAttempts: config.maxAttempts,
        // defaultProvider handles env, shared config and SSO; profile passed explicitly
        credentials: defaultProvider({ profile: ctx.profile || config.profile }),
    };
}

function perContext<T>(create: (ctx: AwsContext) => T): (ctx: AwsContext) => T {
    const clients = new Map<string, T>();
    return (ctx) => {
        const key = `${ctx.profile ?? ''}:${ctx.region ?? ''}`;
        let client = clients.get(key);
        if (!client) {
            client = create(ctx);
            clients.set(key, client);
        }
        return client;
    };
}

export const getLambdaClient = perContext((ctx) => new LambdaClient(clientConfig(ctx)));

export const getDynamoDBClient = perContext((ctx) => new DynamoDBClient(clientConfig(ctx)));

export const getDocumentClient = perContext((ctx) =>
    DynamoDBDocumentClient.from(getDynamoDBClient(ctx), {
        marshallOptions: {
            removeUndefinedValues: true,
        },
    })
);

export const getCognitoClient = perContext((ctx) => new CognitoIdentityProviderClient(clientConfig(ctx)));

export const getSSMClient = perContext((ctx) => new SSMClient(clientConfig(ctx)));

export const getSecretsManagerClient = perContext((ctx) => new SecretsManagerClient(clientConfig(ctx)));

export const getIAMClient = perContext((ctx) => new IAMClient(clientConfig(ctx)));

export const getSQSClient = perContext((ctx) => new SQSClient(clientConfig(ctx)));

export const getCodePipelineClient = perContext((ctx) => new CodePipelineClient(clientConfig(ctx)));
