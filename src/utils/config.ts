// Runtime configuration read from the environment (and .env via dotenv)

import 'dotenv/config';
import { z } from 'zod';
import { ValidationError } from './errors.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const envSchema = z.object({
    AWS_PROFILE: z.string().min(1).optional(),
    AWS_REGION: z.string().min(1).optional(),
    AWS_DEFAULT_REGION: z.string().min(1).optional(),
    AWS_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
    LOG_LEVEL: logLevelSchema.default('info'),
    LOG_FORMAT: z.enum(['json', 'pretty']).optional(),
    LOG_FILE: z.string().min(1).optional(),

    PUBLICATIONS_TABLE_PATTERN: z
        .string()
        .default('^nva-resources-master-pipelines-NvaPublicationApiPipeline-.*-nva-publication-api$'),
    CUSTOMERS_TABLE_PREFIX: z.string().default('nva-customers'),
    USERS_TABLE_PREFIX: z.string().default('nva-users-and-roles'),
    TERMS_TABLE_PREFIX: z.string().default('terms-and-conditions'),

    API_DOMAIN_PARAMETER: z.string().default('/NVA/ApiDomain'),
    COGNITO_URI_PARAMETER: z.string().default('/NVA/CognitoUri'),
    USER_POOL_ID_PARAMETER: z.string().default('CognitoUserPoolId'),
    BACKEND_CLIENT_SECRET_NAME: z.string().default('BackendCognitoClientCredentials'),

    PERSON_REGISTRY_API_PARAMETER: z.string().default('cristinRestApi'),
    PERSON_REGISTRY_BYPASS_HEADER_NAME_PARAMETER: z.string().default('CristinBotFilterBypassHeaderName'),
    PERSON_REGISTRY_BYPASS_HEADER_VALUE_PARAMETER: z.string().default('CristinBotFilterBypassHeaderValue'),
    PERSON_REGISTRY_SECRET_NAME: z.string().default('CristinClientBasicAuth'),
    PERSON_REGISTRY_INSTITUTION: z.string().default('20754'),

    HANDLE_OWN_SOURCE_NAME: z.string().default('nva@sikt'),
    APPLICATION_DOMAIN: z.string().min(1).optional(),
    SYSTEM_USER: z.string().default('nva-backend@20754.0.0.0'),
});

export type LogLevel = z.infer<typeof logLevelSchema>;

export interface AppConfig {
    profile?: string;
    region?: string;
    maxAttempts: number;
    logLevel: LogLevel;
    logFormat?: 'json' | 'pretty';
    logFile?: string;
    tables: {
        publicationsPattern: string;
        customersPrefix: string;
        usersPrefix: string;
        termsPrefix: string;
    };
    parameters: {
        apiDomain: string;
        cognitoUri: string;
        userPoolId: string;
        personRegistryApi: string;
        personRegistryBypassHeaderName: string;
        personRegistryBypassHeaderValue: string;
    };
    secrets: {
        backendClientCredentials: string;
        personRegistryBasicAuth: string;
    };
    personRegistryInstitution: string;
    handleOwnSourceName: string;
    applicationDomain?: string;
    systemUser: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ValidationError(`Invalid environment configuration: ${issues.join('; ')}`);
    }
    const e = parsed.data;

    return {
        profile: e.AWS_PROFILE,
        region: e.AWS_REGION || e.AWS_DEFAULT_REGION,
        maxAttempts: e.AWS_MAX_ATTEMPTS,
        logLevel: e.LOG_LEVEL,
        logFormat: e.LOG_FORMAT,
        logFile: e.LOG_FILE,
        tables: {
            publicationsPattern: e.PUBLICATIONS_TABLE_PATTERN,
            customersPrefix: e.CUSTOMERS_TABLE_PREFIX,
            usersPrefix: e.USERS_TABLE_PREFIX,
            termsPrefix: e.TERMS_TABLE_PREFIX,
        },
        parameters: {
            apiDomain: e.API_DOMAIN_PARAMETER,
            cognitoUri: e.COGNITO_URI_PARAMETER,
            userPoolId: e.USER_POOL_ID_PARAMETER,
            personRegistryApi: e.PERSON_REGISTRY_API_PARAMETER,
            personRegistryBypassHeaderName: e.PERSON_REGISTRY_BYPASS_HEADER_NAME_PARAMETER,
            personRegistryBypassHeaderValue: e.PERSON_REGISTRY_BYPASS_HEADER_VALUE_PARAMETER,
        },
        secrets: {
            backendClientCredentials: e.BACKEND_CLIENT_SECRET_NAME,
            personRegistryBasicAuth: e.PERSON_REGISTRY_SECRET_NAME,
        },
        personRegistryInstitution: e.PERSON_REGISTRY_INSTITUTION,
        handleOwnSourceName: e.HANDLE_OWN_SOURCE_NAME,
        applicationDomain: e.APPLICATION_DOMAIN,
        systemUser: e.SYSTEM_USER,
    };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
    if (!cached) {
        cached = loadConfig();
    }
    return cached;
}
