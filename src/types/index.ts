// Shared type definitions for the admin commands

/** Credential scope for every call made in one invocation */
export interface AwsContext {
    profile?: string;
    region?: string;
}

/** Global flags accepted by the root command */
export interface GlobalOptions {
    profile?: string;
    region?: string;
    verbose?: boolean;
    quiet?: boolean;
}

// Report file persisted between a list/prepare step and its execute/update step
export interface Report<T> {
    identifier: string;
    exportedAt: string;
    count: number;
    items: T[];
}

export type ItemActionStatus = 'success' | 'failed' | 'skipped' | 'dry-run';

// Per-item outcome of a mutating command
export interface ItemActionResult {
    id: string;
    action: string;
    status: ItemActionStatus;
    detail?: string;
    error?: string;
}

// Lambda
export interface FunctionVersionRef {
    functionName: string;
    functionArn: string;
    version: string;
}

export interface FunctionConcurrency {
    FunctionName: string;
    ReservedConcurrency: number | null;
}

// Reconciliation
export interface KeyedGroup<T> {
    key: string;
    items: T[];
}

export interface MissingCustomer {
    customerId: string;
    referencedBy: string[];
}

export interface DuplicateCustomer {
    organizationNumber: string;
    customers: Array<{ identifier: string; cristinId: string; name?: string }>;
}

// Organization migration
export type AffiliationKind = 'contributor' | 'owner';

export interface AffectedPublication {
    identifier: string;
    kind: AffiliationKind;
}

// Handle migration
export interface HandleTask {
    identifier: string;
    publicationUri: string;
    handle: string;
}

// SQS
export interface QueueMessage {
    MessageId: string;
    ReceiptHandle?: string;
    Body: string;
    Attributes: Record<string, string>;
    MessageAttributes: Record<string, { StringValue?: string; DataType?: string }>;
    MD5OfBody?: string;
    ParsedBody?: unknown;
}

export interface MessageSummaryEntry {
    count: number;
    candidates: string[];
}

export interface MessageSummary {
    bySender: Record<string, MessageSummaryEntry>;
    byBody: Record<string, MessageSummaryEntry>;
}

// CodePipeline
export interface StageStatus {
    status: string;
    lastChange?: Date;
}

export interface PipelineDetails {
    name: string;
    repository: string;
    branch: string;
    build: StageStatus;
    deploy: StageStatus;
    summary: string;
}

/** Loosely typed JSON document as returned by the internal APIs */
export type JsonObject = Record<string, unknown>;
