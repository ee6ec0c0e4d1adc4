import {
    GetPipelineStateCommand,
    ListPipelinesCommand,
    type PipelineSummary,
    type StageState,
} from '@aws-sdk/client-codepipeline';
import { getCodePipelineClient } from './aws-clients.js';
import { collectPages } from './pagination.js';
import { callRemote } from '../utils/errors.js';
import type { AwsContext, PipelineDetails, StageStatus } from '../types/index.js';

export const UNKNOWN = 'Unknown';

function queryValue(url: string, key: string): string | undefined {
    const marker = `${key}=`;
    const index = url.indexOf(marker);
    if (index < 0) {
        return undefined;
    }
    return decodeURIComponent(url.slice(index + marker.length).split('&')[0]);
}

export function stageStatus(stage: StageState | undefined): StageStatus {
    if (!stage) {
        return { status: UNKNOWN };
    }
    const changes = (stage.actionStates ?? []).flatMap((action) =>
        action.latestExecution?.lastStatusChange ? [action.latestExecution.lastStatusChange] : []
    );
    const lastChange = changes.reduce<Date | undefined>(
        (latest, change) => (latest === undefined || change > latest ? change : latest),
        undefined
    );
    return { status: stage.latestExecution?.status ?? UNKNOWN, lastChange };
}

/**
 * Repository and branch come from the Source action's entity URL; build and
 * deploy status from the stages of the same name.
 */
export function pipelineDetails(name: string, stages: StageState[]): PipelineDetails {
    const source = stages.find((stage) => stage.stageName === 'Source');
    const sourceAction = source?.actionStates?.[0];
    const entityUrl = sourceAction?.entityUrl ?? '';

    return {
        name,
        repository: queryValue(entityUrl, 'FullRepositoryId') ?? UNKNOWN,
        branch: queryValue(entityUrl, 'Branch') ?? UNKNOWN,
        build: stageStatus(stages.find((stage) => stage.stageName === 'Build')),
        deploy: stageStatus(stages.find((stage) => stage.stageName === 'Deploy')),
        summary: sourceAction?.latestExecution?.summary?.split('\n')[0] ?? '',
    };
}

/**
 * Most recent deployment first; pipelines never deployed go last.
 */
export function sortByLastDeploy(pipelines: PipelineDetails[]): PipelineDetails[] {
    const time = (details: PipelineDetails) => details.deploy.lastChange?.getTime() ?? 0;
    return [...pipelines].sort((a, b) => time(b) - time(a));
}

export class PipelinesService {
    constructor(private readonly ctx: AwsContext) {}

    async listPipelines(): Promise<PipelineSummary[]> {
        return collectPages({
            service: 'codepipeline',
            operation: 'ListPipelines',
            fetchPage: async (token: string | undefined) => {
                const response = await getCodePipelineClient(this.ctx).send(new ListPipelinesCommand({ nextToken: token }));
                return { items: response.pipelines, nextToken: response.nextToken };
            },
        });
    }

    /**
     * Details of every pipeline with a known repository, sorted by last deploy.
     */
    async getPipelineDetails(): Promise<PipelineDetails[]> {
        const details: PipelineDetails[] = [];
        for (const pipeline of await this.listPipelines()) {
            if (!pipeline.name) {
                continue;
            }
            const name = pipeline.name;
            const state = await callRemote('codepipeline', 'GetPipelineState', () =>
                getCodePipelineClient(this.ctx).send(new GetPipelineStateCommand({ name }))
            );
            details.push(pipelineDetails(name, state.stageStates ?? []));
        }
        return sortByLastDeploy(details.filter((d) => d.repository !== UNKNOWN));
    }
}
