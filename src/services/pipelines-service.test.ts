import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GetPipelineStateCommand, ListPipelinesCommand, type StageState } from '@aws-sdk/client-codepipeline';

const { mockSend } = vi.hoisted(() => ({
    mockSend: vi.fn(),
}));

vi.mock('./aws-clients.js', () => ({
    getCodePipelineClient: vi.fn(() => ({ send: mockSend })),
}));

// Import after mocks are established
import { PipelinesService, UNKNOWN, pipelineDetails, stageStatus } from './pipelines-service.js';

function stages(repository: string, branch: string, deployedAt?: Date): StageState[] {
    return [
        {
            stageName: 'Source',
            actionStates: [
                {
                    actionName: 'Source',
                    entityUrl: `https://console.aws.amazon.com/codesuite/settings/connections/redirect?connectionArn=x&referenceType=COMMIT&FullRepositoryId=${encodeURIComponent(repository)}&Commit=abc&Branch=${branch}`,
                    latestExecution: { summary: 'Merge pull request #12\n\nDetails', status: 'Succeeded' },
                },
            ],
        },
        {
            stageName: 'Build',
            latestExecution: { status: 'Succeeded', pipelineExecutionId: 'e1' },
            actionStates: [{ latestExecution: { lastStatusChange: new Date('2024-03-01T10:00:00Z') } }],
        },
        {
            stageName: 'Deploy',
            latestExecution: { status: 'InProgress', pipelineExecutionId: 'e1' },
            actionStates: deployedAt
                ? [
                      { latestExecution: { lastStatusChange: new Date('2024-01-01T00:00:00Z') } },
                      { latestExecution: { lastStatusChange: deployedAt } },
                  ]
                : [],
        },
    ];
}

describe('pipelineDetails', () => {
    it('reads repository and branch from the source entity URL', () => {
        const deployedAt = new Date('2024-03-02T12:00:00Z');

        expect(pipelineDetails('api-pipeline', stages('org/api', 'main', deployedAt))).toEqual({
            name: 'api-pipeline',
            repository: 'org/api',
            branch: 'main',
            build: { status: 'Succeeded', lastChange: new Date('2024-03-01T10:00:00Z') },
            deploy: { status: 'InProgress', lastChange: deployedAt },
            summary: 'Merge pull request #12',
        });
    });

    it('falls back to Unknown without a source stage', () => {
        const details = pipelineDetails('empty', []);

        expect(details.repository).toBe(UNKNOWN);
        expect(details.branch).toBe(UNKNOWN);
        expect(details.summary).toBe('');
        expect(stageStatus(undefined)).toEqual({ status: UNKNOWN });
    });
});

describe('PipelinesService.getPipelineDetails', () => {
    beforeEach(() => {
        mockSend.mockReset();
    });

    it('drops pipelines without a repository and sorts by last deploy', async () => {
        const states: Record<string, StageState[]> = {
            old: stages('org/old', 'main', new Date('2024-01-05T00:00:00Z')),
            orphan: [],
            recent: stages('org/recent', 'develop', new Date('2024-06-01T00:00:00Z')),
            never: stages('org/never', 'main'),
        };
        mockSend.mockImplementation(async (command: object) => {
            if (command instanceof ListPipelinesCommand) {
                return { pipelines: Object.keys(states).map((name) => ({ name })) };
            }
            if (command instanceof GetPipelineStateCommand) {
                return { stageStates: states[command.input.name ?? ''] };
            }
            throw new Error('unexpected command');
        });

        const details = await new PipelinesService({}).getPipelineDetails();

        expect(details.map((d) => d.name)).toEqual(['recent', 'old', 'never']);
        expect(details[0].branch).toBe('develop');
    });
});
