import * as core from '@actions/core';
import { SyncError } from './errors';

export interface ActionInputs {
    reqifPath: string;
    configPath: string;
    statePath: string;
    dryRun: boolean;
    token: string;
    repository: string;
    labels: string[];
    project?: { owner: string; number: number };
    purge?: string[] | '*';
}

export function parseList(value: string): string[] {
    return value.split(/[,\n]/).map(item => item.trim()).filter(item => item.length > 0);
}

function parsePurge(value: string): string[] | '*' | undefined {
    if (value.trim() === '*') return '*';
    const identifiers = parseList(value);
    return identifiers.length > 0 ? identifiers : undefined;
}

function parseProject(ownerInput: string, numberInput: string, repository: string): ActionInputs['project'] {
    if (!numberInput) return undefined;
    const number = Number(numberInput);
    if (!Number.isInteger(number) || number <= 0) {
        throw new SyncError(`project-number must be a positive integer, got '${numberInput}'`);
    }
    const owner = ownerInput || repository.split('/')[0];
    if (!owner) {
        throw new SyncError('project-owner is required when the repository is not known');
    }
    return { owner, number };
}

export function getActionInputs(): ActionInputs {
    const token = core.getInput('github-token');
    if (token) core.setSecret(token);

    const repository = core.getInput('repository') || process.env['GITHUB_REPOSITORY'] || '';

    return {
        reqifPath: core.getInput('reqif-path', { required: true }),
        configPath: core.getInput('config-path', { required: true }),
        statePath: core.getInput('state-path', { required: true }),
        dryRun: core.getBooleanInput('dry-run'),
        token,
        repository,
        labels: parseList(core.getInput('labels')),
        project: parseProject(core.getInput('project-owner'), core.getInput('project-number'), repository),
        purge: parsePurge(core.getInput('purge-state')),
    };
}
