import * as core from '@actions/core';
import { OperationOutcome, applyOperations } from './apply';
import { buildRequirements } from './builder';
import { SyncError, errorMessage } from './errors';
import { resolveHierarchy } from './hierarchy';
import { FieldMismatch, SyncMode, loadFieldMap, mapRequirements, saveFieldMap } from './mapping';
import { RawReqifDocument, readReqifSource } from './reader';
import { reconcile } from './reconcile';
import { SyncStateStore, adoptExistingIssues, purgeState } from './state';
import { TrackerClient } from './tracker';
import { RequirementSet, SyncOperation } from './types';
import { SyncWarning, WarningCollector } from './warnings';

export function buildRequirementSet(document: RawReqifDocument, warnings: WarningCollector): RequirementSet {
    const built = buildRequirements(document, warnings);
    return resolveHierarchy(document.hierarchy, document.relations, built, warnings);
}

export async function loadRequirementSet(sourcePath: string, warnings: WarningCollector): Promise<RequirementSet> {
    const document = await readReqifSource(sourcePath, warnings);
    return buildRequirementSet(document, warnings);
}

export interface SyncOptions {
    reqifPath: string;
    configPath: string;
    mode: SyncMode;
    purge?: readonly string[] | '*';
}

export interface SyncCollaborators {
    store: SyncStateStore;
    tracker?: TrackerClient; // absent when there is no repository to talk to
}

export interface SyncReport {
    mode: SyncMode;
    requirementCount: number;
    fieldMapGenerated: boolean;
    applied: boolean; // false when the run only planned
    operations: SyncOperation[];
    outcomes: OperationOutcome[];
    warnings: readonly SyncWarning[];
    mismatches: FieldMismatch[];
    purged: string[];
    adopted: string[];
}

// Reads are optional during a dry run: the plan is still useful without them
async function readFromTracker<T>(mode: SyncMode, description: string, read: () => Promise<T>): Promise<T | undefined> {
    try {
        return await read();
    } catch (error) {
        if (mode === 'live') throw error;
        core.warning(`Could not ${description}, planning without it: ${errorMessage(error)}`);
        return undefined;
    }
}

function describe(operation: SyncOperation): string {
    switch (operation.type) {
        case 'create':
            return `create ${operation.identifier}${operation.parent ? ` under ${operation.parent}` : ''}`;
        case 'update':
            return `${operation.reopen ? 'reopen and update' : 'update'} #${operation.issue.number} (${operation.identifier})`;
        case 'close':
            return `close #${operation.issue.number} (${operation.identifier})`;
        case 'noop':
            return `keep ${operation.identifier}`;
    }
}

/**
 * One full run: read the ReqIF source, map it with the field map, diff it against
 * the stored state and, when writes are enabled, apply the result to the tracker.
 */
export async function runSync(options: SyncOptions, collaborators: SyncCollaborators): Promise<SyncReport> {
    const { store, tracker } = collaborators;
    const warnings = new WarningCollector();

    core.startGroup('Reading ReqIF');
    const set = await loadRequirementSet(options.reqifPath, warnings);
    core.info(`Found ${set.requirements.size} requirements (${set.roots.length} top level) and ${set.attributeNames.length} attributes.`);
    core.endGroup();

    const fieldMap = loadFieldMap(options.configPath);
    const trackerFields = fieldMap && tracker
        ? await readFromTracker(options.mode, 'list the tracker fields', () => tracker.listFields())
        : undefined;
    const mapping = mapRequirements(set, { fieldMap, mode: options.mode, trackerFields }, warnings);
    if (mapping.generated) {
        saveFieldMap(options.configPath, mapping.fieldMap);
        core.info(`No field map found. Wrote ${options.configPath} with every attribute in the issue body; review it and run again.`);
    }

    let state = await store.load();
    let purged: string[] = [];
    if (options.purge) {
        ({ state, purged } = purgeState(state, options.purge));
        if (purged.length > 0) core.info(`Purged sync state for ${purged.join(', ')}`);
    }

    let adopted: string[] = [];
    if (tracker) {
        const existing = await readFromTracker(options.mode, 'list existing issues', () => tracker.findIssues());
        if (existing) {
            ({ state, adopted } = adoptExistingIssues(state, existing, set.requirements.keys()));
            if (adopted.length > 0) core.info(`Adopted existing issues for ${adopted.join(', ')}`);
        }
    }

    const { operations } = reconcile(set, mapping.rendered, state);
    const report: SyncReport = {
        mode: options.mode,
        requirementCount: set.requirements.size,
        fieldMapGenerated: mapping.generated,
        applied: false,
        operations,
        outcomes: [],
        warnings: warnings.items,
        mismatches: mapping.mismatches,
        purged,
        adopted,
    };

    if (!mapping.writesEnabled) {
        core.startGroup('Planned operations (nothing written)');
        for (const operation of operations) {
            if (operation.type !== 'noop') core.info(describe(operation));
        }
        core.endGroup();
        return report;
    }

    if (!tracker) {
        throw new SyncError('Writing to the tracker needs a repository and a token');
    }

    core.startGroup('Applying operations');
    const result = await applyOperations(operations, state, tracker);
    core.endGroup();
    await store.save(result.state);

    return { ...report, applied: true, outcomes: result.outcomes };
}
