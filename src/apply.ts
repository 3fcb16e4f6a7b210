import * as core from '@actions/core';
import { IssueFieldsError, errorMessage } from './errors';
import { TrackerClient } from './tracker';
import { IssueRef, SyncOperation, SyncStateMap } from './types';

export type OutcomeStatus = 'applied' | 'unchanged' | 'failed';

export interface OperationOutcome {
    identifier: string;
    type: SyncOperation['type'];
    status: OutcomeStatus;
    issue?: IssueRef;
    error?: string;
}

export interface ApplyResult {
    state: SyncStateMap;
    outcomes: OperationOutcome[];
}

function changedFields(fields: Record<string, string>, previous: Record<string, string>): Record<string, string> {
    const changed: Record<string, string> = {};
    for (const [name, value] of Object.entries(fields)) {
        if (previous[name] !== value) changed[name] = value;
    }
    return changed;
}

/**
 * Moves the issue under `wanted` on the tracker, or detaches it from `linked`
 * when it should have no parent. Returns the parent the issue is linked under
 * afterwards. A failed link is only logged: the stored parent then differs from
 * the requirement's and the next run tries again.
 */
async function relink(
    identifier: string,
    issue: IssueRef,
    wanted: string | undefined,
    linked: string | undefined,
    state: SyncStateMap,
    tracker: TrackerClient,
): Promise<string | undefined> {
    if (wanted === linked) return linked;

    if (wanted) {
        const parentIssue = state.get(wanted)?.issue;
        if (!parentIssue) {
            core.warning(`Issue #${issue.number} (${identifier}) could not be linked under ${wanted}: ${wanted} has no issue yet`);
            return linked;
        }
        try {
            await tracker.linkSubIssue(parentIssue, issue);
            return wanted;
        } catch (error) {
            core.warning(`Issue #${issue.number} (${identifier}) could not be linked under #${parentIssue.number}: ${errorMessage(error)}`);
            return linked;
        }
    }

    const linkedIssue = linked ? state.get(linked)?.issue : undefined;
    if (!linkedIssue) return undefined;
    try {
        await tracker.unlinkSubIssue(linkedIssue, issue);
        return undefined;
    } catch (error) {
        core.warning(`Issue #${issue.number} (${identifier}) could not be detached from #${linkedIssue.number}: ${errorMessage(error)}`);
        return linked;
    }
}

async function applyOne(operation: SyncOperation, state: SyncStateMap, tracker: TrackerClient): Promise<OperationOutcome> {
    const { identifier } = operation;

    switch (operation.type) {
        case 'noop':
            state.set(identifier, operation.next);
            return { identifier, type: operation.type, status: 'unchanged', issue: operation.next.issue };

        case 'create': {
            const issue = await tracker.createIssue(operation.title, operation.body, operation.fields);
            core.info(`Created issue #${issue.number} for ${identifier}`);
            const parent = await relink(identifier, issue, operation.parent, undefined, state, tracker);
            state.set(identifier, { ...operation.next, issue, parent });
            return { identifier, type: operation.type, status: 'applied', issue };
        }

        case 'update': {
            if (operation.reopen) {
                await tracker.reopenIssue(operation.issue);
                core.info(`Reopened issue #${operation.issue.number} for ${identifier}`);
            }
            const fields = changedFields(operation.fields, operation.previousFields);
            await tracker.updateIssue(operation.issue, operation.title, operation.body, fields);
            const parent = await relink(identifier, operation.issue, operation.parent, operation.previousParent, state, tracker);
            state.set(identifier, { ...operation.next, parent });
            core.info(`Updated issue #${operation.issue.number} for ${identifier}`);
            return { identifier, type: operation.type, status: 'applied', issue: operation.issue };
        }

        case 'close':
            await tracker.closeIssue(operation.issue);
            state.set(identifier, operation.next);
            core.info(`Closed issue #${operation.issue.number}: ${identifier} is no longer in the ReqIF source`);
            return { identifier, type: operation.type, status: 'applied', issue: operation.issue };
    }
}

/**
 * Applies the operations in order. A failure is recorded against its requirement
 * and does not stop the others; the returned state only advances for operations
 * that went through.
 */
export async function applyOperations(
    operations: readonly SyncOperation[],
    state: SyncStateMap,
    tracker: TrackerClient,
): Promise<ApplyResult> {
    const next: SyncStateMap = new Map(state);
    const outcomes: OperationOutcome[] = [];

    for (const operation of operations) {
        try {
            outcomes.push(await applyOne(operation, next, tracker));
        } catch (error) {
            const message = errorMessage(error);
            core.error(`Could not ${operation.type} issue for ${operation.identifier}: ${message}`);
            if (operation.type === 'create' && error instanceof IssueFieldsError) {
                // Remember the issue, but leave the hash empty so the next run pushes the fields again
                // and links it under its parent
                next.set(operation.identifier, { ...operation.next, issue: error.issue, contentHash: '', projectFields: {}, parent: undefined });
            }
            outcomes.push({ identifier: operation.identifier, type: operation.type, status: 'failed', error: message });
        }
    }

    return { state: next, outcomes };
}
