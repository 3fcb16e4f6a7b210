import { createHash } from 'crypto';
import {
    CloseOperation,
    RenderedIssue,
    RequirementSet,
    SyncOperation,
    SyncStateEntry,
    SyncStateMap,
} from './types';

export interface ReconcileResult {
    operations: SyncOperation[];
    draft: SyncStateMap; // state after every operation succeeded
}

export function contentHash(issue: RenderedIssue): string {
    const fields = Object.keys(issue.fields).sort().map(name => [name, issue.fields[name]]);
    return createHash('sha256')
        .update(JSON.stringify([issue.title, issue.body, fields]))
        .digest('hex');
}

// Pre-order walk of the hierarchy forest: a parent always precedes its children
function hierarchyOrder(set: RequirementSet): string[] {
    const order: string[] = [];
    const seen = new Set<string>();
    const visit = (identifier: string) => {
        if (seen.has(identifier)) return;
        seen.add(identifier);
        order.push(identifier);
        set.requirements.get(identifier)?.children.forEach(visit);
    };
    set.roots.forEach(visit);
    for (const identifier of set.requirements.keys()) visit(identifier);
    return order;
}

// Number of remembered ancestors, used to close children before their parents
function depth(identifier: string, state: SyncStateMap): number {
    let count = 0;
    const seen = new Set([identifier]);
    let parent = state.get(identifier)?.parent;
    while (parent && !seen.has(parent) && state.has(parent)) {
        seen.add(parent);
        count++;
        parent = state.get(parent)?.parent;
    }
    return count;
}

/**
 * Diffs the rendered requirements against the remembered sync state. Pure: the
 * returned operations are applied by the caller, which then commits the state.
 */
export function reconcile(set: RequirementSet, rendered: Map<string, RenderedIssue>, state: SyncStateMap): ReconcileResult {
    const operations: SyncOperation[] = [];
    const draft: SyncStateMap = new Map(state);

    for (const identifier of hierarchyOrder(set)) {
        const requirement = set.requirements.get(identifier);
        const issue = rendered.get(identifier);
        if (!requirement || !issue) {
            throw new Error(`Requirement ${identifier} was not rendered`);
        }

        const prior = state.get(identifier);
        const hash = contentHash(issue);
        const next: SyncStateEntry = {
            contentHash: hash,
            issue: prior?.issue,
            projectFields: issue.fields,
            parent: requirement.parent,
            revision: requirement.revision,
            closed: false,
        };
        draft.set(identifier, next);

        if (!prior || !prior.issue) {
            operations.push({ type: 'create', identifier, ...issue, parent: requirement.parent, next });
        } else if (prior.closed || prior.contentHash !== hash || prior.parent !== requirement.parent) {
            operations.push({
                type: 'update',
                identifier,
                issue: prior.issue,
                ...issue,
                previousFields: prior.projectFields,
                parent: requirement.parent,
                previousParent: prior.parent,
                reopen: prior.closed,
                next,
            });
        } else {
            operations.push({ type: 'noop', identifier, next });
        }
    }

    const closes: CloseOperation[] = [];
    for (const [identifier, entry] of state) {
        if (set.requirements.has(identifier) || entry.closed) continue;
        const next: SyncStateEntry = { ...entry, closed: true };
        draft.set(identifier, next);
        if (entry.issue) {
            closes.push({ type: 'close', identifier, issue: entry.issue, next });
        }
    }
    // Array.prototype.sort is stable, so equal depths keep state order
    closes.sort((a, b) => depth(b.identifier, state) - depth(a.identifier, state));
    operations.push(...closes);

    return { operations, draft };
}
