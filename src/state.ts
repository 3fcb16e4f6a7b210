import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { StateFileError, errorMessage } from './errors';
import { ExistingIssue, SyncStateEntry, SyncStateMap } from './types';

export interface SyncStateStore {
    load(): Promise<SyncStateMap>;
    save(state: SyncStateMap): Promise<void>;
}

const STATE_VERSION = 1;

const issueRefSchema = z.object({
    number: z.number().int().positive(),
    url: z.string(),
});

const syncStateEntrySchema: z.ZodType<SyncStateEntry, z.ZodTypeDef, unknown> = z.object({
    contentHash: z.string(),
    issue: issueRefSchema.optional(),
    projectFields: z.record(z.string()).default({}),
    parent: z.string().optional(),
    revision: z.string().optional(),
    closed: z.boolean().default(false),
});

const stateFileSchema = z.object({
    version: z.literal(STATE_VERSION),
    requirements: z.record(syncStateEntrySchema),
});

/** Sync state kept as a JSON file, usually committed next to the ReqIF export. */
export class FileSyncStateStore implements SyncStateStore {
    private readonly filePath: string;

    constructor(filePath: string) {
        this.filePath = filePath;
    }

    public async load(): Promise<SyncStateMap> {
        if (!fs.existsSync(this.filePath)) {
            return new Map();
        }

        let data: unknown;
        try {
            data = JSON.parse(await fs.promises.readFile(this.filePath, 'utf-8'));
        } catch (error) {
            throw new StateFileError(`Sync state ${this.filePath} is not valid JSON: ${errorMessage(error)}`);
        }

        const parsed = stateFileSchema.safeParse(data);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new StateFileError(`Sync state ${this.filePath} is invalid at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
        }
        return new Map(Object.entries(parsed.data.requirements));
    }

    public async save(state: SyncStateMap): Promise<void> {
        const requirements: Record<string, SyncStateEntry> = {};
        for (const identifier of [...state.keys()].sort()) {
            const entry = state.get(identifier);
            if (entry) requirements[identifier] = entry;
        }
        await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.promises.writeFile(this.filePath, `${JSON.stringify({ version: STATE_VERSION, requirements }, null, 2)}\n`);
    }
}

/** Forgets the listed identifiers, or everything for '*'. */
export function purgeState(state: SyncStateMap, identifiers: readonly string[] | '*'): { state: SyncStateMap; purged: string[] } {
    if (identifiers === '*') {
        return { state: new Map(), purged: [...state.keys()] };
    }
    const next = new Map(state);
    const purged = identifiers.filter(identifier => next.delete(identifier));
    return { state: next, purged };
}

/**
 * Seeds state for requirements that already have an issue on the tracker but no
 * remembered entry, so the engine updates the issue instead of creating a duplicate.
 */
export function adoptExistingIssues(
    state: SyncStateMap,
    existing: ReadonlyMap<string, ExistingIssue>,
    identifiers: Iterable<string>,
): { state: SyncStateMap; adopted: string[] } {
    const next = new Map(state);
    const adopted: string[] = [];
    for (const identifier of identifiers) {
        const found = existing.get(identifier);
        if (!found || next.get(identifier)?.issue) continue;
        // A closed issue is adopted as closed so that the requirement reopens it
        next.set(identifier, { contentHash: '', issue: found.issue, projectFields: {}, closed: found.closed });
        adopted.push(identifier);
    }
    return { state: next, adopted };
}
