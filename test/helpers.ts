import * as path from 'path';
import * as yazl from 'yazl';
import { SyncStateStore } from '../src/state';
import { TrackerClient } from '../src/tracker';
import { AttributeValue, ExistingIssue, IssueRef, Requirement, RequirementSet, SyncStateMap } from '../src/types';

export const FIXTURES = path.join(__dirname, 'fixtures');

export function fixture(name: string): string {
    return path.join(FIXTURES, name);
}

export function zipBuffer(entries: Record<string, string>): Promise<Buffer> {
    const zipfile = new yazl.ZipFile();
    for (const [name, content] of Object.entries(entries)) {
        zipfile.addBuffer(Buffer.from(content), name);
    }
    zipfile.end();
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        zipfile.outputStream.on('data', (chunk: Buffer) => chunks.push(chunk));
        zipfile.outputStream.on('error', reject);
        zipfile.outputStream.on('end', () => resolve(Buffer.concat(chunks)));
    });
}

export function requirement(identifier: string, overrides: Partial<Requirement> = {}): Requirement {
    return {
        identifier,
        objectIdentifiers: [`so-${identifier}`],
        title: `${identifier} title`,
        description: '',
        attributes: new Map<string, AttributeValue>(),
        derivedFrom: {},
        children: [],
        related: [],
        ...overrides,
    };
}

/** Builds a set from requirements whose `parent` is already filled in. */
export function requirementSet(requirements: Requirement[], attributeNames: string[] = []): RequirementSet {
    const map = new Map(requirements.map(r => [r.identifier, r]));
    for (const r of requirements) {
        if (r.parent) map.get(r.parent)?.children.push(r.identifier);
    }
    return {
        requirements: map,
        roots: requirements.filter(r => !r.parent).map(r => r.identifier),
        attributeNames,
    };
}

export class MemoryStateStore implements SyncStateStore {
    public state: SyncStateMap;
    public saves = 0;

    constructor(state: SyncStateMap = new Map()) {
        this.state = state;
    }

    public async load(): Promise<SyncStateMap> {
        return new Map(this.state);
    }

    public async save(state: SyncStateMap): Promise<void> {
        this.state = new Map(state);
        this.saves++;
    }
}

export type TrackerCall =
    | { method: 'createIssue'; title: string; fields: Record<string, string> }
    | { method: 'updateIssue'; issue: number; title: string; fields: Record<string, string> }
    | { method: 'closeIssue'; issue: number }
    | { method: 'reopenIssue'; issue: number }
    | { method: 'setProjectFields'; issue: number; fields: Record<string, string> }
    | { method: 'linkSubIssue'; parent: number; child: number }
    | { method: 'unlinkSubIssue'; parent: number; child: number };

/** In-process tracker: numbers issues from 1 and records every write. */
export class FakeTracker implements TrackerClient {
    public readonly calls: TrackerCall[] = [];
    public readonly bodies = new Map<number, string>();
    public fields: string[] = [];
    public existing = new Map<string, ExistingIssue>();
    public failOn = new Set<string>(); // issue titles, '#<number>' for calls on an existing issue, '[un]link #<child>'
    private nextNumber = 1;

    private check(key: string): void {
        if (this.failOn.has(key)) throw new Error(`tracker rejected ${key}`);
    }

    public async listFields(): Promise<string[]> {
        return this.fields;
    }

    public async findIssues(): Promise<Map<string, ExistingIssue>> {
        return new Map(this.existing);
    }

    public async createIssue(title: string, body: string, fields: Record<string, string>): Promise<IssueRef> {
        this.check(title);
        const issue = { number: this.nextNumber++, url: `https://example.test/issues/${this.nextNumber - 1}` };
        this.calls.push({ method: 'createIssue', title, fields });
        this.bodies.set(issue.number, body);
        return issue;
    }

    public async updateIssue(issue: IssueRef, title: string, body: string, fields: Record<string, string>): Promise<void> {
        this.check(`#${issue.number}`);
        this.calls.push({ method: 'updateIssue', issue: issue.number, title, fields });
        this.bodies.set(issue.number, body);
    }

    public async closeIssue(issue: IssueRef): Promise<void> {
        this.check(`#${issue.number}`);
        this.calls.push({ method: 'closeIssue', issue: issue.number });
    }

    public async reopenIssue(issue: IssueRef): Promise<void> {
        this.check(`#${issue.number}`);
        this.calls.push({ method: 'reopenIssue', issue: issue.number });
    }

    public async setProjectFields(issue: IssueRef, fields: Record<string, string>): Promise<void> {
        this.calls.push({ method: 'setProjectFields', issue: issue.number, fields });
    }

    public async linkSubIssue(parent: IssueRef, child: IssueRef): Promise<void> {
        this.check(`link #${child.number}`);
        this.calls.push({ method: 'linkSubIssue', parent: parent.number, child: child.number });
    }

    public async unlinkSubIssue(parent: IssueRef, child: IssueRef): Promise<void> {
        this.check(`unlink #${child.number}`);
        this.calls.push({ method: 'unlinkSubIssue', parent: parent.number, child: child.number });
    }
}
