import * as exec from '@actions/exec';
import { z } from 'zod';
import { IssueFieldsError, TrackerError, errorMessage } from './errors';
import { ExistingIssue, IssueRef } from './types';

/** What the sync needs from an issue tracker. Every call rejects on failure. */
export interface TrackerClient {
    listFields(): Promise<string[]>;
    findIssues(): Promise<Map<string, ExistingIssue>>;
    createIssue(title: string, body: string, fields: Record<string, string>): Promise<IssueRef>;
    updateIssue(issue: IssueRef, title: string, body: string, fields: Record<string, string>): Promise<void>;
    closeIssue(issue: IssueRef): Promise<void>;
    reopenIssue(issue: IssueRef): Promise<void>;
    setProjectFields(issue: IssueRef, fields: Record<string, string>): Promise<void>;
    linkSubIssue(parent: IssueRef, child: IssueRef): Promise<void>;
    unlinkSubIssue(parent: IssueRef, child: IssueRef): Promise<void>;
}

export interface GhTrackerOptions {
    repository: string; // owner/repo
    token: string;
    labels: string[];
    project?: { owner: string; number: number };
}

const projectFieldSchema = z.object({
    id: z.string(),
    name: z.string(),
    type: z.string(),
    options: z.array(z.object({ id: z.string(), name: z.string() })).optional(),
});

const fieldListSchema = z.object({ fields: z.array(projectFieldSchema) });
const idSchema = z.object({ id: z.string() });
const issueListSchema = z.array(z.object({
    number: z.number(),
    title: z.string(),
    url: z.string(),
    state: z.string().optional(),
    body: z.string().optional(),
}));

type ProjectField = z.infer<typeof projectFieldSchema>;

const ISSUE_URL = /\/issues\/(\d+)\s*$/;
const TITLE_IDENTIFIER = /^\s*([^:\s][^:]*?):\s/;
const BODY_IDENTIFIER = /^\*\*Requirement ID:\*\*[ \t]*(\S[^\r\n]*?)[ \t]*$/m;
const CLOSE_COMMENT = 'Requirement no longer present in the ReqIF source.';

function parseJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, output: string, what: string): T {
    let data: unknown;
    try {
        data = JSON.parse(output);
    } catch (error) {
        throw new TrackerError(`Unexpected ${what} output: ${errorMessage(error)}`);
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        throw new TrackerError(`Unexpected ${what} output: ${parsed.error.issues[0].message}`);
    }
    return parsed.data;
}

/** Requirement identifier at the start of an issue title ("REQ-1: Title" or just "REQ-1"). */
export function identifierFromTitle(title: string): string {
    const match = title.match(TITLE_IDENTIFIER);
    return match ? match[1].trim() : title.trim();
}

/** The `**Requirement ID:**` line every synced issue body starts with. */
export function identifierFromBody(body: string): string | undefined {
    return body.match(BODY_IDENTIFIER)?.[1];
}

/**
 * Tracker client for GitHub, driving the gh CLI. Custom fields live on a
 * GitHub project (v2); without one configured there are no tracker fields.
 */
export class GhTrackerClient implements TrackerClient {
    private readonly options: GhTrackerOptions;
    private projectFields?: ProjectField[];
    private projectId?: string;

    constructor(options: GhTrackerOptions) {
        this.options = options;
    }

    private async gh(args: string[]): Promise<string> {
        let output = '';
        let errorOutput = '';
        const env: Record<string, string> = {};
        for (const [key, value] of Object.entries(process.env)) {
            if (value !== undefined) env[key] = value;
        }
        env['GH_TOKEN'] = this.options.token;

        const options: exec.ExecOptions = {
            listeners: {
                stdout: (data: Buffer) => {
                    output += data.toString();
                },
                stderr: (data: Buffer) => {
                    errorOutput += data.toString();
                }
            },
            silent: true,
            ignoreReturnCode: true,
            env,
        };

        const exitCode = await exec.exec('gh', args, options);
        if (exitCode !== 0) {
            throw new TrackerError(`gh ${args.slice(0, 2).join(' ')} failed with exit code ${exitCode}: ${errorOutput.trim()}`);
        }
        return output;
    }

    private issueRef(url: string): IssueRef {
        const match = url.trim().match(ISSUE_URL);
        if (!match) {
            throw new TrackerError(`Could not read the issue number from '${url.trim()}'`);
        }
        return { number: parseInt(match[1], 10), url: url.trim() };
    }

    private async loadProjectFields(): Promise<ProjectField[]> {
        const project = this.options.project;
        if (!project) return [];
        if (!this.projectFields) {
            const output = await this.gh([
                'project', 'field-list', String(project.number),
                '--owner', project.owner, '--format', 'json', '--limit', '100',
            ]);
            this.projectFields = parseJson(fieldListSchema, output, 'project field-list').fields;
        }
        return this.projectFields;
    }

    private async loadProjectId(owner: string, number: number): Promise<string> {
        if (!this.projectId) {
            const output = await this.gh(['project', 'view', String(number), '--owner', owner, '--format', 'json']);
            this.projectId = parseJson(idSchema, output, 'project view').id;
        }
        return this.projectId;
    }

    public async listFields(): Promise<string[]> {
        return (await this.loadProjectFields()).map(field => field.name);
    }

    public async findIssues(): Promise<Map<string, ExistingIssue>> {
        const args = [
            'issue', 'list', '--repo', this.options.repository, '--state', 'all', '--limit', '1000', '--json', 'number,title,url,state,body',
        ];
        for (const label of this.options.labels) {
            args.push('--label', label);
        }
        const issues = parseJson(issueListSchema, await this.gh(args), 'issue list');

        const found = new Map<string, ExistingIssue>();
        for (const issue of issues) {
            const identifier = identifierFromBody(issue.body ?? '') ?? identifierFromTitle(issue.title);
            // Oldest issue wins when a requirement was imported twice
            const current = found.get(identifier);
            if (!current || issue.number < current.issue.number) {
                found.set(identifier, { issue: { number: issue.number, url: issue.url }, closed: issue.state === 'CLOSED' });
            }
        }
        return found;
    }

    public async createIssue(title: string, body: string, fields: Record<string, string>): Promise<IssueRef> {
        const args = ['issue', 'create', '--repo', this.options.repository, '--title', title, '--body', body];
        for (const label of this.options.labels) {
            args.push('--label', label);
        }
        const issue = this.issueRef(await this.gh(args));
        try {
            await this.setProjectFields(issue, fields);
        } catch (error) {
            throw new IssueFieldsError(`Issue #${issue.number} created, but setting its fields failed: ${errorMessage(error)}`, issue);
        }
        return issue;
    }

    public async updateIssue(issue: IssueRef, title: string, body: string, fields: Record<string, string>): Promise<void> {
        await this.gh(['issue', 'edit', String(issue.number), '--repo', this.options.repository, '--title', title, '--body', body]);
        await this.setProjectFields(issue, fields);
    }

    public async closeIssue(issue: IssueRef): Promise<void> {
        await this.gh([
            'issue', 'close', String(issue.number), '--repo', this.options.repository,
            '--reason', 'not planned', '--comment', CLOSE_COMMENT,
        ]);
    }

    public async reopenIssue(issue: IssueRef): Promise<void> {
        await this.gh(['issue', 'reopen', String(issue.number), '--repo', this.options.repository]);
    }

    public async setProjectFields(issue: IssueRef, fields: Record<string, string>): Promise<void> {
        const entries = Object.entries(fields);
        if (entries.length === 0) return;

        const project = this.options.project;
        if (!project) {
            throw new TrackerError(`Cannot set fields ${entries.map(([name]) => name).join(', ')}: no project configured`);
        }
        const projectFields = await this.loadProjectFields();
        const projectId = await this.loadProjectId(project.owner, project.number);
        const item = parseJson(idSchema, await this.gh([
            'project', 'item-add', String(project.number), '--owner', project.owner, '--url', issue.url, '--format', 'json',
        ]), 'project item-add');

        for (const [name, value] of entries) {
            const field = projectFields.find(f => f.name === name);
            if (!field) {
                throw new TrackerError(`Project has no field named '${name}'`);
            }
            const args = ['project', 'item-edit', '--id', item.id, '--project-id', projectId, '--field-id', field.id];
            if (field.options) {
                const option = field.options.find(o => o.name === value);
                if (!option) {
                    throw new TrackerError(`Field '${name}' has no option '${value}'`);
                }
                args.push('--single-select-option-id', option.id);
            } else {
                args.push('--text', value);
            }
            await this.gh(args);
        }
    }

    // Sub-issue endpoints take the database id, not the issue number
    private async issueId(issue: IssueRef): Promise<string> {
        return (await this.gh(['api', `repos/${this.options.repository}/issues/${issue.number}`, '--jq', '.id'])).trim();
    }

    public async linkSubIssue(parent: IssueRef, child: IssueRef): Promise<void> {
        const childId = await this.issueId(child);
        await this.gh([
            'api', '--method', 'POST', `repos/${this.options.repository}/issues/${parent.number}/sub_issues`,
            '-F', `sub_issue_id=${childId}`, '-F', 'replace_parent=true',
        ]);
    }

    public async unlinkSubIssue(parent: IssueRef, child: IssueRef): Promise<void> {
        const childId = await this.issueId(child);
        await this.gh([
            'api', '--method', 'DELETE', `repos/${this.options.repository}/issues/${parent.number}/sub_issue`,
            '-F', `sub_issue_id=${childId}`,
        ]);
    }
}
