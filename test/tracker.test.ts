import * as exec from '@actions/exec';
import { IssueFieldsError, TrackerError } from '../src/errors';
import { GhTrackerClient, identifierFromBody, identifierFromTitle } from '../src/tracker';

jest.mock('@actions/exec');

interface GhResponse {
    stdout?: string;
    stderr?: string;
    code?: number;
}

const FIELD_LIST = JSON.stringify({
    fields: [
        { id: 'F1', name: 'Priority', type: 'ProjectV2SingleSelectField', options: [{ id: 'O1', name: 'High' }] },
        { id: 'F2', name: 'Team', type: 'ProjectV2Field' },
    ],
});

describe('GhTrackerClient', () => {
    const mockExec = exec.exec as jest.Mock;
    let calls: string[][];

    function respond(handler: (args: string[]) => GhResponse) {
        mockExec.mockImplementation((cmd: string, args: string[], options: exec.ExecOptions) => {
            calls.push(args);
            const response = handler(args);
            if (response.stdout) options.listeners?.stdout?.(Buffer.from(response.stdout));
            if (response.stderr) options.listeners?.stderr?.(Buffer.from(response.stderr));
            return Promise.resolve(response.code ?? 0);
        });
    }

    // Answers the project lookups the way gh prints them
    function projectResponses(args: string[]): GhResponse {
        if (args[1] === 'field-list') return { stdout: FIELD_LIST };
        if (args[1] === 'view') return { stdout: '{"id":"P1","title":"Board"}' };
        if (args[1] === 'item-add') return { stdout: '{"id":"I1"}' };
        return {};
    }

    const withProject = () => new GhTrackerClient({
        repository: 'acme/brakes',
        token: 'test-secret',
        labels: ['requirement'],
        project: { owner: 'acme', number: 3 },
    });

    beforeEach(() => {
        jest.clearAllMocks();
        calls = [];
    });

    it('should create an issue and read its number from the URL', async () => {
        respond(() => ({ stdout: 'https://github.com/acme/brakes/issues/42\n' }));
        const client = new GhTrackerClient({ repository: 'acme/brakes', token: 'test-secret', labels: ['requirement'] });

        const issue = await client.createIssue('REQ-1: Brakes', 'Body', {});

        expect(issue).toEqual({ number: 42, url: 'https://github.com/acme/brakes/issues/42' });
        expect(mockExec).toHaveBeenCalledTimes(1);
        expect(mockExec).toHaveBeenCalledWith(
            'gh',
            ['issue', 'create', '--repo', 'acme/brakes', '--title', 'REQ-1: Brakes', '--body', 'Body', '--label', 'requirement'],
            expect.objectContaining({ silent: true, ignoreReturnCode: true, env: expect.objectContaining({ GH_TOKEN: 'test-secret' }) }),
        );
    });

    it('should turn a failing gh call into a TrackerError', async () => {
        respond(() => ({ stderr: 'HTTP 401: Bad credentials\n', code: 1 }));
        const client = new GhTrackerClient({ repository: 'acme/brakes', token: 'test-secret', labels: [] });

        const result = client.closeIssue({ number: 1, url: 'u1' });

        await expect(result).rejects.toBeInstanceOf(TrackerError);
        await expect(result).rejects.toThrow('gh issue close failed with exit code 1: HTTP 401: Bad credentials');
    });

    it('should close with a comment', async () => {
        respond(() => ({}));
        const client = new GhTrackerClient({ repository: 'acme/brakes', token: 'test-secret', labels: [] });

        await client.closeIssue({ number: 8, url: 'u8' });

        expect(calls).toEqual([[
            'issue', 'close', '8', '--repo', 'acme/brakes',
            '--reason', 'not planned', '--comment', 'Requirement no longer present in the ReqIF source.',
        ]]);
    });

    it('should find existing issues by the identifier in their title, oldest first', async () => {
        respond(() => ({
            stdout: JSON.stringify([
                { number: 3, title: 'REQ-1: Brakes', url: 'u3', state: 'OPEN' },
                { number: 2, title: 'REQ-1: Brakes (copy)', url: 'u2', state: 'CLOSED' },
                { number: 5, title: 'REQ-2', url: 'u5', state: 'OPEN' },
            ]),
        }));
        const client = new GhTrackerClient({ repository: 'acme/brakes', token: 'test-secret', labels: ['requirement'] });

        const found = await client.findIssues();

        expect(found).toEqual(new Map([
            ['REQ-1', { issue: { number: 2, url: 'u2' }, closed: true }],
            ['REQ-2', { issue: { number: 5, url: 'u5' }, closed: false }],
        ]));
        expect(calls[0]).toEqual([
            'issue', 'list', '--repo', 'acme/brakes', '--state', 'all', '--limit', '1000', '--json', 'number,title,url,state,body',
            '--label', 'requirement',
        ]);
    });

    it('should prefer the identifier line in the issue body over the title', async () => {
        respond(() => ({
            stdout: JSON.stringify([
                { number: 7, title: 'Brake pad wear', url: 'u7', state: 'OPEN', body: '**Requirement ID:** REQ-1.1\n\nPads wear out.' },
            ]),
        }));
        const client = new GhTrackerClient({ repository: 'acme/brakes', token: 'test-secret', labels: [] });

        expect(await client.findIssues()).toEqual(new Map([['REQ-1.1', { issue: { number: 7, url: 'u7' }, closed: false }]]));
    });

    it('should reject output it does not understand', async () => {
        respond(() => ({ stdout: '[{"number":"one"}]' }));
        const client = new GhTrackerClient({ repository: 'acme/brakes', token: 'test-secret', labels: [] });

        await expect(client.findIssues()).rejects.toBeInstanceOf(TrackerError);
    });

    it('should list no fields without a project', async () => {
        const client = new GhTrackerClient({ repository: 'acme/brakes', token: 'test-secret', labels: [] });

        expect(await client.listFields()).toEqual([]);
        expect(mockExec).not.toHaveBeenCalled();
    });

    it('should list project field names once', async () => {
        respond(projectResponses);
        const client = withProject();

        expect(await client.listFields()).toEqual(['Priority', 'Team']);
        expect(await client.listFields()).toEqual(['Priority', 'Team']);
        expect(calls).toHaveLength(1);
    });

    it('should set single select and text fields on the project item', async () => {
        respond(projectResponses);

        await withProject().setProjectFields({ number: 4, url: 'https://github.com/acme/brakes/issues/4' }, { Priority: 'High', Team: 'Brakes' });

        expect(calls).toEqual([
            ['project', 'field-list', '3', '--owner', 'acme', '--format', 'json', '--limit', '100'],
            ['project', 'view', '3', '--owner', 'acme', '--format', 'json'],
            ['project', 'item-add', '3', '--owner', 'acme', '--url', 'https://github.com/acme/brakes/issues/4', '--format', 'json'],
            ['project', 'item-edit', '--id', 'I1', '--project-id', 'P1', '--field-id', 'F1', '--single-select-option-id', 'O1'],
            ['project', 'item-edit', '--id', 'I1', '--project-id', 'P1', '--field-id', 'F2', '--text', 'Brakes'],
        ]);
    });

    it('should reject an option the single select field does not have', async () => {
        respond(projectResponses);

        await expect(withProject().setProjectFields({ number: 4, url: 'u4' }, { Priority: 'Low' }))
            .rejects.toThrow("Field 'Priority' has no option 'Low'");
    });

    it('should reject fields when no project is configured', async () => {
        const client = new GhTrackerClient({ repository: 'acme/brakes', token: 'test-secret', labels: [] });

        await expect(client.setProjectFields({ number: 4, url: 'u4' }, { Priority: 'High' }))
            .rejects.toThrow('Cannot set fields Priority: no project configured');
    });

    it('should keep the issue reference when its fields cannot be set after creation', async () => {
        respond(args => (args[0] === 'issue' ? { stdout: 'https://github.com/acme/brakes/issues/9\n' } : projectResponses(args)));

        const result = withProject().createIssue('REQ-1: Brakes', 'Body', { Missing: 'x' });

        await expect(result).rejects.toBeInstanceOf(IssueFieldsError);
        await expect(result).rejects.toMatchObject({ issue: { number: 9, url: 'https://github.com/acme/brakes/issues/9' } });
    });

    it('should link a sub-issue by its database id', async () => {
        respond(args => (args[0] === 'api' && args[1] !== '--method' ? { stdout: '123456\n' } : {}));
        const client = new GhTrackerClient({ repository: 'acme/brakes', token: 'test-secret', labels: [] });

        await client.linkSubIssue({ number: 1, url: 'u1' }, { number: 2, url: 'u2' });

        expect(calls).toEqual([
            ['api', 'repos/acme/brakes/issues/2', '--jq', '.id'],
            ['api', '--method', 'POST', 'repos/acme/brakes/issues/1/sub_issues', '-F', 'sub_issue_id=123456', '-F', 'replace_parent=true'],
        ]);
    });

    it('should remove a sub-issue from its parent', async () => {
        respond(args => (args[0] === 'api' && args[1] !== '--method' ? { stdout: '654321\n' } : {}));
        const client = new GhTrackerClient({ repository: 'acme/brakes', token: 'test-secret', labels: [] });

        await client.unlinkSubIssue({ number: 1, url: 'u1' }, { number: 2, url: 'u2' });

        expect(calls[1]).toEqual(['api', '--method', 'DELETE', 'repos/acme/brakes/issues/1/sub_issue', '-F', 'sub_issue_id=654321']);
    });
});

describe('identifierFromBody', () => {
    it('should read the identifier line of a synced issue', () => {
        expect(identifierFromBody('**Requirement ID:** REQ-4 \n\nText')).toBe('REQ-4');
        expect(identifierFromBody('Intro\n**Requirement ID:** SW-7')).toBe('SW-7');
    });

    it('should find nothing in a body without the identifier line', () => {
        expect(identifierFromBody('Requirement REQ-4')).toBeUndefined();
    });
});

describe('identifierFromTitle', () => {
    it('should take the text before the first colon', () => {
        expect(identifierFromTitle('REQ-1.2: Pad wear: front')).toBe('REQ-1.2');
    });

    it('should use the whole title when there is no identifier prefix', () => {
        expect(identifierFromTitle(' REQ-3 ')).toBe('REQ-3');
        expect(identifierFromTitle('Time 10:30 meeting')).toBe('Time 10:30 meeting');
    });
});
