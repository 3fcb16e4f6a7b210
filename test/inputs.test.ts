import * as core from '@actions/core';
import { getActionInputs, parseList } from '../src/inputs';

jest.mock('@actions/core');

describe('getActionInputs', () => {
    let inputs: Record<string, string>;
    const originalRepository = process.env['GITHUB_REPOSITORY'];

    beforeEach(() => {
        jest.clearAllMocks();
        delete process.env['GITHUB_REPOSITORY'];
        inputs = {
            'reqif-path': 'requirements',
            'config-path': '.github/reqif-field-map.csv',
            'state-path': '.github/reqif-sync-state.json',
            'dry-run': 'false',
            'github-token': 'test-secret',
            'repository': 'acme/brakes',
            'labels': 'requirement, safety',
            'project-owner': '',
            'project-number': '',
            'purge-state': '',
        };
        (core.getInput as jest.Mock).mockImplementation((name: string) => inputs[name] ?? '');
        (core.getBooleanInput as jest.Mock).mockImplementation((name: string) => inputs[name] === 'true');
    });

    afterAll(() => {
        if (originalRepository !== undefined) process.env['GITHUB_REPOSITORY'] = originalRepository;
    });

    it('should read the inputs and mask the token', () => {
        expect(getActionInputs()).toEqual({
            reqifPath: 'requirements',
            configPath: '.github/reqif-field-map.csv',
            statePath: '.github/reqif-sync-state.json',
            dryRun: false,
            token: 'test-secret',
            repository: 'acme/brakes',
            labels: ['requirement', 'safety'],
            project: undefined,
            purge: undefined,
        });
        expect(core.setSecret).toHaveBeenCalledWith('test-secret');
    });

    it('should default the repository and the project owner from the workflow', () => {
        inputs['repository'] = '';
        inputs['project-number'] = '3';
        process.env['GITHUB_REPOSITORY'] = 'acme/wheels';

        const result = getActionInputs();

        expect(result.repository).toBe('acme/wheels');
        expect(result.project).toEqual({ owner: 'acme', number: 3 });
    });

    it('should read purge lists and the wildcard', () => {
        inputs['purge-state'] = 'REQ-1,\nREQ-2';
        expect(getActionInputs().purge).toEqual(['REQ-1', 'REQ-2']);

        inputs['purge-state'] = ' * ';
        expect(getActionInputs().purge).toBe('*');
    });

    it('should reject a project number that is not a number', () => {
        inputs['project-number'] = 'three';
        expect(() => getActionInputs()).toThrow("project-number must be a positive integer, got 'three'");
    });
});

describe('parseList', () => {
    it('should split on commas and new lines and drop blanks', () => {
        expect(parseList('a, b\n\nc,')).toEqual(['a', 'b', 'c']);
        expect(parseList('')).toEqual([]);
    });
});
