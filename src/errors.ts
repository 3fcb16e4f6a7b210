import { IssueRef } from './types';

export class SyncError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

// Input that cannot be read at all, or holds no REQ-IF document. Aborts the run.
export class ReqifFatalError extends SyncError {}

// Persisted sync state that exists but cannot be understood.
export class StateFileError extends SyncError {}

// A tracker call that did not succeed; the applier records it per requirement.
export class TrackerError extends SyncError {}

// The issue exists but its project fields could not be set.
export class IssueFieldsError extends TrackerError {
    public readonly issue: IssueRef;

    constructor(message: string, issue: IssueRef) {
        super(message);
        this.issue = issue;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
