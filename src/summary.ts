import * as core from '@actions/core';
import { SyncReport } from './pipeline';
import { formatWarning } from './warnings';

export interface SyncCounts {
    created: number;
    updated: number;
    closed: number;
    unchanged: number;
    failed: number;
}

/**
 * Counts applied outcomes, or the planned operations when nothing was written.
 * A failed operation only counts as failed.
 */
export function countResults(report: SyncReport): SyncCounts {
    const counts: SyncCounts = { created: 0, updated: 0, closed: 0, unchanged: 0, failed: 0 };
    const tally = (type: string) => {
        if (type === 'create') counts.created++;
        else if (type === 'update') counts.updated++;
        else if (type === 'close') counts.closed++;
        else counts.unchanged++;
    };

    if (!report.applied) {
        report.operations.forEach(operation => tally(operation.type));
        return counts;
    }
    for (const outcome of report.outcomes) {
        if (outcome.status === 'failed') counts.failed++;
        else tally(outcome.type);
    }
    return counts;
}

export function setOutputs(report: SyncReport, counts: SyncCounts): void {
    core.setOutput('created', counts.created);
    core.setOutput('updated', counts.updated);
    core.setOutput('closed', counts.closed);
    core.setOutput('unchanged', counts.unchanged);
    core.setOutput('failed', counts.failed);
    core.setOutput('warnings', report.warnings.length);
}

export async function writeJobSummary(report: SyncReport, counts: SyncCounts): Promise<void> {
    // core.summary needs the step summary file the runner provides
    if (!process.env['GITHUB_STEP_SUMMARY']) return;

    const heading = report.applied ? 'ReqIF sync' : 'ReqIF sync (dry run, nothing written)';
    const summary = core.summary
        .addHeading(heading)
        .addRaw(`${report.requirementCount} requirements read.`, true)
        .addTable([
            [{ data: 'Result', header: true }, { data: 'Count', header: true }],
            ['Created', String(counts.created)],
            ['Updated', String(counts.updated)],
            ['Closed', String(counts.closed)],
            ['Unchanged', String(counts.unchanged)],
            ['Failed', String(counts.failed)],
        ]);

    if (report.fieldMapGenerated) {
        summary.addRaw('A field map was generated on this run. Review it before the first live sync.', true);
    }

    const failures = report.outcomes.filter(outcome => outcome.status === 'failed');
    if (failures.length > 0) {
        summary.addHeading('Failures', 3).addList(failures.map(f => `${f.type} ${f.identifier}: ${f.error ?? 'unknown error'}`));
    }
    if (report.warnings.length > 0) {
        summary.addHeading('Warnings', 3).addList(report.warnings.map(formatWarning));
    }

    await summary.write();
}
