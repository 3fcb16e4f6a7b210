import * as core from '@actions/core';
import * as io from '@actions/io';
import { errorMessage } from './errors';
import { getActionInputs } from './inputs';
import { runSync } from './pipeline';
import { FileSyncStateStore } from './state';
import { countResults, setOutputs, writeJobSummary } from './summary';
import { GhTrackerClient, TrackerClient } from './tracker';
import { formatWarning } from './warnings';

export async function run(): Promise<void> {
  try {
    const inputs = getActionInputs();
    const mode = inputs.dryRun ? 'dry-run' : 'live';

    let tracker: TrackerClient | undefined;
    if (inputs.repository && inputs.token) {
      // A dry run can do without gh; a live run cannot
      const gh = await io.which('gh', mode === 'live');
      if (gh) {
        tracker = new GhTrackerClient({
          repository: inputs.repository,
          token: inputs.token,
          labels: inputs.labels,
          project: inputs.project,
        });
      } else {
        core.info('gh not found, planning without the tracker.');
      }
    }

    core.info(`Syncing ${inputs.reqifPath} to ${inputs.repository || '(no repository)'} in ${mode} mode`);
    const report = await runSync(
      { reqifPath: inputs.reqifPath, configPath: inputs.configPath, mode, purge: inputs.purge },
      { store: new FileSyncStateStore(inputs.statePath), tracker },
    );

    report.warnings.forEach(w => core.warning(formatWarning(w)));

    const counts = countResults(report);
    setOutputs(report, counts);
    await writeJobSummary(report, counts);

    core.info(`Created ${counts.created}, updated ${counts.updated}, closed ${counts.closed}, unchanged ${counts.unchanged}.`);
    if (counts.failed > 0) {
      core.setFailed(`${counts.failed} tracker operation(s) failed. See the errors above.`);
    }
  } catch (error) {
    core.setFailed(errorMessage(error));
  }
}

void run();
