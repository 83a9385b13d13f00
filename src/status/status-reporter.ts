import { emptySyncStatus, type ApplicationStore } from '@/applications/application.store';
import type { ApplicationSpec, SyncStatus } from '@/dtos/application.dto';
import type { PipelineRunRecord } from '@/interfaces/pipeline-run.interface';
import type { PipelineTrigger } from '@/pipeline/pipeline-trigger';

export type PipelineSummary = Pick<PipelineRunRecord, 'runId' | 'outcome' | 'imageTag' | 'digest' | 'message'>;

export type ApplicationStatusReport = {
  application: string;
  spec: ApplicationSpec;
  status: SyncStatus;
  pipeline?: PipelineSummary;
};

/** Read-only projection of an Application's SyncStatus and its latest pipeline run. */
export class StatusReporter {
  constructor(
    private readonly applications: ApplicationStore,
    private readonly pipelines?: PipelineTrigger,
  ) {}

  public async getStatus(name: string): Promise<ApplicationStatusReport> {
    const application = await this.applications.get(name);
    const run = await this.pipelines?.latestFor(name);
    return {
      application: name,
      spec: application.spec,
      status: application.status ?? emptySyncStatus(),
      pipeline: run && {
        runId: run.runId,
        outcome: run.outcome,
        imageTag: run.imageTag,
        digest: run.digest,
        message: run.message,
      },
    };
  }

  public async listStatuses(): Promise<ApplicationStatusReport[]> {
    const applications = await this.applications.list();
    return Promise.all(applications.map((application) => this.getStatus(application.metadata.name)));
  }
}

export const formatStatusReport = ({ application, spec, status, pipeline }: ApplicationStatusReport): string => {
  const lines = [
    `Application:  ${application}`,
    `Source:       ${spec.source.repoURL} ${spec.source.path} @ ${spec.source.targetRevision}`,
    `Destination:  ${spec.destination.namespace}`,
    `Phase:        ${status.phase}`,
    `Health:       ${status.health}`,
    `Sync:         ${status.sync}`,
  ];
  if (status.revision) {
    lines.push(`Revision:     ${status.revision}`);
  }
  if (status.lastSyncedFingerprint) {
    lines.push(`Synced:       ${status.lastSyncedFingerprint.slice(0, 12)}`);
  }
  if (status.lastError) {
    lines.push(`Last error:   ${status.lastError.kind}: ${status.lastError.message}`);
  }
  if (pipeline) {
    const digest = pipeline.digest ? ` ${pipeline.digest}` : '';
    lines.push(`Pipeline:     ${pipeline.runId} ${pipeline.outcome} ${pipeline.imageTag}${digest}`);
  }
  if (status.resources.length > 0) {
    lines.push('Resources:');
    for (const resource of status.resources) {
      const target = resource.namespace ? `${resource.namespace}/${resource.name}` : resource.name;
      lines.push(`  ${resource.kind} ${target}: ${resource.outcome}, ${resource.health}`);
    }
  }
  return lines.join('\n');
};
