import type { ResourceResult } from '@/dtos/application.dto';
import { HealthStatus, SyncState } from '@/enums/health-status.enum';
import { ObjectOutcome } from '@/enums/object-action.enum';
import type { StatusUpdate } from '@/interfaces/resource-update.interface';
import { logger } from '@/logger';
import type { KnownBlock, RichTextBlockElement, RichTextElement, RichTextSection, WebClient } from '@slack/web-api';

const MAX_ALT_TEXT_LENGTH = 4000;

const STATUS_EMOJI: Partial<Record<`${HealthStatus | SyncState}`, string>> = {
  [HealthStatus.Healthy]: 'white_check_mark',
  [HealthStatus.Progressing]: 'hourglass_flowing_sand',
  [HealthStatus.Degraded]: 'x',
  [SyncState.Synced]: 'white_check_mark',
  [SyncState.OutOfSync]: 'warning',
};

const OUTCOME_EMOJI: Record<ObjectOutcome, string> = {
  [ObjectOutcome.Created]: 'sparkles',
  [ObjectOutcome.Updated]: 'arrows_counterclockwise',
  [ObjectOutcome.Unchanged]: 'heavy_minus_sign',
  [ObjectOutcome.Pruned]: 'wastebasket',
  [ObjectOutcome.PruneSkipped]: 'no_entry_sign',
  [ObjectOutcome.Failed]: 'x',
  [ObjectOutcome.Skipped]: 'fast_forward',
};

const SPACE: RichTextElement = { type: 'text', text: ' ' };

const resourceName = ({ kind, namespace, name }: ResourceResult): string =>
  `${kind} ${namespace ? `${namespace}/` : ''}${name}`;

/** Resources the pass touched; objects it left as they were are not listed. */
const touched = (update: StatusUpdate): ResourceResult[] =>
  (update.resources ?? []).filter((resource) => resource.outcome !== ObjectOutcome.Unchanged);

type Delivery = { name: string; targetNamespace: string; update: StatusUpdate; changes: string };

/** Posts one rich-text message per rollout and edits it while the rollout is in progress. */
export class SlackNotifier {
  constructor(
    private readonly slackClient: WebClient | undefined,
    private readonly channelId: string,
  ) {}

  public async createMessage(
    name: string,
    targetNamespace: string,
    update: StatusUpdate,
    changes: string,
  ): Promise<{ ts: string | undefined } | undefined> {
    return this.deliver({ name, targetNamespace, update, changes });
  }

  public async updateMessage(
    name: string,
    targetNamespace: string,
    update: StatusUpdate,
    changes: string,
    ts: string,
  ): Promise<{ ts: string | undefined } | undefined> {
    return this.deliver({ name, targetNamespace, update, changes }, ts);
  }

  private async deliver(delivery: Delivery, ts?: string): Promise<{ ts: string | undefined } | undefined> {
    const text = this.altText(delivery);
    const blocks = this.blocks(delivery);
    try {
      if (!this.slackClient) {
        logger.verbose(`"blocks": ${JSON.stringify(blocks)}`);
        return { ts };
      }
      const res = ts
        ? await this.slackClient.chat.update({ text, blocks, channel: this.channelId, ts })
        : await this.slackClient.chat.postMessage({ text, blocks, unfurl_links: false, channel: this.channelId });
      logger.info(`Slack notification ${ts ? 'updated' : 'sent'} for ${delivery.name}`);
      logger.verbose(text);
      return { ts: res.ts };
    } catch (error) {
      logger.error(`Failed to ${ts ? 'update' : 'send'} Slack notification:`, error);
    }
  }

  private blocks({ name, targetNamespace, update, changes }: Delivery): KnownBlock[] {
    const resources = touched(update);
    const elements: RichTextBlockElement[] = [this.headline(name, targetNamespace, update)];
    if (resources.length > 0) {
      elements.push({
        type: 'rich_text_list',
        style: 'bullet',
        elements: resources.map((resource) => this.resourceLine(resource)),
      });
    }
    if (changes) {
      elements.push({ type: 'rich_text_preformatted', elements: [{ type: 'text', text: changes }] });
    }
    return [{ type: 'rich_text', elements }];
  }

  private headline(name: string, targetNamespace: string, update: StatusUpdate): RichTextSection {
    const elements: RichTextElement[] = [
      { type: 'emoji', name: STATUS_EMOJI[update.health] ?? 'question' },
      SPACE,
      { type: 'emoji', name: STATUS_EMOJI[update.sync] ?? 'question' },
      SPACE,
    ];
    if (process.env.NODE_ENV !== 'production') {
      elements.push({ type: 'text', text: '(DEV)' }, SPACE);
    }
    elements.push({ type: 'text', text: `${name} / ${targetNamespace}`, style: { bold: true } });
    if (update.revision) {
      elements.push({ type: 'text', text: ` @ ${update.revision.slice(0, 12)}`, style: { code: true } });
    }
    if (update.lastError) {
      elements.push({
        type: 'text',
        text: `\n${update.lastError.kind}: ${update.lastError.message}`,
        style: { italic: true },
      });
    }
    return { type: 'rich_text_section', elements };
  }

  private resourceLine(resource: ResourceResult): RichTextSection {
    const elements: RichTextElement[] = [
      { type: 'emoji', name: OUTCOME_EMOJI[resource.outcome] },
      SPACE,
      { type: 'text', text: resourceName(resource), style: { code: true } },
      { type: 'text', text: ` ${resource.outcome}` },
    ];
    if (resource.message) {
      elements.push({ type: 'text', text: `: ${resource.message}`, style: { italic: true } });
    }
    return { type: 'rich_text_section', elements };
  }

  private altText({ name, targetNamespace, update, changes }: Delivery): string {
    const environment = process.env.NODE_ENV === 'production' ? '' : ' (DEV)';
    const lines = [
      `Application Updated: ${name}${environment} / ${targetNamespace}`,
      `Status: health ${update.health} / sync ${update.sync}`,
    ];
    if (update.lastError) {
      lines.push(`Last error: ${update.lastError.kind}: ${update.lastError.message}`);
    }
    for (const resource of touched(update)) {
      lines.push(`- ${resourceName(resource)}: ${resource.outcome}${resource.message ? ` (${resource.message})` : ''}`);
    }
    if (changes) {
      lines.push(`*Changes:* ${changes}`);
    }
    return lines.join('\n').slice(0, MAX_ALT_TEXT_LENGTH);
  }
}
