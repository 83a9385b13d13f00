import { HealthStatus, SyncState } from '@/enums/health-status.enum';
import { ObjectOutcome } from '@/enums/object-action.enum';
import { logger } from '@/logger';
import { SlackNotifier } from '@/utils/slack-notifier.utils';
import { WebClient } from '@slack/web-api';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

// Mock dependencies
vi.mock('@/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    verbose: vi.fn(),
    dir: vi.fn(),
  },
}));

const SPACE = { type: 'text', text: ' ' };

describe('SlackNotifier', () => {
  let client: WebClient;
  let slackNotifier: SlackNotifier;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubEnv('NODE_ENV', 'development');
    client = new WebClient('test-token');
    slackNotifier = new SlackNotifier(client, 'test-channel');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('createMessage', () => {
    it('should post the status, revision and changes', async () => {
      const postMessage = vi.spyOn(client.chat, 'postMessage').mockResolvedValue({ ok: true, ts: 'ts-1' });

      const result = await slackNotifier.createMessage(
        'demo',
        'demo',
        { health: HealthStatus.Healthy, sync: SyncState.Synced, revision: '0123456789abcdef' },
        "+ Deployment 'demo/demo-app'",
      );

      expect(result).toEqual({ ts: 'ts-1' });
      expect(postMessage).toHaveBeenCalledWith({
        text: "Application Updated: demo (DEV) / demo\nStatus: health Healthy / sync Synced\n*Changes:* + Deployment 'demo/demo-app'",
        unfurl_links: false,
        channel: 'test-channel',
        blocks: [
          {
            type: 'rich_text',
            elements: [
              {
                type: 'rich_text_section',
                elements: [
                  { type: 'emoji', name: 'white_check_mark' },
                  SPACE,
                  { type: 'emoji', name: 'white_check_mark' },
                  SPACE,
                  { type: 'text', text: '(DEV)' },
                  SPACE,
                  { type: 'text', text: 'demo / demo', style: { bold: true } },
                  { type: 'text', text: ' @ 0123456789ab', style: { code: true } },
                ],
              },
              {
                type: 'rich_text_preformatted',
                elements: [{ type: 'text', text: "+ Deployment 'demo/demo-app'" }],
              },
            ],
          },
        ],
      });
    });

    it('should flag failures with their last error', async () => {
      vi.stubEnv('NODE_ENV', 'production');
      const postMessage = vi.spyOn(client.chat, 'postMessage').mockResolvedValue({ ok: true, ts: 'ts-1' });

      await slackNotifier.createMessage(
        'demo',
        'demo',
        {
          health: HealthStatus.Degraded,
          sync: SyncState.OutOfSync,
          lastError: { kind: 'ConflictError', message: 'Service was modified' },
        },
        '',
      );

      expect(postMessage).toHaveBeenCalledWith({
        text: 'Application Updated: demo / demo\nStatus: health Degraded / sync OutOfSync\nLast error: ConflictError: Service was modified',
        unfurl_links: false,
        channel: 'test-channel',
        blocks: [
          {
            type: 'rich_text',
            elements: [
              {
                type: 'rich_text_section',
                elements: [
                  { type: 'emoji', name: 'x' },
                  SPACE,
                  { type: 'emoji', name: 'warning' },
                  SPACE,
                  { type: 'text', text: 'demo / demo', style: { bold: true } },
                  { type: 'text', text: '\nConflictError: Service was modified', style: { italic: true } },
                ],
              },
            ],
          },
        ],
      });
    });

    it('should list the outcome of every resource the pass touched', async () => {
      vi.stubEnv('NODE_ENV', 'production');
      const postMessage = vi.spyOn(client.chat, 'postMessage').mockResolvedValue({ ok: true, ts: 'ts-1' });

      await slackNotifier.createMessage(
        'demo',
        'demo',
        {
          health: HealthStatus.Degraded,
          sync: SyncState.OutOfSync,
          resources: [
            { kind: 'Namespace', name: 'demo', outcome: ObjectOutcome.Unchanged, attempts: 0, health: HealthStatus.Healthy },
            {
              kind: 'Deployment',
              namespace: 'demo',
              name: 'demo-app',
              outcome: ObjectOutcome.Updated,
              attempts: 1,
              health: HealthStatus.Progressing,
            },
            {
              kind: 'Service',
              namespace: 'demo',
              name: 'demo-app',
              outcome: ObjectOutcome.Failed,
              attempts: 3,
              health: HealthStatus.Unknown,
              message: 'field is immutable',
            },
          ],
        },
        '',
      );

      expect(postMessage).toHaveBeenCalledWith({
        text: [
          'Application Updated: demo / demo',
          'Status: health Degraded / sync OutOfSync',
          '- Deployment demo/demo-app: Updated',
          '- Service demo/demo-app: Failed (field is immutable)',
        ].join('\n'),
        unfurl_links: false,
        channel: 'test-channel',
        blocks: [
          {
            type: 'rich_text',
            elements: [
              {
                type: 'rich_text_section',
                elements: [
                  { type: 'emoji', name: 'x' },
                  SPACE,
                  { type: 'emoji', name: 'warning' },
                  SPACE,
                  { type: 'text', text: 'demo / demo', style: { bold: true } },
                ],
              },
              {
                type: 'rich_text_list',
                style: 'bullet',
                elements: [
                  {
                    type: 'rich_text_section',
                    elements: [
                      { type: 'emoji', name: 'arrows_counterclockwise' },
                      SPACE,
                      { type: 'text', text: 'Deployment demo/demo-app', style: { code: true } },
                      { type: 'text', text: ' Updated' },
                    ],
                  },
                  {
                    type: 'rich_text_section',
                    elements: [
                      { type: 'emoji', name: 'x' },
                      SPACE,
                      { type: 'text', text: 'Service demo/demo-app', style: { code: true } },
                      { type: 'text', text: ' Failed' },
                      { type: 'text', text: ': field is immutable', style: { italic: true } },
                    ],
                  },
                ],
              },
            ],
          },
        ],
      });
    });

    it('should use a question mark for unknown classifications', async () => {
      const postMessage = vi.spyOn(client.chat, 'postMessage').mockResolvedValue({ ok: true, ts: 'ts-1' });

      await slackNotifier.createMessage('demo', 'demo', { health: HealthStatus.Unknown, sync: SyncState.Unknown }, '');

      expect(postMessage).toHaveBeenCalledWith(
        expect.objectContaining({
          blocks: [
            expect.objectContaining({
              elements: [
                expect.objectContaining({
                  elements: expect.arrayContaining([{ type: 'emoji', name: 'question' }]),
                }),
              ],
            }),
          ],
        }),
      );
    });

    it('should only log the blocks without a client', async () => {
      const offline = new SlackNotifier(undefined, 'test-channel');

      const result = await offline.createMessage('demo', 'demo', { health: HealthStatus.Healthy, sync: SyncState.Synced }, '');

      expect(result).toEqual({ ts: undefined });
      expect(logger.verbose).toHaveBeenCalledWith(expect.stringContaining('"blocks"'));
    });

    it('should handle errors and return undefined', async () => {
      const error = new Error('rate limited');
      vi.spyOn(client.chat, 'postMessage').mockRejectedValue(error);

      const result = await slackNotifier.createMessage(
        'demo',
        'demo',
        { health: HealthStatus.Healthy, sync: SyncState.Synced },
        '',
      );

      expect(result).toBeUndefined();
      expect(logger.error).toHaveBeenCalledWith('Failed to send Slack notification:', error);
    });
  });

  describe('updateMessage', () => {
    it('should edit the message with the given timestamp', async () => {
      const update = vi.spyOn(client.chat, 'update').mockResolvedValue({ ok: true, ts: 'ts-2' });

      const result = await slackNotifier.updateMessage(
        'demo',
        'demo',
        { health: HealthStatus.Progressing, sync: SyncState.Synced },
        '',
        'ts-1',
      );

      expect(result).toEqual({ ts: 'ts-2' });
      expect(update).toHaveBeenCalledWith(
        expect.objectContaining({
          text: 'Application Updated: demo (DEV) / demo\nStatus: health Progressing / sync Synced',
          channel: 'test-channel',
          ts: 'ts-1',
        }),
      );
    });

    it('should handle errors and return undefined', async () => {
      const error = new Error('message_not_found');
      vi.spyOn(client.chat, 'update').mockRejectedValue(error);

      const result = await slackNotifier.updateMessage(
        'demo',
        'demo',
        { health: HealthStatus.Healthy, sync: SyncState.Synced },
        '',
        'ts-1',
      );

      expect(result).toBeUndefined();
      expect(logger.error).toHaveBeenCalledWith('Failed to update Slack notification:', error);
    });
  });
});
