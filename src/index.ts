import { WebClient } from '@slack/web-api';
import { app_config } from './config/app.config';
import { slack_config } from './config/slack.config';
import { createClusterContext } from './context';
import { DriftlessOperator } from './driftless-operator';
import { HealthCheckServer } from './http-server';
import { logger } from './logger';
import { HealthChangeNotifier } from './notifications/health-change.notifier';
import { CacheManager } from './utils/cache-manager.utils';
import { ChangeDetector } from './utils/changes-detector.utils';
import { SlackNotifier } from './utils/slack-notifier.utils';

const context = createClusterContext();

const slackClient = slack_config.BOT_TOKEN ? new WebClient(slack_config.BOT_TOKEN) : undefined;
const notifier = new HealthChangeNotifier(
  new SlackNotifier(slackClient, slack_config.CHANNEL_ID),
  new CacheManager(),
  new ChangeDetector(app_config.contextDiffLinesCount),
);

const operator = new DriftlessOperator(context.store, context.repository, { registry: context.registry, notifier });
const healthCheckServer = new HealthCheckServer(context.statusReporter, operator.watcher);

const main = async () => {
  await operator.start();
  await healthCheckServer.start();
};

const exit = async (signal: string) => {
  logger.info(`Exiting: received ${signal}`);
  await operator.stop();
  await healthCheckServer.stop();
  process.exit(0);
};

main().catch((err: unknown) => {
  logger.error(`Failed to start: ${err}`);
  process.exit(1);
});

process.on('SIGTERM', exit).on('SIGINT', exit);
