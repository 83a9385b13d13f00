import env from 'env-var';

export const slack_config = {
  BOT_TOKEN: env.get('SLACK_BOT_TOKEN').asString(),
  CHANNEL_ID: env.get('SLACK_CHANNEL_ID').required(!!process.env.SLACK_BOT_TOKEN).default('').asString(),
} as const;
