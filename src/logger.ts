import pino from 'pino';

export const logger = pino({
  name: 'toml-groups',
  level: process.env.TOML_GROUPS_LOG_LEVEL ?? 'silent',
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export function configureLogger(level: string | undefined): void {
  if (!level) return;
  logger.level = level;
}
