import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import pino, { DestinationStream } from 'pino';

const level = process.env.LOG_LEVEL || 'info';

function fileDestination(): DestinationStream | undefined {
  const file = process.env.LOG_FILE?.trim();
  if (!file) return undefined;
  const dest = resolve(process.cwd(), file);
  mkdirSync(dirname(dest), { recursive: true });
  return pino.destination({ dest, sync: true });
}

export const log = pino(
  {
    level,
    base: { service: process.env.SERVICE_NAME || 'leverage-sentinel' },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  fileDestination(),
);
