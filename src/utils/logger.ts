import pino from 'pino';
import pretty from 'pino-pretty';
import { env } from './env';

const stream = env.nodeEnv === 'development'
  ? pretty({
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    })
  : undefined;

export const logger = pino(
  {
    name: 'docx-translation-pipeline',
    level: env.logLevel || (env.nodeEnv === 'production' ? 'info' : 'debug'),
  },
  stream,
);

// Keeps log lines short when a unit of document text is attached to them
export const safeLogText = (text: string, maxLength = 100): string => {
  if (!text) return '';
  return text.length > maxLength ? `${text.substring(0, maxLength)}...` : text;
};
