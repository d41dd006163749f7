import winston, { format } from 'winston';
import chalk from 'chalk';
import { config } from './env';

// Funciones auxiliares para formateo de logs
const getLogLevelColor = (level: string) => {
  switch (level) {
    case 'info': return { color: chalk.green.bold, emoji: '📝 ' };
    case 'warn': return { color: chalk.yellow.bold, emoji: '⚠️ ' };
    case 'error': return { color: chalk.red.bold, emoji: '❌ ' };
    default: return { color: chalk.white, emoji: '' };
  }
};

const getMethodColor = (method: string) => {
  switch (method) {
    case 'GET': return chalk.green.bold;
    case 'POST': return chalk.blue.bold;
    case 'PUT': return chalk.yellow.bold;
    case 'DELETE': return chalk.red.bold;
    default: return chalk.white.bold;
  }
};

const getStatusColor = (statusCode: number) => {
  if (statusCode < 300) return { color: chalk.green.bold, emoji: '✅ ' };
  if (statusCode < 400) return { color: chalk.cyan.bold, emoji: '↪️ ' };
  if (statusCode < 500) return { color: chalk.yellow.bold, emoji: '⚠️ ' };
  return { color: chalk.red.bold, emoji: '❌ ' };
};

interface HttpLogMeta {
  req: { method: string; originalUrl: string; headers?: Record<string, unknown>; ip?: string };
  res?: { statusCode?: number };
  responseTime?: number;
}

const isHttpMeta = (meta: unknown): meta is HttpLogMeta => {
  if (!meta || typeof meta !== 'object' || !('req' in meta)) return false;
  const { req } = meta;
  return !!req && typeof req === 'object' && 'method' in req && typeof req.method === 'string';
};

// Formato personalizado para los logs
const customLogFormat = format.printf((info) => {
  const level = String(info.level ?? '');
  const message = String(info.message ?? '');
  const timestamp = String(info.timestamp ?? '');
  const meta = typeof info.metadata === 'object' && info.metadata !== null && 'meta' in info.metadata
    ? info.metadata.meta
    : undefined;

  const { color: levelColor, emoji } = getLogLevelColor(level);

  // Si es una solicitud HTTP
  if (isHttpMeta(meta)) {
    const { req, res, responseTime = 0 } = meta;
    const methodColor = getMethodColor(req.method);
    const statusCode = res?.statusCode ?? 0;
    const { color: statusColor, emoji: statusEmoji } = getStatusColor(statusCode);
    const ip = String(req.headers?.['x-forwarded-for'] ?? req.ip ?? 'unknown');

    return `${statusEmoji}${chalk.gray(`[${timestamp}]`)} ${methodColor(req.method)} ${chalk.cyan(req.originalUrl)} ${statusColor(statusCode)} ${chalk.gray(`${responseTime}ms`)} ${chalk.gray(`IP: ${ip}`)}`;
  }

  // Formato para mensajes regulares
  return `${emoji}${chalk.gray(`[${timestamp}]`)} ${levelColor(level.toUpperCase())} ${message}`;
});

const fileTransports = config.logToFile
  ? [
      new winston.transports.File({
        filename: 'error.log',
        level: 'error',
        format: format.combine(format.timestamp(), format.json()),
      }),
      new winston.transports.File({
        filename: 'combined.log',
        format: format.combine(format.timestamp(), format.json()),
      }),
    ]
  : [];

export const logger = winston.createLogger({
  level: 'info',
  silent: config.nodeEnv === 'test',
  format: format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.metadata(),
    customLogFormat
  ),
  transports: [new winston.transports.Console(), ...fileTransports],
});
