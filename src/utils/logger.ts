import winston from 'winston';

export interface LoggerOptions {
  level?: string | undefined;
  name: string;
  logFile?: string | undefined;
}

export function createLogger(options: LoggerOptions): winston.Logger {
  const { level = 'info', name, logFile } = options;

  const transports: winston.transport[] = [
    new winston.transports.Console(),
  ];

  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level: level === 'silent' ? 'info' : level,
    silent: level === 'silent',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} ${level.toUpperCase()} [${name}] ${message}${metaStr}`;
      })
    ),
    transports,
  });
}

export function createScanWorkerLogger(workerId: string, level = 'info', logDir?: string): winston.Logger {
  const transports: winston.transport[] = [new winston.transports.Console()];

  if (logDir) {
    transports.push(
      new winston.transports.File({
        filename: `${logDir}/${workerId}.log`,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level: level === 'silent' ? 'info' : level,
    silent: level === 'silent',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, domain, error }) => {
        const domainTag = domain ? ` [${String(domain)}]` : '';
        const errorTag = error ? ` ERROR: ${String(error)}` : '';
        return `${timestamp} ${level.toUpperCase()} [${workerId}]${domainTag} ${message}${errorTag}`;
      })
    ),
    defaultMeta: { workerId },
    transports,
  });
}
