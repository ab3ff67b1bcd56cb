import winston from 'winston';

export interface LoggerOptions {
  level?: string;
  name: string;
  logFile?: string;
}

export function defaultLogLevel(): string {
  return process.env['LOG_LEVEL'] ?? 'info';
}

/**
 * Render one log line as `timestamp LEVEL [name] [domain] d=N message {meta}`.
 * `domain` and `distance` become tags; any other metadata trails as JSON.
 */
export function formatLine(name: string, info: winston.Logform.TransformableInfo): string {
  const { timestamp, level, message, domain, distance, ...meta } = info;
  const domainTag = typeof domain === 'string' ? ` [${domain}]` : '';
  const distanceTag = typeof distance === 'number' ? ` d=${distance}` : '';
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level.toUpperCase()} [${name}]${domainTag}${distanceTag} ${String(message)}${metaStr}`;
}

export function createLogger(options: LoggerOptions): winston.Logger {
  const { level = defaultLogLevel(), name, logFile } = options;

  const transports: winston.transport[] = [new winston.transports.Console()];
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
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf((info) => formatLine(name, info))
    ),
    transports,
  });
}

export function createWorkerLogger(workerId: string, level = defaultLogLevel()): winston.Logger {
  return createLogger({ name: workerId, level });
}
