import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

const SERVICE = 'oscquery';

// npm levels minus verbose/silly; request lines go out at "http".
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

winston.addColors({
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'gray',
});

const consoleLine = printf(({ level, message, timestamp, service, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} ${level} [${String(service)}] ${message}${extra}`;
});

const logFile = process.env.LOG_FILE;

const logger = winston.createLogger({
  levels,
  level: process.env.LOG_LEVEL || 'info',
  defaultMeta: { service: SERVICE },
  transports: [
    new winston.transports.Console({
      format: combine(colorize({ level: true }), timestamp({ format: 'HH:mm:ss.SSS' }), consoleLine),
    }),
    // LOG_FILE adds a JSON copy of every line, service field included.
    ...(logFile
      ? [new winston.transports.File({ filename: logFile, format: combine(timestamp(), winston.format.json()) })]
      : []),
  ],
});

export { logger };
