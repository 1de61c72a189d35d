import winston from 'winston';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'error' : 'info');

const lineFormat = winston.format.printf(({ timestamp, level, message, stack }) => {
  return `${timestamp} ${level}: ${stack || message}`;
});

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(winston.format.colorize(), lineFormat),
  }),
];

if (process.env.LOG_FILE) {
  transports.push(new winston.transports.File({ filename: process.env.LOG_FILE, format: lineFormat }));
}

const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
  ),
  transports,
});

export default logger;
