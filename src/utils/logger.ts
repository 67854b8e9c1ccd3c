import winston from 'winston';
import { config } from '../config/environment';

// Create the winston logger
export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: 'spelling-trainer',
    version: process.env.npm_package_version || '1.0.0'
  },
  transports: [
    // stdout belongs to the interactive session, so every level goes to stderr
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, service, version, ...meta }) => {
          let msg = `${timestamp} [${service}] ${level}: ${message}`;

          // Add metadata if present
          const metaKeys = Object.keys(meta);
          if (metaKeys.length > 0) {
            msg += ` ${JSON.stringify(meta)}`;
          }

          return msg;
        })
      )
    })
  ]
});

if (config.logFile) {
  logger.add(new winston.transports.File({
    filename: config.logFile,
    maxsize: 5242880, // 5MB
    maxFiles: 5
  }));
}

export default logger;
