/**
 * Uygulama Logger'ı
 * Winston tabanlı; servisler logger.info(mesaj, metadata) şeklinde kullanır
 */

import winston from 'winston';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

const consoleFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  return msg;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: combine(
    errors({ stack: true }),
    timestamp(),
    json()
  ),
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize(),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        consoleFormat
      )
    }),
    // Dosyaya loglama isteğe bağlı
    ...(process.env.LOG_FILE
      ? [
          new winston.transports.File({
            filename: process.env.LOG_FILE,
            maxsize: 5242880, // 5MB
            maxFiles: 5
          })
        ]
      : [])
  ]
});

/**
 * Log seviyesini çalışma anında değiştir (CLI --verbose)
 */
export function setLogLevel(level: 'debug' | 'info' | 'warn' | 'error'): void {
  logger.level = level;
}

export default logger;
