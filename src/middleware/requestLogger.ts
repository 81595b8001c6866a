import pino, { Logger } from 'pino';
import pinoHttp from 'pino-http';
import { RequestHandler } from 'express';
import env from '../config/env';

const logger = pino({
  level: env.LOG_LEVEL,
  redact: ['req.headers.authorization', 'req.headers.cookie', 'res.headers["set-cookie"]'],
});

export function requestLogger(base: Logger = logger): RequestHandler {
  return pinoHttp({
    logger: base,
    serializers: { err: pino.stdSerializers.err },
  });
}

export default logger;
