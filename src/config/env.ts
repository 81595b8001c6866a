import 'dotenv/config';

const NODE_ENV = process.env.NODE_ENV ?? 'development';

// Secrets have a dev fallback only outside production; server startup refuses empty ones.
function secret(name: string, devFallback: string) {
  const value = process.env[name];
  if (value) return value;
  return NODE_ENV === 'production' ? '' : devFallback;
}

function sameSite(value: string | undefined): 'lax' | 'strict' | 'none' {
  return value === 'strict' || value === 'none' ? value : 'lax';
}

const env = {
  NODE_ENV,
  PORT: Number(process.env.PORT ?? 4000),
  MONGO_URI: process.env.MONGO_URI || 'mongodb://127.0.0.1:27017/classroom_dev',
  DB_NAME: process.env.DB_NAME || 'classroom_dev',
  REDIS_URL: process.env.REDIS_URL || 'redis://127.0.0.1:6379',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  JWT_ACCESS_SECRET: secret('JWT_ACCESS_SECRET', 'dev-access-secret'),
  JWT_REFRESH_SECRET: secret('JWT_REFRESH_SECRET', 'dev-refresh-secret'),
  JWT_ACCESS_EXPIRES: process.env.JWT_ACCESS_EXPIRES || '15m',
  JWT_REFRESH_EXPIRES: process.env.JWT_REFRESH_EXPIRES || '7d',
  VERIFICATION_CODE_TTL: process.env.VERIFICATION_CODE_TTL || '10m',
  BCRYPT_ROUNDS: Number(process.env.BCRYPT_ROUNDS ?? 10),
  PASSWORD_MIN_LENGTH: Number(process.env.PASSWORD_MIN_LENGTH ?? 6),

  ACCESS_COOKIE_NAME: process.env.ACCESS_COOKIE_NAME || 'access_token',
  REFRESH_COOKIE_NAME: process.env.REFRESH_COOKIE_NAME || 'refresh_token',
  COOKIE_SECURE: (process.env.COOKIE_SECURE ?? String(NODE_ENV === 'production')).toLowerCase() === 'true',
  COOKIE_SAMESITE: sameSite(process.env.COOKIE_SAMESITE),
  COOKIE_DOMAIN: process.env.COOKIE_DOMAIN || undefined,

  RESEND_API_KEY: process.env.RESEND_API_KEY || '',
  MAIL_FROM: process.env.MAIL_FROM || 'Classroom <no-reply@example.com>',
  APP_NAME: process.env.APP_NAME || 'Classroom',

  RATE_LIMIT_WINDOW_SEC: Number(process.env.RATE_LIMIT_WINDOW_SEC || 60),
  RATE_LIMIT_MAX: Number(process.env.RATE_LIMIT_MAX || 10),
};

export type Env = typeof env;

export default env;
