import { validateEnv } from './env.schema';

const configuration = () => {
  const env = validateEnv(process.env);

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    timezone: env.APP_TIMEZONE,
    database: {
      url: env.DATABASE_URL,
      sync: env.DB_SYNC,
      log: env.DB_LOG,
      ssl: env.DB_SSL,
    },
    jwt: {
      secret: env.JWT_SECRET,
      ttlSeconds: env.JWT_TTL_SECONDS,
    },
  };
};

export default configuration;
