import dotenv from 'dotenv';

dotenv.config();

interface Config {
  server: {
    env: string;
    port: number;
    serviceName: string;
  };
  database: {
    host: string;
    port: number;
    name: string;
    user: string;
    password: string;
    synchronize: boolean;
    logging: boolean;
  };
  jwt: {
    secret: string;
    issuer: string;
  };
  logging: {
    level: string;
  };
  security: {
    rateLimit: number;
    rateWindow: number;
    allowedOrigins: string[];
  };
}

const env = process.env.NODE_ENV || 'development';

const config: Config = {
  server: {
    env,
    port: parseInt(process.env.PORT || '3010', 10),
    serviceName: process.env.SERVICE_NAME || 'catalog-service'
  },
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    name: process.env.DB_NAME || 'catalog_db',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    synchronize: process.env.DB_SYNCHRONIZE
      ? process.env.DB_SYNCHRONIZE === 'true'
      : env === 'development',
    logging: process.env.DB_LOGGING === 'true'
  },
  jwt: {
    secret: process.env.JWT_SECRET || 'change-me-in-production',
    issuer: process.env.JWT_ISSUER || 'catalog-platform'
  },
  logging: {
    level: process.env.LOG_LEVEL || 'debug'
  },
  security: {
    rateLimit: parseInt(process.env.API_RATE_LIMIT || '100', 10),
    rateWindow: parseInt(process.env.API_RATE_WINDOW || '900000', 10),
    allowedOrigins: (process.env.ALLOWED_ORIGINS || 'http://localhost:3000').split(',')
  }
};

export default config;
