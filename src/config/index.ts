import dotenv from 'dotenv';
dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface Config {
  port: number;
  nodeEnv: string;
  version: string;
  logLevel: LogLevel;
  corsOrigins: string[];
  bodyLimit: string;
}

const parseLogLevel = (value: string | undefined): LogLevel => {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return 'info';
  }
};

export const config: Config = {
  port: parseInt(process.env.PORT || '5000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  version: process.env.npm_package_version || '1.0.0',
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  corsOrigins: process.env.CORS_ORIGINS?.split(',') || ['http://localhost:5173', 'http://localhost:3000'],
  bodyLimit: process.env.BODY_LIMIT || '10mb',
};

export default config;
