import { registerAs } from '@nestjs/config';
import { IsNotEmpty, IsString } from 'class-validator';
import { validateConfig } from './config-validation';

/**
 * Credentials for the ingest endpoint
 * Host, port and database name live in the ingest section
 */
export class DatabaseConfig {
  @IsString()
  @IsNotEmpty()
  user!: string;

  @IsString()
  @IsNotEmpty()
  password!: string;
}

export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const rawConfig = {
    user: env.DATABASE_USER || 'ingest',
    password: env.DATABASE_PASSWORD || 'ingest',
  };

  return validateConfig(rawConfig, 'database', DatabaseConfig);
}

/**
 * Database configuration factory
 */
export default registerAs('database', (): DatabaseConfig => loadDatabaseConfig());
