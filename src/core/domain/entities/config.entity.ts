export interface SftpSourceConfig {
  driver: "sftp";
  host: string;
  port: number;
  username: string;
  privateKeyPath: string;
  passphrase?: string;
  readyTimeoutMs: number;
  excludeEntities: string[];
}

export interface S3SourceConfig {
  driver: "s3";
  bucket: string;
  prefix: string;
  region: string;
  excludeEntities: string[];
}

export interface LocalSourceConfig {
  driver: "local";
  root: string;
  excludeEntities: string[];
}

export type SourceConfig = SftpSourceConfig | S3SourceConfig | LocalSourceConfig;

export interface DatabaseConfig {
  url: string;
}

export interface RetryConfig {
  maxAttempts: number;
  sleepSeconds: number;
}

export interface TransformConfig {
  intervalMinutes: 15 | 30 | 60;
}

export interface StateConfig {
  dir: string;
  checkpointDriver: "json" | "sqlite";
}

export interface LoggingConfig {
  dir: string;
  runLog: string;
}

export interface EmailConfig {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
  from: string;
  to: string[];
}

export interface NotificationsConfig {
  email?: EmailConfig;
}

export interface ScheduleConfig {
  cron: string;
  timezone: string;
}

export interface Config {
  source: SourceConfig;
  database: DatabaseConfig;
  retry: RetryConfig;
  transform: TransformConfig;
  state: StateConfig;
  logging: LoggingConfig;
  notifications: NotificationsConfig;
  schedule: ScheduleConfig;
}
