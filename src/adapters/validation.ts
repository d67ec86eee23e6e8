import { z } from "zod";
import type { Config } from "../core/domain/entities/config.entity.js";

/**
 * Validation schema for the YAML configuration file. Connection settings are
 * required only for the selected source driver.
 */

const required = (label: string) => z.string().trim().min(1, `${label} is required`);

const excludeEntities = z.array(z.coerce.string()).default([]);

const SftpSourceSchema = z.object({
  driver: z.literal("sftp"),
  host: required("source.host (SFTP_HOST)"),
  port: z.coerce.number().int().positive().default(22),
  username: required("source.username (SFTP_USERNAME)"),
  privateKeyPath: required("source.privateKeyPath (SFTP_KEY_PATH)"),
  passphrase: z
    .string()
    .optional()
    .transform((v) => (v ? v : undefined)),
  readyTimeoutMs: z.coerce.number().int().positive().default(20000),
  excludeEntities,
});

const S3SourceSchema = z.object({
  driver: z.literal("s3"),
  bucket: required("source.bucket"),
  prefix: z
    .string()
    .default("")
    .transform((p) => (p && !p.endsWith("/") ? `${p}/` : p)),
  region: required("source.region"),
  excludeEntities,
});

const LocalSourceSchema = z.object({
  driver: z.literal("local"),
  root: required("source.root"),
  excludeEntities,
});

const EmailSchema = z.object({
  host: required("notifications.email.host"),
  port: z.coerce.number().int().positive().default(587),
  secure: z.boolean().default(false),
  user: z.string().optional(),
  password: z.string().optional(),
  from: z.string().email(),
  to: z
    .union([z.string(), z.array(z.string())])
    .transform((v) =>
      (Array.isArray(v) ? v : v.split(","))
        .map((e) => e.trim())
        .filter(Boolean),
    )
    .pipe(z.array(z.string().email()).min(1, "At least one recipient is required")),
});

export const ConfigSchema: z.ZodType<Config, z.ZodTypeDef, unknown> = z.object({
  source: z.discriminatedUnion("driver", [
    SftpSourceSchema,
    S3SourceSchema,
    LocalSourceSchema,
  ]),
  database: z.object({
    url: required("database.url (DATABASE_URL)"),
  }),
  retry: z
    .object({
      maxAttempts: z.coerce.number().int().min(1).default(60),
      sleepSeconds: z.coerce.number().min(0).default(300),
    })
    .default({}),
  transform: z
    .object({
      intervalMinutes: z.union([z.literal(15), z.literal(30), z.literal(60)]).default(60),
    })
    .default({}),
  state: z
    .object({
      dir: z.string().default("./state"),
      checkpointDriver: z.enum(["json", "sqlite"]).default("json"),
    })
    .default({}),
  logging: z
    .object({
      dir: z.string().default("./logs"),
      runLog: z.string().default("ingest.jsonl"),
    })
    .default({}),
  notifications: z
    .object({
      email: EmailSchema.optional(),
    })
    .default({}),
  schedule: z
    .object({
      cron: z.string().default("0 6 * * *"),
      timezone: z.string().default("UTC"),
    })
    .default({}),
});

const folderDate = z.string().regex(/^\d{8}$/, "Expected yyyyMMdd");

/** CLI flags shared by `ingest` and `backfill`. */
export const RunOptionsSchema = z.object({
  date: folderDate.optional(),
  from: folderDate.optional(),
  to: folderDate.optional(),
  maxAttempts: z.coerce.number().int().min(1).optional(),
  sleepSeconds: z.coerce.number().min(0).optional(),
  local: z.string().min(1).optional(),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.length ? i.path.join(".") + ": " : ""}${i.message}`)
    .join("; ");
}
