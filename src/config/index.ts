import { z } from "zod";

import { ConfigurationError } from "../errors.js";

/** The X media endpoint rejects APPEND segments above 5 MiB. */
export const MAX_UPLOAD_CHUNK_BYTES = 5 * 1024 * 1024;

const credentialAliases = {
  consumerKey: ["X_API_KEY", "TWITTER_API_KEY", "CONSUMER_KEY"],
  consumerSecret: ["X_API_SECRET", "TWITTER_API_SECRET", "CONSUMER_SECRET"],
  accessToken: ["X_ACCESS_TOKEN", "TWITTER_ACCESS_TOKEN"],
  accessSecret: ["X_ACCESS_SECRET", "X_ACCESS_TOKEN_SECRET", "TWITTER_ACCESS_SECRET"],
} as const;

const booleanFlag = z
  .string()
  .optional()
  .default("false")
  .transform((value) => ["1", "true", "yes", "on"].includes(value.toLowerCase()));

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : null));

const postEnvSchema = z.object({
  MEDIA_SOURCE: z.enum(["local", "gdrive", "mega"]).optional(),
  X_USE_MEGA: booleanFlag,
  POST_LIMIT: z.coerce.number().int().positive().optional(),
  X_POST_LIMIT: z.coerce.number().int().positive().optional(),
  DEDUP_STORE: z.enum(["sqlite", "json"]).default("sqlite"),
  DB_PATH: z.string().min(1).default("data/posted.sqlite"),
  POSTED_JSON_PATH: z.string().min(1).default("data/posted.json"),
  DOWNLOAD_TMP_DIR: z.string().min(1).default("/tmp/media-autoposter"),
  CAPTION_DIR: optionalText,
  UPLOAD_CHUNK_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_UPLOAD_CHUNK_BYTES)
    .default(1024 * 1024),
  APPEND_RETRIES: z.coerce.number().int().min(0).max(20).default(5),
  PROCESSING_MAX_WAIT_SECONDS: z.coerce.number().int().positive().default(600),
  HTTP_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(120),
  DRY_RUN: booleanFlag,
  LOCAL_MEDIA_DIR: z.string().min(1).default("data"),
  LOCAL_DELETE_AFTER_POST: booleanFlag,
  GDRIVE_SERVICE_ACCOUNT_JSON: optionalText,
  GDRIVE_SERVICE_ACCOUNT_FILE: optionalText,
  GDRIVE_FOLDER_ID: optionalText,
  GDRIVE_DIR_NAME: z.string().min(1).default("XYZBlob"),
  GDRIVE_DRIVE_ID: optionalText,
  GDRIVE_HARD_DELETE: booleanFlag,
  GDRIVE_PUBLIC_URL: optionalText,
  GDRIVE_DB_FOLDER_ID: optionalText,
  MEGA_EMAIL: optionalText,
  MEGA_PASSWORD: optionalText,
  MEGA_DIR_NAME: z.string().min(1).default("XYZBlob"),
  MEGA_PUBLIC_URL: optionalText,
  MEGA_HARD_DELETE: booleanFlag,
  STORE_SYNC: z.enum(["none", "mega", "gdrive"]).default("none"),
});

const scheduleTime = z.string().regex(/^([01]\d|2[0-3]):([0-5]\d)$/);

const schedulerEnvSchema = z.object({
  TZ: z.string().default("UTC"),
  POST_SCHEDULE: z
    .string()
    .default("09:00")
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean),
    )
    .pipe(z.array(scheduleTime).min(1)),
  SCHEDULER_TICK_SECONDS: z.coerce.number().int().positive().default(30),
  SCHEDULER_RUN_ON_START: booleanFlag,
});

export interface XCredentials {
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  accessSecret: string;
}

export type MediaSourceName = "local" | "gdrive" | "mega";

export interface LocalSourceConfig {
  mediaDir: string;
  deleteAfterPost: boolean;
}

export interface GoogleDriveSourceConfig {
  serviceAccountJson: string | null;
  serviceAccountFile: string | null;
  folderId: string | null;
  dirName: string;
  driveId: string | null;
  hardDelete: boolean;
  publicUrl: string | null;
  /** Folder that holds the remote copy of the dedup file; the media folder when unset. */
  dbFolderId: string | null;
}

export interface MegaSourceConfig {
  email: string | null;
  password: string | null;
  dirName: string;
  publicUrl: string | null;
  hardDelete: boolean;
}

export type StoreSyncTarget = "none" | "mega" | "gdrive";

export interface AppConfig {
  credentials: XCredentials;
  mediaSource: MediaSourceName;
  /** `null` means no limit beyond what the source imposes. */
  postLimit: number | null;
  dedupStore: "sqlite" | "json";
  dbPath: string;
  postedJsonPath: string;
  downloadTmpDir: string;
  captionDir: string;
  uploadChunkBytes: number;
  appendRetries: number;
  processingMaxWaitSeconds: number;
  httpTimeoutSeconds: number;
  dryRun: boolean;
  local: LocalSourceConfig;
  gdrive: GoogleDriveSourceConfig;
  mega: MegaSourceConfig;
  /** Where the JSON dedup file is pulled from before a run and pushed to after each record. */
  storeSync: StoreSyncTarget;
}

export interface SchedulerConfig {
  timezone: string;
  times: Array<{ label: string; hour: number; minute: number }>;
  tickSeconds: number;
  runOnStart: boolean;
}

function pickEnv(
  environment: NodeJS.ProcessEnv,
  keys: readonly string[],
): string | null {
  for (const key of keys) {
    const value = environment[key]?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}

function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`);
}

function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  environment: NodeJS.ProcessEnv,
  label: string,
): z.output<T> {
  // dotenv leaves `KEY=` as an empty string; treat it as unset.
  const present = Object.fromEntries(
    Object.entries(environment).filter(
      (entry): entry is [string, string] =>
        typeof entry[1] === "string" && entry[1].trim() !== "",
    ),
  );
  const parsed = schema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${label} configuration`, formatZodIssues(parsed.error));
  }
  return parsed.data;
}

export function loadCredentials(
  environment: NodeJS.ProcessEnv = process.env,
): XCredentials {
  const missing: string[] = [];
  const resolve = (field: keyof typeof credentialAliases): string => {
    const aliases = credentialAliases[field];
    const value = pickEnv(environment, aliases);
    if (!value) {
      missing.push(aliases.join(" | "));
      return "";
    }
    return value;
  };

  const credentials: XCredentials = {
    consumerKey: resolve("consumerKey"),
    consumerSecret: resolve("consumerSecret"),
    accessToken: resolve("accessToken"),
    accessSecret: resolve("accessSecret"),
  };

  if (missing.length > 0) {
    throw new ConfigurationError("Missing X OAuth credentials", missing);
  }

  return credentials;
}

function resolveMediaSource(parsed: z.output<typeof postEnvSchema>): MediaSourceName {
  if (parsed.MEDIA_SOURCE) {
    return parsed.MEDIA_SOURCE;
  }
  return parsed.X_USE_MEGA ? "mega" : "local";
}

function validateSourceSettings(config: AppConfig): string[] {
  const issues: string[] = [];
  const hasServiceAccount = Boolean(
    config.gdrive.serviceAccountJson || config.gdrive.serviceAccountFile,
  );
  const hasMegaAccount = Boolean(config.mega.email && config.mega.password);

  if (config.mediaSource === "gdrive" && !hasServiceAccount) {
    issues.push(
      "GDRIVE_SERVICE_ACCOUNT_JSON or GDRIVE_SERVICE_ACCOUNT_FILE is required for MEDIA_SOURCE=gdrive",
    );
  }

  if (config.mediaSource === "mega" && !config.mega.publicUrl && !hasMegaAccount) {
    issues.push(
      "MEGA_EMAIL and MEGA_PASSWORD (or MEGA_PUBLIC_URL) are required for MEDIA_SOURCE=mega",
    );
  }

  if (config.storeSync !== "none" && config.dedupStore !== "json") {
    issues.push(`STORE_SYNC=${config.storeSync} needs DEDUP_STORE=json`);
  }

  if (config.storeSync === "gdrive" && !hasServiceAccount) {
    issues.push(
      "GDRIVE_SERVICE_ACCOUNT_JSON or GDRIVE_SERVICE_ACCOUNT_FILE is required for STORE_SYNC=gdrive",
    );
  }

  if (config.storeSync === "mega" && !hasMegaAccount) {
    issues.push("MEGA_EMAIL and MEGA_PASSWORD are required for STORE_SYNC=mega");
  }

  return issues;
}

export function loadConfig(environment: NodeJS.ProcessEnv = process.env): AppConfig {
  const credentials = loadCredentials(environment);
  const parsed = parseEnv(postEnvSchema, environment, "post");

  const config: AppConfig = {
    credentials,
    mediaSource: resolveMediaSource(parsed),
    postLimit: parsed.X_POST_LIMIT ?? parsed.POST_LIMIT ?? null,
    dedupStore: parsed.DEDUP_STORE,
    dbPath: parsed.DB_PATH,
    postedJsonPath: parsed.POSTED_JSON_PATH,
    downloadTmpDir: parsed.DOWNLOAD_TMP_DIR,
    captionDir: parsed.CAPTION_DIR ?? parsed.LOCAL_MEDIA_DIR,
    uploadChunkBytes: parsed.UPLOAD_CHUNK_BYTES,
    appendRetries: parsed.APPEND_RETRIES,
    processingMaxWaitSeconds: parsed.PROCESSING_MAX_WAIT_SECONDS,
    httpTimeoutSeconds: parsed.HTTP_TIMEOUT_SECONDS,
    dryRun: parsed.DRY_RUN,
    local: {
      mediaDir: parsed.LOCAL_MEDIA_DIR,
      deleteAfterPost: parsed.LOCAL_DELETE_AFTER_POST,
    },
    gdrive: {
      serviceAccountJson: parsed.GDRIVE_SERVICE_ACCOUNT_JSON,
      serviceAccountFile: parsed.GDRIVE_SERVICE_ACCOUNT_FILE,
      folderId: parsed.GDRIVE_FOLDER_ID,
      dirName: parsed.GDRIVE_DIR_NAME,
      driveId: parsed.GDRIVE_DRIVE_ID,
      hardDelete: parsed.GDRIVE_HARD_DELETE,
      publicUrl: parsed.GDRIVE_PUBLIC_URL,
      dbFolderId: parsed.GDRIVE_DB_FOLDER_ID,
    },
    mega: {
      email: parsed.MEGA_EMAIL,
      password: parsed.MEGA_PASSWORD,
      dirName: parsed.MEGA_DIR_NAME,
      publicUrl: parsed.MEGA_PUBLIC_URL,
      hardDelete: parsed.MEGA_HARD_DELETE,
    },
    storeSync: parsed.STORE_SYNC,
  };

  const issues = validateSourceSettings(config);
  if (issues.length > 0) {
    throw new ConfigurationError("Invalid source configuration", issues);
  }

  return config;
}

export function loadSchedulerConfig(
  environment: NodeJS.ProcessEnv = process.env,
): SchedulerConfig {
  const parsed = parseEnv(schedulerEnvSchema, environment, "scheduler");

  return {
    timezone: parsed.TZ,
    times: parsed.POST_SCHEDULE.map((label) => {
      const [hourRaw, minuteRaw] = label.split(":");
      return { label, hour: Number(hourRaw), minute: Number(minuteRaw) };
    }),
    tickSeconds: parsed.SCHEDULER_TICK_SECONDS,
    runOnStart: parsed.SCHEDULER_RUN_ON_START,
  };
}
