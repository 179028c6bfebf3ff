import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors";
import { logger } from "./logger";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v?.trim() ? v.trim() : undefined));

const chatIdList = z
  .string()
  .optional()
  .transform((v, ctx) => {
    const ids = new Set<number>();
    for (const part of (v ?? "").split(",")) {
      const trimmed = part.trim();
      if (!trimmed) continue;
      const id = Number(trimmed);
      if (!Number.isSafeInteger(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${trimmed}" is not an integer chat id`,
        });
        return z.NEVER;
      }
      ids.add(id);
    }
    return ids;
  });

/** `PORT=` in an env file means "not set", not an empty value */
const blankAsUnset = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const EnvSchema = z.object({
  NODE_ENV: z.preprocess(blankAsUnset, z.string().default("development")),
  BOT_TOKEN: optionalString.refine((v) => v !== undefined, {
    message: "BOT_TOKEN is required (from BotFather)",
  }),
  API_KEY: optionalString,
  SUPER_ADMIN_IDS: chatIdList,
  HOST: z.preprocess(blankAsUnset, z.string().default("0.0.0.0")),
  PORT: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().min(0).max(65535).default(8080),
  ),
  DATA_DIR: z.preprocess(blankAsUnset, z.string().default("data")),
  DELIVERY_TIMEOUT_MS: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().positive().default(10_000),
  ),
  POLL_TIMEOUT_SECONDS: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().min(0).max(50).default(30),
  ),
});

export interface AppConfig {
  env: string;
  isDev: boolean;
  botToken: string;
  /** Shared ingest secret. Undefined means the endpoint runs in open mode. */
  apiKey?: string;
  superAdminIds: ReadonlySet<number>;
  host: string;
  port: number;
  dataDir: string;
  registryFile: string;
  deliveryTimeoutMs: number;
  pollTimeoutSeconds: number;
}

/**
 * Build the application config from environment variables
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      ),
    );
  }

  const vars = parsed.data;
  const botToken = vars.BOT_TOKEN;
  if (botToken === undefined) {
    throw new ConfigError(["BOT_TOKEN: BOT_TOKEN is required (from BotFather)"]);
  }

  return {
    env: vars.NODE_ENV,
    isDev: vars.NODE_ENV !== "production",
    botToken,
    apiKey: vars.API_KEY,
    superAdminIds: vars.SUPER_ADMIN_IDS,
    host: vars.HOST,
    port: vars.PORT,
    dataDir: vars.DATA_DIR,
    registryFile: path.join(vars.DATA_DIR, "admins.json"),
    deliveryTimeoutMs: vars.DELIVERY_TIMEOUT_MS,
    pollTimeoutSeconds: vars.POLL_TIMEOUT_SECONDS,
  };
}

// Validate and report config
export function validateConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("Configuration errors:");
      for (const e of error.issues) {
        logger.error(`  - ${e}`);
      }
    }
    throw error;
  }

  logger.info(
    {
      env: config.env,
      host: config.host,
      port: config.port,
      registryFile: config.registryFile,
      superAdmins: config.superAdminIds.size,
      ingestAuth: config.apiKey ? "api-key" : "open",
    },
    "Configuration loaded",
  );

  if (!config.apiKey) {
    logger.warn(
      "API_KEY is not set: /v1/ingest accepts unauthenticated submissions (open mode)",
    );
  }

  return config;
}
