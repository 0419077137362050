import { z } from "zod";
import { createLogger } from "../logger";

const log = createLogger("config");

const numeric = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((value) => value.trim() !== "" && !isNaN(Number(value)), { message: "must be a number" })
    .transform(Number);

const integer = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((value) => /^\d+$/.test(value.trim()), { message: "must be a non-negative integer" })
    .transform((value) => parseInt(value, 10));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  HTTP_HOST: z.string().default("0.0.0.0"),
  HTTP_PORT: integer("8089"),
  TITLE_FONT_SIZE_THRESHOLD: numeric("18"),
  HEADING_FONT_SIZE_THRESHOLD: numeric("14"),
  TEXT_LAYER_CHAR_THRESHOLD: integer("50"),
  MAX_FILE_SIZE_MB: integer("100"),
});

export type Env = z.infer<typeof envSchema>;

export interface ExtractionConfig {
  titleFontSizeThreshold: number;
  headingFontSizeThreshold: number;
  textLayerCharThreshold: number;
  maxFileSizeMb: number;
}

export interface ServerConfig {
  host: string;
  port: number;
  nodeEnv: Env["NODE_ENV"];
}

/**
 * Explicit configuration record. Built once at startup and passed to
 * every operation; nothing in the extraction core reads the environment.
 */
export interface ServiceConfig {
  extraction: ExtractionConfig;
  server: ServerConfig;
}

/**
 * Build a ServiceConfig from an environment map.
 * Throws a ZodError when a variable is present but malformed.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const env = envSchema.parse(source);
  return {
    extraction: {
      titleFontSizeThreshold: env.TITLE_FONT_SIZE_THRESHOLD,
      headingFontSizeThreshold: env.HEADING_FONT_SIZE_THRESHOLD,
      textLayerCharThreshold: env.TEXT_LAYER_CHAR_THRESHOLD,
      maxFileSizeMb: env.MAX_FILE_SIZE_MB,
    },
    server: {
      host: env.HTTP_HOST,
      port: env.HTTP_PORT,
      nodeEnv: env.NODE_ENV,
    },
  };
}

export const defaultConfig: ServiceConfig = loadConfig({});

export function validateEnv(): ServiceConfig {
  try {
    const config = loadConfig(process.env);
    log.info("Environment variables validated successfully");
    return config;
  } catch (error) {
    if (error instanceof z.ZodError) {
      log.error("Environment validation failed:", { errors: error.errors });
      console.error("\n❌ Environment Variable Validation Failed:\n");
      error.errors.forEach((err) => {
        console.error(`  - ${err.path.join(".")}: ${err.message}`);
      });
      console.error("\nPlease check your environment and ensure all variables are well-formed.\n");
    } else {
      log.error("Failed to load configuration", { error: error instanceof Error ? error.message : String(error) });
    }
    process.exit(1);
  }
}
