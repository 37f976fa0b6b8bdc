import dotenv from "dotenv";
import path from "path";

dotenv.config();

export type AppEnv = "development" | "production" | "testing";
export type NarratorKind = "template" | "llm";

export interface AppConfig {
  env: AppEnv;
  port: number;
  dataDir: string;
  corsOrigins: string[];
  adminEmail?: string;
  openaiApiKey?: string;
  narrator: NarratorKind;
  narratorModel: string;
}

const DEFAULT_PORT = 3001;
const DEFAULT_CORS_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

export const DEFAULT_DATA_DIR = path.join(__dirname, "../data");

function parseEnv(value: string | undefined): AppEnv {
  switch (value) {
    case "production":
      return "production";
    case "test":
    case "testing":
      return "testing";
    default:
      return "development";
  }
}

function parsePort(value: string | undefined): number {
  const port = Number(value);
  return Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT;
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  const items = (value ?? "")
    .split(",")
    .map(item => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : fallback;
}

/**
 * Read configuration from the environment (after .env is loaded)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config: AppConfig = {
    env: parseEnv(env.APP_ENV || env.NODE_ENV),
    port: parsePort(env.API_PORT),
    dataDir: env.DATA_DIR ? path.resolve(env.DATA_DIR) : DEFAULT_DATA_DIR,
    corsOrigins: parseList(env.CORS_ORIGINS, DEFAULT_CORS_ORIGINS),
    narrator: env.NARRATOR === "llm" ? "llm" : "template",
    narratorModel: env.NARRATOR_MODEL || "gpt-4o-mini",
  };
  if (env.ADMIN_EMAIL) config.adminEmail = env.ADMIN_EMAIL;
  if (env.OPENAI_API_KEY) config.openaiApiKey = env.OPENAI_API_KEY;
  return config;
}

export const config = loadConfig();
