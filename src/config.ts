import path from "path";
import dotenv from "dotenv";

dotenv.config();

const REQUIRED_ENV = ["SCHEDULE_URL"] as const;

export interface AppConfig {
  scheduleUrl: string;
  regionId: string;
  regionFileName: string;
  cronPattern: string;
  outputDir: string;
  timezone: string;
  requestTimeoutMs: number;
  userAgent: string;
  chromeExecutablePath?: string;
}

type Env = Partial<Record<string, string>>;

function readNumber(value: string | undefined, fallback: number, key: string): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid numeric environment variable ${key}: ${value}`);
  }
  return parsed;
}

export function loadConfig(env: Env = process.env): AppConfig {
  REQUIRED_ENV.forEach((key) => {
    if (!env[key]?.trim()) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
  });

  const config: AppConfig = {
    scheduleUrl: env.SCHEDULE_URL?.trim() ?? "",
    regionId: env.REGION_ID?.trim() || "Zhytomyr",
    regionFileName: env.REGION_FILE_NAME?.trim() || "Zhytomyroblenergo",
    cronPattern: env.CRON_PATTERN?.trim() || "*/15 * * * *",
    outputDir: path.resolve(env.OUTPUT_DIR?.trim() || path.join(process.cwd(), "out")),
    timezone: env.TZ?.trim() || "Europe/Kyiv",
    requestTimeoutMs: readNumber(env.REQUEST_TIMEOUT_MS, 60000, "REQUEST_TIMEOUT_MS"),
    userAgent:
      env.USER_AGENT?.trim() ||
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  };

  const chromePath = env.CHROME_EXECUTABLE_PATH?.trim();
  if (chromePath) {
    config.chromeExecutablePath = chromePath;
  }

  return config;
}
