import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { ConfigError } from "../../domain/common/errors";
import { AppConfigSchema, type AppConfig } from "./schema";

type UnknownRecord = Record<string, unknown>;

export type ConfigOverrides = {
  [K in keyof AppConfig]?: AppConfig[K] extends UnknownRecord
    ? Partial<AppConfig[K]>
    : AppConfig[K];
};

export type LoadConfigArgs = {
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
};

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: UnknownRecord, next: UnknownRecord): UnknownRecord {
  const out: UnknownRecord = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const prior = out[key];
    if (isRecord(prior) && isRecord(value)) {
      out[key] = deepMerge(prior, value);
    } else if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

function configFromEnv(env: NodeJS.ProcessEnv): UnknownRecord {
  const envString = (name: string): string | undefined => {
    const v = env[name];
    return v && v.trim().length > 0 ? v.trim() : undefined;
  };

  const envNumber = (name: string): number | undefined => {
    const raw = envString(name);
    if (!raw) return undefined;
    const n = Number(raw);
    return Number.isFinite(n) ? n : undefined;
  };

  const envInt = (name: string): number | undefined => {
    const n = envNumber(name);
    return n === undefined ? undefined : Math.trunc(n);
  };

  return {
    logLevel: envString("LOG_LEVEL"),
    providers: {
      nvidia: {
        apiKey: envString("NVIDIA_API_KEY"),
        baseUrl: envString("NVIDIA_BASE_URL"),
        timeoutMs: envInt("NVIDIA_TIMEOUT_MS"),
        maxRetries: envInt("NVIDIA_MAX_RETRIES"),
      },
    },
    generation: {
      model: envString("LLM_MODEL"),
      temperature: envNumber("GENERATION_TEMPERATURE"),
      topP: envNumber("GENERATION_TOP_P"),
      maxTokens: envInt("GENERATION_MAX_TOKENS"),
    },
    embeddings: {
      model: envString("EMBEDDING_MODEL"),
    },
    characterDb: {
      path: envString("CHARACTER_DB_PATH"),
      table: envString("CHARACTER_DB_TABLE"),
    },
  };
}

async function readConfigFile(configPath: string): Promise<UnknownRecord> {
  const abs = path.isAbsolute(configPath)
    ? configPath
    : path.join(process.cwd(), configPath);
  let raw: string;
  try {
    raw = await readFile(abs, "utf8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${abs}`, error);
  }

  const ext = path.extname(abs).toLowerCase();
  try {
    const parsed: unknown =
      ext === ".yaml" || ext === ".yml" ? YAML.parse(raw) : JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${abs}`, error);
  }
}

/**
 * Resolves configuration from file, then environment, then explicit
 * overrides. Any schema failure (most commonly a missing API key) is a
 * ConfigError.
 */
export async function loadConfig(
  args: LoadConfigArgs = {},
): Promise<AppConfig> {
  const fileConfig = args.configPath
    ? await readConfigFile(args.configPath)
    : {};
  const envConfig = configFromEnv(args.env ?? process.env);
  const merged = deepMerge(
    deepMerge(fileConfig, envConfig),
    args.overrides ?? {},
  );

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid configuration:\n${issues}`, parsed.error);
  }
  return parsed.data;
}
