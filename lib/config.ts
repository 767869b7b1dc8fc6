import { z } from "zod";
import { ConfigurationError } from "./errors";

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const requiredKey = (name: string) =>
  z.preprocess(
    blankToUndefined,
    z.string({ required_error: `${name} is not set` }).trim()
  );

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const EnvSchema = z.object({
  TAVILY_API_KEY: requiredKey("TAVILY_API_KEY"),
  GEMINI_API_KEY: requiredKey("GEMINI_API_KEY"),
  GEMINI_MODEL: z.preprocess(blankToUndefined, z.string().default("gemini-1.5-flash")),
  GEMINI_TEMPERATURE: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(0).max(2).default(0.7)
  ),
  SEARCH_MAX_RESULTS: positiveInt(8),
  MAX_COMPETITORS: positiveInt(6),
  MAX_FEATURES: positiveInt(8),
  REQUEST_TIMEOUT_MS: positiveInt(30_000),
});

export interface AppConfig {
  tavilyApiKey: string;
  geminiApiKey: string;
  model: string;
  temperature: number;
  searchMaxResults: number;
  maxCompetitors: number;
  maxFeatures: number;
  requestTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

/**
 * Reads and validates the process environment.
 * Throws a ConfigurationError naming every missing or invalid variable.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse({
    ...env,
    // GOOGLE_API_KEY is the LangChain default name
    GEMINI_API_KEY: blankToUndefined(env.GEMINI_API_KEY) ?? env.GOOGLE_API_KEY,
  });

  if (!parsed.success) {
    const variables = [
      ...new Set(parsed.error.issues.map((issue) => String(issue.path[0]))),
    ];
    throw new ConfigurationError(
      `Invalid configuration: ${variables.join(", ")}. Set them in .env.local and restart the server.`,
      variables
    );
  }

  const vars = parsed.data;
  return {
    tavilyApiKey: vars.TAVILY_API_KEY,
    geminiApiKey: vars.GEMINI_API_KEY,
    model: vars.GEMINI_MODEL,
    temperature: vars.GEMINI_TEMPERATURE,
    searchMaxResults: vars.SEARCH_MAX_RESULTS,
    maxCompetitors: vars.MAX_COMPETITORS,
    maxFeatures: vars.MAX_FEATURES,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
  };
}

/** Non-throwing variant for UI code that only needs to report the problem. */
export function checkConfig(env: Env = process.env): ConfigurationError | null {
  try {
    loadConfig(env);
    return null;
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
}
