import { DEFAULT_TIMEOUT_MS, type TextEncoding, TextEncodingSchema } from "@wirecall/core";

export interface CliConfig {
  timeoutMs: number;
  encoding: TextEncoding;
  verbose: boolean;
}

function optionalInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

function optionalEncoding(env: NodeJS.ProcessEnv, name: string): TextEncoding {
  const parsed = TextEncodingSchema.safeParse(env[name]?.trim());
  return parsed.success ? parsed.data : "utf8";
}

export function getCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    timeoutMs: optionalInt(env, "WIRECALL_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    encoding: optionalEncoding(env, "WIRECALL_ENCODING"),
    verbose: env.WIRECALL_VERBOSE === "1" || env.WIRECALL_VERBOSE === "true",
  };
}
