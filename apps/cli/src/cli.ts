import { access, constants, readFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import {
  type ClientCertificate,
  type ClientSource,
  ConsoleLogger,
  type DispatcherFactory,
  HttpTransport,
  prepareRequestFile,
  silentLogger,
  type TextEncoding,
  TextEncodingSchema,
  toTransportRequest,
} from "@wirecall/core";
import { getCliConfig } from "./config.js";

interface ParsedArgs {
  command: string;
  positionals: string[];
  options: Record<string, string | boolean>;
}

const BOOLEAN_FLAGS = new Set(["insecure", "verbose"]);

function parseArgs(argv: string[]): ParsedArgs {
  const [command = "help", ...rest] = argv;
  const positionals: string[] = [];
  const options: Record<string, string | boolean> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const token = rest[index];
    if (token === undefined) {
      continue;
    }

    if (token.startsWith("--")) {
      const key = token.slice(2);
      const value = rest[index + 1];
      if (BOOLEAN_FLAGS.has(key) || !value || value.startsWith("--")) {
        options[key] = true;
      } else {
        options[key] = value;
        index += 1;
      }
      continue;
    }

    positionals.push(token);
  }

  return {
    command,
    positionals,
    options,
  };
}

function stringOption(parsed: ParsedArgs, key: string): string | undefined {
  const value = parsed.options[key];
  return typeof value === "string" ? value : undefined;
}

function printHelp(): void {
  console.log(
    [
      "wirecall commands:",
      "  wirecall run <request.http> [--env <name>] [--base <url>] [--timeout <ms>]",
      "               [--cert <file.pfx>] [--passphrase <secret>] [--insecure]",
      "               [--encoding utf8|utf16le|latin1|ascii] [--verbose]",
      "  wirecall help",
    ].join("\n"),
  );
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function readEnvironmentFile(dir: string, envName: string): Promise<string | null> {
  const envPath = join(dir, `.env.${envName}`);
  if (!(await exists(envPath))) {
    return null;
  }

  return readFile(envPath, "utf8");
}

async function readEnvTexts(dir: string, envName: string | undefined): Promise<string[]> {
  const defaultEnv = await readEnvironmentFile(dir, "default");
  const selectedEnv =
    envName && envName !== "default" ? await readEnvironmentFile(dir, envName) : null;

  if (envName && envName !== "default" && selectedEnv === null) {
    throw new Error(`Environment file not found: ${join(dir, `.env.${envName}`)}`);
  }

  return [defaultEnv, selectedEnv].filter((text): text is string => text !== null);
}

function parseTimeout(raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid --timeout value: ${raw}. Expected a positive number of milliseconds.`);
  }

  return parsed;
}

function parseEncoding(raw: string | undefined, fallback: TextEncoding): TextEncoding {
  if (raw === undefined) {
    return fallback;
  }

  const parsed = TextEncodingSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unsupported --encoding value: ${raw}`);
  }

  return parsed.data;
}

async function readCertificate(
  parsed: ParsedArgs,
  cwd: string,
): Promise<ClientCertificate | undefined> {
  const certPath = stringOption(parsed, "cert");
  if (!certPath) {
    return undefined;
  }

  const certificate: ClientCertificate = {
    pfx: await readFile(resolve(cwd, certPath)),
    rejectUnauthorized: parsed.options.insecure !== true,
  };

  const passphrase = stringOption(parsed, "passphrase");
  if (passphrase !== undefined) {
    certificate.passphrase = passphrase;
  }

  return certificate;
}

async function handleRun(
  parsed: ParsedArgs,
  options: CliRuntimeOptions,
  cwd: string,
): Promise<void> {
  const locator = parsed.positionals[0];
  if (!locator) {
    throw new Error("Usage: wirecall run <request.http> [--env <name>]");
  }

  const requestPath = resolve(cwd, locator);
  if (!(await exists(requestPath))) {
    throw new Error(`Request file not found: ${locator}`);
  }

  const requestText = await readFile(requestPath, "utf8");
  const envTexts = await readEnvTexts(dirname(requestPath), stringOption(parsed, "env"));
  const { resolvedRequest } = prepareRequestFile({
    title: basename(requestPath, ".http"),
    requestText,
    envTexts,
  });

  const config = getCliConfig(options.env);
  const { options: transportOptions, body } = toTransportRequest(
    resolvedRequest,
    stringOption(parsed, "base"),
  );

  const client: ClientSource = options.client ?? {
    kind: "dedicated",
    timeoutMs: parseTimeout(stringOption(parsed, "timeout"), config.timeoutMs),
    certificate: await readCertificate(parsed, cwd),
    createDispatcher: options.createDispatcher,
  };

  const verbose = parsed.options.verbose === true || config.verbose;
  const transport = new HttpTransport({
    ...transportOptions,
    encoding: parseEncoding(stringOption(parsed, "encoding"), config.encoding),
    client,
    logger: verbose ? new ConsoleLogger() : silentLogger,
  });

  transport.on("request", ({ log }) => {
    console.log(log);
  });
  transport.on("response", ({ message }) => {
    console.log(message);
  });

  const result = await transport.execute(body);
  if (!result.ok) {
    if (result.exchange.statusCode !== null && result.exchange.responseLog) {
      console.log(result.exchange.responseLog);
    }
    throw result.error;
  }
}

export interface CliRuntimeOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Replaces the per-run dedicated client, e.g. with a pooled factory. */
  client?: ClientSource;
  /** Builds the dispatcher of the per-run dedicated client. */
  createDispatcher?: DispatcherFactory;
}

export async function runCli(argv: string[], options: CliRuntimeOptions = {}): Promise<void> {
  const parsed = parseArgs(argv);
  const cwd = options.cwd ?? process.cwd();

  switch (parsed.command) {
    case "run":
      await handleRun(parsed, options, cwd);
      return;
    default:
      printHelp();
  }
}
