import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const CONFIG_PATH_ENV = "GUIDELINE_RAG_CONFIG";

const configFileSchema = z.object({
  llm: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url().default("https://api.openai.com/v1"),
    model: z.string().min(1).default("gpt-5.1"),
    embedModel: z.string().min(1).default("text-embedding-3-large"),
    api: z.enum(["chat", "responses"]).default("chat"),
    timeoutMs: z.number().int().positive().default(60_000),
  }).default({}),
  pubmed: z.object({
    email: z.string().optional(),
    apiKey: z.string().optional(),
    tool: z.string().min(1).default("guideline_rag"),
    timeoutMs: z.number().int().positive().default(60_000),
  }).default({}),
  rag: z.object({
    chunkSize: z.number().int().positive().default(1200),
    chunkOverlap: z.number().int().nonnegative().default(200),
    collection: z.string().min(1).default("guideline_rag"),
    topK: z.number().int().positive().default(8),
    embeddingBatchSize: z.number().int().positive().default(128),
  }).default({}),
  paths: z.object({
    dataDir: z.string().default("data"),
    vectorDir: z.string().default("vector_db"),
    literatureFile: z.string().optional(),
    guidelinesFile: z.string().optional(),
    guidelinePdfDir: z.string().optional(),
    articlePdfDir: z.string().optional(),
    datasetFile: z.string().optional(),
  }).default({}),
});

export type GenerationApi = "chat" | "responses";

export interface RagConfig {
  llm: {
    apiKey: string;
    baseUrl: string;
    model: string;
    embedModel: string;
    api: GenerationApi;
    timeoutMs: number;
  };
  pubmed: {
    email: string;
    apiKey?: string;
    tool: string;
    timeoutMs: number;
  };
  rag: {
    chunkSize: number;
    chunkOverlap: number;
    collection: string;
    topK: number;
    embeddingBatchSize: number;
  };
  paths: {
    dataDir: string;
    vectorDir: string;
    literatureFile: string;
    guidelinesFile: string;
    guidelinePdfDir: string;
    articlePdfDir: string;
    datasetFile: string;
  };
}

export interface LoadConfigOptions {
  /** Explicit config file; otherwise GUIDELINE_RAG_CONFIG, then ./config.json. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Directory relative paths resolve against. Defaults to the config file's directory. */
  baseDir?: string;
}

export function resolveConfigPath(options: LoadConfigOptions = {}): string {
  const env = options.env ?? process.env;
  return path.resolve(options.configPath ?? env[CONFIG_PATH_ENV] ?? "config.json");
}

export function loadConfig(options: LoadConfigOptions = {}): RagConfig {
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options);

  if (!existsSync(configPath)) {
    throw new ConfigError(
      `Config file not found: ${configPath}. Create config.json or set ${CONFIG_PATH_ENV}.`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${configPath}`, err);
  }

  return parseConfig(raw, env, options.baseDir ?? path.dirname(configPath));
}

/**
 * Validates a parsed config document and applies environment overrides.
 * Relative paths are resolved against `baseDir`.
 */
export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv,
  baseDir: string,
): RagConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config: ${issues}`);
  }
  const file = parsed.data;

  const apiKey = env["RAG_API_KEY"] || file.llm.apiKey;
  if (!apiKey) {
    throw new ConfigError("llm.apiKey is required (or set RAG_API_KEY)");
  }
  const email = env["PUBMED_EMAIL"] || file.pubmed.email;
  if (!email) {
    throw new ConfigError("pubmed.email is required (or set PUBMED_EMAIL)");
  }
  if (file.rag.chunkOverlap >= file.rag.chunkSize) {
    throw new ConfigError(
      `rag.chunkOverlap (${file.rag.chunkOverlap}) must be smaller than rag.chunkSize (${file.rag.chunkSize})`,
    );
  }

  const dataDir = path.resolve(baseDir, file.paths.dataDir);
  const rawDir = path.join(dataDir, "raw");
  const resolveOr = (value: string | undefined, fallback: string) =>
    value ? path.resolve(baseDir, value) : fallback;

  return {
    llm: {
      apiKey,
      baseUrl: (env["RAG_BASE_URL"] || file.llm.baseUrl).replace(/\/+$/, ""),
      model: file.llm.model,
      embedModel: file.llm.embedModel,
      api: file.llm.api,
      timeoutMs: file.llm.timeoutMs,
    },
    pubmed: {
      email,
      apiKey: env["PUBMED_API_KEY"] || file.pubmed.apiKey || undefined,
      tool: file.pubmed.tool,
      timeoutMs: file.pubmed.timeoutMs,
    },
    rag: { ...file.rag },
    paths: {
      dataDir,
      vectorDir: path.resolve(baseDir, file.paths.vectorDir),
      literatureFile: resolveOr(file.paths.literatureFile, path.join(rawDir, "pubmed_records.jsonl")),
      guidelinesFile: resolveOr(file.paths.guidelinesFile, path.join(rawDir, "guidelines_text.jsonl")),
      guidelinePdfDir: resolveOr(file.paths.guidelinePdfDir, path.join(rawDir, "guidelines")),
      articlePdfDir: resolveOr(file.paths.articlePdfDir, path.join(rawDir, "article_pdfs")),
      datasetFile: resolveOr(file.paths.datasetFile, path.join(dataDir, "open_guidelines.jsonl")),
    },
  };
}
