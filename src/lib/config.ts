import { parseChangedFiles } from "./changed";
import { env, envFlag, envOptional, envRatio } from "./env";
import type { EnvSource } from "./env";
import { DirectoryPriorVersionSource, GitPriorVersionSource, NoPriorVersionSource } from "./prior";
import type { PriorVersionSource } from "./prior";
import type { SimilarityName } from "./text";
import type { Thresholds } from "./types";
import { DEFAULT_THRESHOLDS } from "./types";

export type PriorSourceConfig =
  | { kind: "directory"; dir: string }
  | { kind: "git"; ref: string; prefix: string; bin: string }
  | { kind: "none" };

export type PreviewConfig = {
  htmlDir: string;
  changedFiles: string[];
  prior: PriorSourceConfig;
  thresholds: Thresholds;
  similarity: SimilarityName;
  strict: boolean;
};

export function loadConfig(source: EnvSource = process.env): PreviewConfig {
  const thresholds: Thresholds = {
    minSimilarity: envRatio("PREVIEW_MIN_SIMILARITY", DEFAULT_THRESHOLDS.minSimilarity, source),
    unchangedSimilarity: envRatio("PREVIEW_UNCHANGED_SIMILARITY", DEFAULT_THRESHOLDS.unchangedSimilarity, source),
    noticeSimilarity: envRatio("PREVIEW_NOTICE_SIMILARITY", DEFAULT_THRESHOLDS.noticeSimilarity, source)
  };
  if (thresholds.minSimilarity >= thresholds.unchangedSimilarity) {
    throw new Error("Invalid env: PREVIEW_MIN_SIMILARITY must be below PREVIEW_UNCHANGED_SIMILARITY");
  }

  const similarity = env("PREVIEW_SIMILARITY", "sequence", source);
  if (!isSimilarityName(similarity)) {
    throw new Error(`Invalid env: PREVIEW_SIMILARITY must be "sequence" or "dice" (got "${similarity}")`);
  }

  return {
    htmlDir: env("HTML_DIR", "./docs", source),
    changedFiles: parseChangedFiles(envOptional("PREVIEW_CHANGED_FILES", source) ?? ""),
    prior: priorFromEnv(source),
    thresholds,
    similarity,
    strict: envFlag("PREVIEW_STRICT", false, source)
  };
}

function isSimilarityName(v: string): v is SimilarityName {
  return v === "sequence" || v === "dice";
}

function priorFromEnv(source: EnvSource): PriorSourceConfig {
  const dir = envOptional("BASE_HTML_DIR", source);
  if (dir) return { kind: "directory", dir };
  const ref = env("BASE_REF", "origin/gh-pages", source);
  if (ref.toLowerCase() === "none") return { kind: "none" };
  return {
    kind: "git",
    ref,
    prefix: env("BASE_PREFIX", "", source),
    bin: env("GIT_BIN", "git", source)
  };
}

export function createPriorVersionSource(config: PriorSourceConfig, cwd?: string): PriorVersionSource {
  if (config.kind === "directory") return new DirectoryPriorVersionSource(config.dir);
  if (config.kind === "git") return new GitPriorVersionSource({ ref: config.ref, prefix: config.prefix, bin: config.bin, cwd });
  return new NoPriorVersionSource();
}
