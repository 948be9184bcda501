/**
 * Keyword sentiment estimator: maps player text to a signed relationship
 * delta. The lexicon is tunable policy and lives in data/sentiment/lexicon.yml.
 */

import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { log } from "../utils/logger.js";

const sentimentLog = log.withScope("sentiment");

export type SentimentEstimator = (text: string) => number;

export type LexiconEntry = {
  phrase: string;
  weight: number;
};

export const MAX_SENTIMENT = 1;

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

/** Blank phrases and non-finite weights are dropped with a warning. */
export function createKeywordSentiment(lexicon: readonly LexiconEntry[]): SentimentEstimator {
  const entries: LexiconEntry[] = [];
  for (const e of lexicon) {
    const phrase = e.phrase.trim().toLowerCase();
    if (!phrase || !Number.isFinite(e.weight)) {
      sentimentLog.warn(`Ignoring lexicon entry: ${JSON.stringify(e)}`);
      continue;
    }
    entries.push({ phrase, weight: e.weight });
  }

  return (text: string): number => {
    const lowered = text.toLowerCase();
    let score = 0;
    for (const entry of entries) {
      const hits = countOccurrences(lowered, entry.phrase);
      if (hits > 0) {
        score += entry.weight * hits;
      }
    }
    return Math.max(-MAX_SENTIMENT, Math.min(MAX_SENTIMENT, score));
  };
}

function toEntry(raw: unknown): LexiconEntry | null {
  if (!raw || typeof raw !== "object") return null;
  const phrase: unknown = Reflect.get(raw, "phrase");
  const weight: unknown = Reflect.get(raw, "weight");
  if (typeof phrase !== "string" || !phrase.trim()) return null;
  if (typeof weight !== "number" || !Number.isFinite(weight)) return null;
  return { phrase: phrase.trim(), weight };
}

export function defaultLexiconPath(dataRoot: string = path.join(process.cwd(), "data")): string {
  return path.join(dataRoot, "sentiment", "lexicon.yml");
}

/**
 * Load and validate a lexicon file. Invalid entries are skipped with a
 * warning; a missing file or missing `phrases` list throws.
 */
export function loadSentimentLexicon(filePath: string = defaultLexiconPath()): LexiconEntry[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Sentiment lexicon not found: ${filePath}`);
  }

  const data: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  const phrases: unknown = data && typeof data === "object" ? Reflect.get(data, "phrases") : undefined;
  if (!Array.isArray(phrases)) {
    throw new Error(`Invalid sentiment lexicon (missing 'phrases' list): ${filePath}`);
  }

  const entries: LexiconEntry[] = [];
  for (const raw of phrases) {
    const entry = toEntry(raw);
    if (!entry) {
      sentimentLog.warn(`Skipping invalid lexicon entry: ${JSON.stringify(raw)}`);
      continue;
    }
    entries.push(entry);
  }

  sentimentLog.info(`Loaded ${entries.length} sentiment phrases`);
  return entries;
}
