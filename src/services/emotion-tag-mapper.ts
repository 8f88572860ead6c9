/**
 * Translates canonical emotion tokens into each provider's native tag vocabulary.
 * Tables live in data/emotion-tags.json and are read once at startup.
 */
import fs from "node:fs";

import { z } from "zod";

import { env } from "../config/env.js";
import { ConfigurationError } from "../errors.js";
import type { TtsProvider } from "../types/provider.js";

const providerTableSchema = z.object({
  strategy: z.enum(["all", "best-match"]),
  inlineMarkup: z.boolean(),
  defaultTag: z.string().min(1),
  priority: z.array(z.string()).optional(),
  tags: z.record(z.array(z.string().min(1)).min(1)),
});

const emotionTableSchema = z.object({
  families: z.record(z.array(z.string())),
  providers: z.object({
    elevenlabs: providerTableSchema,
    cartesia: providerTableSchema,
  }),
});

export type EmotionTable = z.infer<typeof emotionTableSchema>;
export type ProviderTagTable = z.infer<typeof providerTableSchema>;

const INLINE_TAG = /\[([^\]]+)\]/g;

let cachedTable: EmotionTable | undefined;

/** Reads and validates an emotion table file. */
export function loadEmotionTable(filePath: string): EmotionTable {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const parsed = emotionTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid emotion table at ${filePath}: ${parsed.error.message}`
    );
  }
  return parsed.data;
}

/** Returns the process-wide emotion table. */
export function getEmotionTable(): EmotionTable {
  if (cachedTable) {
    return cachedTable;
  }
  cachedTable = loadEmotionTable(env.emotionTablePath);
  return cachedTable;
}

/**
 * Maps canonical tokens to a provider's representation.
 * "all" concatenates every token's labels in order; "best-match" keeps the single
 * label ranked highest in the provider's priority list.
 */
export function resolveEmotionTags(
  canonicalTags: readonly string[],
  provider: TtsProvider,
  table: EmotionTable = getEmotionTable()
): string[] {
  const providerTable = table.providers[provider];
  const labels = canonicalTags.flatMap((token) =>
    lookupLabels(providerTable, token)
  );

  if (providerTable.strategy === "all" || labels.length === 0) {
    return labels;
  }

  return [pickBestMatch(labels, providerTable.priority ?? [])];
}

/** Rewrites bracketed tags inside an utterance into the provider's labels. */
export function mapInlineTags(
  text: string,
  provider: TtsProvider,
  table: EmotionTable = getEmotionTable()
): string {
  return text.replace(INLINE_TAG, (_match, token: string) =>
    resolveEmotionTags([token.trim().toLowerCase()], provider, table)
      .map((label) => `[${label}]`)
      .join(" ")
  );
}

/**
 * Handles `[tag]` markup in the middle of an utterance: mapped for providers that
 * read inline tags, removed for the rest.
 */
export function renderInlineTags(
  text: string,
  provider: TtsProvider,
  table: EmotionTable = getEmotionTable()
): string {
  return table.providers[provider].inlineMarkup
    ? mapInlineTags(text, provider, table)
    : stripInlineTags(text);
}

/** Removes bracketed tags. */
export function stripInlineTags(text: string): string {
  return text.replace(INLINE_TAG, " ").replace(/\s+/g, " ").trim();
}

/** Canonical tokens the table knows about, grouped by family. */
export function listCanonicalTokens(
  table: EmotionTable = getEmotionTable()
): string[] {
  return Object.values(table.families).flat();
}

function lookupLabels(providerTable: ProviderTagTable, token: string): string[] {
  return providerTable.tags[token.trim().toLowerCase()] ?? [providerTable.defaultTag];
}

function pickBestMatch(labels: string[], priority: readonly string[]): string {
  let best = labels[0] ?? "";
  let bestRank = rankOf(best, priority);

  for (const label of labels.slice(1)) {
    const rank = rankOf(label, priority);
    if (rank < bestRank) {
      best = label;
      bestRank = rank;
    }
  }

  return best;
}

function rankOf(label: string, priority: readonly string[]): number {
  const rank = priority.indexOf(label);
  return rank < 0 ? priority.length : rank;
}
