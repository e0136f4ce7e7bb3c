import fs from "node:fs";

import { z } from "zod";

import { ConfigError } from "./errors.js";
import { keywordsPath } from "./paths.js";

const KeywordFileSchema = z.object({
  language: z.string().min(1),
  keywords: z.array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/)).min(1),
});

const KEYWORD_CACHE = new Map<string, ReadonlySet<string>>();

export function loadKeywordSet(language = "java"): ReadonlySet<string> {
  const cached = KEYWORD_CACHE.get(language);
  if (cached) return cached;

  const filePath = keywordsPath(language);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Unable to read keyword list for ${language}: ${filePath}`, err);
  }

  const parsed = KeywordFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid keyword list ${filePath}\n${parsed.error.toString()}`);
  }

  const keywords: ReadonlySet<string> = new Set(parsed.data.keywords);
  KEYWORD_CACHE.set(language, keywords);
  return keywords;
}
