// The assistant's system prompt is a text asset read once at startup.

import { createHash } from "crypto";
import * as fs from "fs";
import { ConfigError } from "../config";

export interface SystemPrompt {
  text: string;
  /** Short content hash, logged so deployments can tell prompt revisions apart. */
  version: string;
}

export function loadSystemPrompt(file: string): SystemPrompt {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8").trim();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read system prompt ${file}: ${reason}`);
  }
  if (!text) {
    throw new ConfigError(`System prompt ${file} is empty`);
  }

  const version = createHash("sha256").update(text).digest("hex").slice(0, 12);
  return { text, version };
}
