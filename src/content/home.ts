// Static marketing content for the homepage, read from content/home.json.

import * as fs from "fs";
import { z } from "zod";
import { ConfigError } from "../config";

const TierSchema = z.object({
  name: z.string(),
  price: z.string(),
  tag: z.string(),
  badge: z.string(),
  bullets: z.array(z.string()),
  wide: z.boolean().default(false),
});

export const HomeContentSchema = z
  .object({
    images: z.array(z.string().url()),
    steps: z.array(z.string()),
    faq: z.array(z.object({ question: z.string(), answer: z.string() })),
    stats: z.array(
      z.object({
        label: z.string(),
        value: z.string(),
        delta: z.string(),
        trend: z.enum(["up", "down"]),
      })
    ),
    tiers: z.array(TierSchema).min(1),
    testimonials: z.array(
      z.object({ quote: z.string(), author: z.string(), role: z.string() })
    ),
    compareRows: z.array(
      z.object({ feature: z.string(), values: z.array(z.string()) })
    ),
    logos: z.array(z.object({ src: z.string().url(), alt: z.string() })),
    serviceLabels: z.array(z.string()),
    ogImageUrl: z.string().url(),
    logoUrl: z.string().url(),
    igHandle: z.string(),
  })
  .superRefine((content, ctx) => {
    // Each comparison row needs one cell per tier column.
    content.compareRows.forEach((row, i) => {
      if (row.values.length !== content.tiers.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["compareRows", i, "values"],
          message: `expected ${content.tiers.length} values, got ${row.values.length}`,
        });
      }
    });
  });

export type HomeContent = z.infer<typeof HomeContentSchema>;

export function loadHomeContent(file: string): HomeContent {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read homepage content ${file}: ${reason}`);
  }

  const parsed = HomeContentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Homepage content ${file} is invalid: ${issues}`);
  }
  return parsed.data;
}
