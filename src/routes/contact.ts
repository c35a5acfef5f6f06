// Contact form: validate, drop honeypot hits, then send the client
// acknowledgement and the team notification.

import { z } from "zod";
import { MailConfig } from "../config";
import { HttpResult, redirect } from "../http";
import { log } from "../logger";
import { Mailer } from "../mail/mailer";
import { TemplateRenderer } from "../render/templates";

export const BUDGET_CHOICES = {
  "50-75": "PHP 50k – 75k",
  "75-120": "PHP 75k – 120k",
  "120-200": "PHP 120k – 200k",
  "200+": "PHP 200k+",
} as const;

export const TIMELINE_CHOICES = {
  asap: "ASAP (0–2 weeks)",
  "1m": "1 month",
  "3m": "3 months",
  "6m+": "6+ months",
} as const;

export const SERVICE_LABELS = [
  "Content",
  "Reels",
  "Community",
  "Paid Social",
  "Landing Page",
  "CRM & Automation",
  "Analytics",
] as const;

type BudgetKey = keyof typeof BUDGET_CHOICES;
type TimelineKey = keyof typeof TIMELINE_CHOICES;

function isBudget(value: string): value is BudgetKey {
  return value in BUDGET_CHOICES;
}

function isTimeline(value: string): value is TimelineKey {
  return value in TIMELINE_CHOICES;
}

export const ContactFormSchema = z.object({
  full_name: z.string().trim().min(1).max(120),
  email: z.string().trim().email(),
  company: z.string().trim().max(120).default(""),
  website: z.string().trim().max(200).default(""),
  budget: z.string().refine(isBudget, "not a valid budget choice"),
  timeline: z.string().refine(isTimeline, "not a valid timeline choice"),
  services: z.array(z.enum(SERVICE_LABELS)).default([]),
  message: z.string().trim().min(1),
  hp: z.string().default(""),
});

export type ContactForm = z.infer<typeof ContactFormSchema>;

export interface ContactDeps {
  mailer: Mailer;
  renderer: TemplateRenderer;
  mail: Pick<MailConfig, "contactRecipient">;
}

/** Flatten an urlencoded body; only "services" may repeat. */
export function formFields(body: string): Record<string, string | string[]> {
  const params = new URLSearchParams(body);
  const fields: Record<string, string | string[]> = {};
  for (const key of new Set(params.keys())) {
    fields[key] = key === "services" ? params.getAll(key) : params.get(key) ?? "";
  }
  return fields;
}

function emailContext(form: ContactForm): object {
  return {
    d: {
      ...form,
      budget_label: BUDGET_CHOICES[form.budget],
      timeline_label: TIMELINE_CHOICES[form.timeline],
      services_label: form.services.join(", ") || "—",
    },
  };
}

export async function handleContactSubmit(
  method: string,
  body: string,
  deps: ContactDeps
): Promise<HttpResult> {
  if (method !== "POST") {
    return redirect("/#contact");
  }

  const parsed = ContactFormSchema.safeParse(formFields(body));
  if (!parsed.success) {
    log("warn", "Contact form rejected: invalid fields", {
      fields: parsed.error.issues.map((i) => i.path.join(".")),
    });
    return redirect("/#contact?ok=0");
  }

  const form = parsed.data;
  if (form.hp) {
    log("warn", "Contact form rejected: honeypot filled");
    return redirect("/#contact?ok=0");
  }

  const context = emailContext(form);
  const { renderer, mailer } = deps;

  await mailer.send({
    to: [form.email],
    subject: "We got your inquiry — Lioraè Co.",
    text: renderer.render("emails/contact-client.txt", context),
    html: renderer.render("emails/contact-client.html", context),
  });

  await mailer.send({
    to: [deps.mail.contactRecipient],
    replyTo: [form.email],
    subject: `[New Inquiry] ${form.full_name} — ${form.company || "No company"}`,
    text: renderer.render("emails/contact-team.txt", context),
    html: renderer.render("emails/contact-team.html", context),
  });

  log("info", "Contact inquiry delivered", {
    budget: form.budget,
    timeline: form.timeline,
    services: form.services.length,
  });
  return redirect("/#contact?ok=1");
}
