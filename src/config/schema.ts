import { z } from "zod";

const PLACEHOLDER_PATTERN = /^(your[_-]|changeme$|<.*>$|x{3,}$)/i;

/**
 * True when a credential still holds the sample value shipped in
 * config.example.yaml (or an obvious stand-in for one).
 */
export function isPlaceholderCredential(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.length === 0 || PLACEHOLDER_PATTERN.test(trimmed);
}

/**
 * True when the runtime's Intl data knows the IANA zone name.
 */
export function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

const smtpConfigSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().positive().default(587),
    user: z.string(),
    password: z.string(),
    fromName: z.string().min(1).default("Morning Digest"),
    fromAddress: z.string().email().optional(),
  })
  .superRefine((smtp, ctx) => {
    for (const field of ["user", "password"] as const) {
      if (isPlaceholderCredential(smtp[field])) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `smtp ${field} is still a placeholder, set real sender credentials`,
        });
      }
    }
  });

const recipientSchema = z.object({
  name: z.string().min(1),
  email: z.string().email(),
});

const locationSchema = z.object({
  name: z.string().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  timezone: z
    .string()
    .min(1)
    .refine(isKnownTimeZone, "unknown timezone")
    .default("Europe/Berlin"),
});

const weatherSourceSchema = z.object({
  url: z.string().url().default("https://api.open-meteo.com/v1/forecast"),
  attempts: z.number().int().positive().max(10).default(5),
  baseDelayMs: z.number().int().nonnegative().default(200),
  maxDelayMs: z.number().int().nonnegative().default(2000),
});

const quoteSourceSchema = z.object({
  url: z.string().url().default("https://zenquotes.io/api/random"),
  tags: z.array(z.string().min(1)).optional(),
  maxLength: z.number().int().positive().optional(),
});

const factSourceSchema = z.object({
  url: z
    .string()
    .url()
    .default("https://uselessfacts.jsph.pl/api/v2/facts/random"),
});

export const appConfigSchema = z.object({
  smtp: smtpConfigSchema,
  recipients: z
    .array(recipientSchema)
    .min(1, "at least one recipient is required")
    .superRefine((recipients, ctx) => {
      const seen = new Set<string>();
      recipients.forEach((recipient, index) => {
        if (seen.has(recipient.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, "name"],
            message: `duplicate recipient name "${recipient.name}"`,
          });
        }
        seen.add(recipient.name);
      });
    }),
  location: locationSchema,
  schedule: z
    .object({
      digest: z.string().min(1).optional(),
    })
    .default({}),
  sources: z
    .object({
      timeoutMs: z.number().int().positive().default(10000),
      weather: weatherSourceSchema.default({}),
      quote: quoteSourceSchema.default({}),
      fact: factSourceSchema.default({}),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type SmtpConfig = AppConfig["smtp"];
export type Recipient = AppConfig["recipients"][number];
export type Location = AppConfig["location"];
export type SourcesConfig = AppConfig["sources"];
