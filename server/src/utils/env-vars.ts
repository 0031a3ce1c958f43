import { z } from "zod";

const envScheme = z.object({
  GEMINI_API_KEY: z.string().nonempty(),
  GEMINI_MODEL: z.string().optional().default("gemini-2.0-flash"),
  APP_PORT: z
    .string()
    .optional()
    .transform((str) => (str && parseInt(str)) || 3000),
  MAX_FILE_SIZE: z
    .string()
    .optional()
    // Default file size is 5MB
    .transform((str) => (str && parseInt(str)) || 5242880),
  EXTRACTION_TIMEOUT_MS: z
    .string()
    .optional()
    .transform((str) => (str && parseInt(str)) || 60000),
  SESSION_TTL_MINUTES: z
    .string()
    .optional()
    .transform((str) => (str && parseInt(str)) || 120),
  INSTRUCTION_TEMPLATE_PATH: z.string().optional(),
  STATIC_ROOT: z.string().optional().default("./public"),
  NODE_ENV: z.string().optional().default("development"),
});

export type Env = z.infer<typeof envScheme>;

/**
 * Parses the process environment. Throws when GEMINI_API_KEY is absent, which
 * the entrypoint treats as fatal before the server starts listening.
 */
export const loadEnv = (source: NodeJS.ProcessEnv = process.env): Env =>
  envScheme.parse(source);
