import { z } from "zod";

const envSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(50).default(3),
  JWT_SECRET: z.string().min(8).optional(),
  PAIRING_STRATEGY: z.enum(["forward", "backtrack"]).default("backtrack"),
  TOURNAMENT_DEBUG: z.enum(["0", "1"]).default("0")
});

export type AppConfig = z.infer<typeof envSchema>;

export function readConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Unset and blank variables both fall back to their defaults.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new Error(`Invalid environment configuration: ${fields}`);
  }

  return parsed.data;
}

export function requireJwtSecret(config: AppConfig = readConfig()) {
  if (!config.JWT_SECRET) {
    throw new Error("JWT_SECRET is required");
  }

  return config.JWT_SECRET;
}
