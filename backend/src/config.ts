import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().min(1).default("0.0.0.0"),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development")
});

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: "development" | "test" | "production";
}

export type ConfigResult = { ok: true; value: ServerConfig } | { ok: false; errors: string[] };

export const parseConfig = (env: Record<string, string | undefined>): ConfigResult => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    return {
      ok: false,
      errors: result.error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
    };
  }
  const { PORT, HOST, NODE_ENV } = result.data;
  return { ok: true, value: { port: PORT, host: HOST, nodeEnv: NODE_ENV } };
};

/** Reads process.env once at startup; an invalid environment stops the process. */
export const loadConfig = (): ServerConfig => {
  const result = parseConfig(process.env);
  if (!result.ok) {
    console.error("Invalid environment configuration:");
    result.errors.forEach((error) => console.error(`  - ${error}`));
    process.exit(1);
  }
  return result.value;
};
