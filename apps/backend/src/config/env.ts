import { tmpdir } from "node:os";

import { z } from "zod";

const EnvSchema = z.object({
  DATABASE_URL: z
    .string()
    .min(1)
    .default("postgresql://localhost:5432/assembly_homology"),
  HOMOLOGY_TEMP_DIR: z.string().min(1).optional(),
  HOMOLOGY_PORT: z.coerce.number().int().min(1).max(65535).default(12080),
  MASH_EXECUTABLE: z.string().min(1).default("mash"),
});

export interface HomologyConfig {
  databaseUrl: string;
  tempDirectory: string;
  port: number;
  mashExecutable: string;
}

/**
 * Read the service configuration from environment variables
 *
 * @throws ZodError naming the offending variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): HomologyConfig {
  const parsed = EnvSchema.parse(env);
  return {
    databaseUrl: parsed.DATABASE_URL,
    tempDirectory: parsed.HOMOLOGY_TEMP_DIR ?? tmpdir(),
    port: parsed.HOMOLOGY_PORT,
    mashExecutable: parsed.MASH_EXECUTABLE,
  };
}
