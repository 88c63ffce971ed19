/**
 * Startup environment variable validation.
 *
 * Throws on unusable values. Warns on settings that work but are probably not
 * what a deployment wants. Skipped in test environment.
 */
export function validateRequiredEnvVars(): void {
  if (process.env.NODE_ENV === "test") return;

  const errors: string[] = [];
  const warnings: string[] = [];

  // --- Critical ---

  const databasePath = process.env.DATABASE_PATH;
  if (databasePath !== undefined && !databasePath.trim()) {
    errors.push("DATABASE_PATH is set but empty");
  }

  // --- Recommended ---

  if (process.env.NODE_ENV === "production") {
    if (databasePath === undefined) {
      warnings.push("DATABASE_PATH is not set; using ./data/bots.sqlite relative to the working directory");
    } else if (databasePath.trim() === ":memory:") {
      warnings.push("DATABASE_PATH is :memory:; every record is lost when the process exits");
    }
    if (!process.env.BOT_DEFAULT_OWNER) {
      warnings.push('BOT_DEFAULT_OWNER is not set; new bots are owned by "Platform Operations"');
    }
  }

  // --- Emit ---

  if (warnings.length > 0) {
    for (const w of warnings) {
      console.warn(`[env] WARNING: ${w}`);
    }
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
